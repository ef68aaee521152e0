// Runs before any module loads config
process.env.NODE_ENV = 'test';
process.env.DATABASE_URL = ':memory:';
process.env.LOG_LEVEL = 'silent';
