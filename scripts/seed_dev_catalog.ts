import { openDatabase, brands, channels } from '../src/db';
import { applySchema } from '../src/db/migrate';

const BRANDS = [
    { id: 'brand_dev_acme', name: 'Acme Snacks', code: 'ACME', restricted: false },
    { id: 'brand_dev_spirits', name: 'Northside Spirits', code: 'NSS', restricted: true }
];

const CHANNELS = [
    { id: 'channel_dev_meta', platformName: 'Meta', apiIdentifier: 'meta-dev' },
    { id: 'channel_dev_tiktok', platformName: 'TikTok', apiIdentifier: 'tiktok-dev' },
    { id: 'channel_dev_google', platformName: 'Google', apiIdentifier: 'google-dev' }
];

async function seedDev() {
    console.log('--- SEEDING DEV BRANDS & CHANNELS ---');
    const handle = openDatabase();
    try {
        applySchema(handle);
        const now = new Date().toISOString();

        for (const brand of BRANDS) {
            handle.db.insert(brands)
                .values({ ...brand, createdAt: now })
                .onConflictDoUpdate({
                    target: brands.id,
                    set: { name: brand.name, code: brand.code, restricted: brand.restricted }
                })
                .run();
            console.log(`[OK] Brand Ready: ${brand.id} (${brand.code}${brand.restricted ? ', restricted' : ''})`);
        }

        for (const channel of CHANNELS) {
            handle.db.insert(channels)
                .values({ ...channel, createdAt: now })
                .onConflictDoUpdate({
                    target: channels.id,
                    set: { platformName: channel.platformName, apiIdentifier: channel.apiIdentifier }
                })
                .run();
            console.log(`[OK] Channel Ready: ${channel.id} -> ${channel.platformName}`);
        }

        console.log('\nDEV CATALOG READY');
    } finally {
        handle.close();
    }
}

seedDev().catch(e => {
    console.error('Seed Failed:', e);
    process.exit(1);
});
