export type ValidationCode = 'InvalidCode' | 'InvalidYear' | 'InvalidLabel' | 'ImmutableField' | 'InvalidReference';
export type ConflictCode = 'DuplicateName' | 'StatusConflict' | 'ExternalIdConflict';

/** Bad caller input. Never retried. */
export class ValidationError extends Error {
    constructor(public readonly code: ValidationCode, message: string) {
        super(message);
        this.name = 'ValidationError';
    }
}

/** Duplicate name or diverged state; the caller must re-fetch. */
export class ConflictError extends Error {
    constructor(public readonly code: ConflictCode, message: string) {
        super(message);
        this.name = 'ConflictError';
    }
}

export class NotFoundError extends Error {
    public readonly code = 'NotFound';

    constructor(entity: string, id: string) {
        super(`${entity} ${id} not found`);
        this.name = 'NotFoundError';
    }
}

export class InvalidStateError extends Error {
    public readonly code = 'InvalidState';

    constructor(message: string) {
        super(message);
        this.name = 'InvalidStateError';
    }
}

/** 429, 5xx, timeouts and network failures. Retried up to the attempt budget. */
export class TransientDispatchError extends Error {
    public readonly code = 'TransientDispatch';

    constructor(message: string) {
        super(message);
        this.name = 'TransientDispatchError';
    }
}

/** Non-429 4xx, unknown platform, malformed ticket. Never retried. */
export class TerminalDispatchError extends Error {
    public readonly code: string = 'TerminalDispatch';

    constructor(message: string) {
        super(message);
        this.name = 'TerminalDispatchError';
    }
}

export class EncodeError extends TerminalDispatchError {
    public readonly code = 'EncodeError';

    constructor(message: string) {
        super(message);
        this.name = 'EncodeError';
    }
}

export class ExtractError extends TerminalDispatchError {
    public readonly code = 'ExtractError';

    constructor(message: string) {
        super(message);
        this.name = 'ExtractError';
    }
}

export class UnknownPlatformError extends TerminalDispatchError {
    public readonly code = 'UnknownPlatform';

    constructor(platformName: string) {
        super(`Unsupported platform: ${platformName}`);
        this.name = 'UnknownPlatformError';
    }
}
