export type RollupCostErrorCode = 'INVALID_INPUT' | 'MISSING_CUSTOM_FIELDS' | 'UNKNOWN_PROFILE';

/**
 * Base class for every failure the profiler reports to the user.
 * The CLI prints the message and exits with code 1.
 */
export class RollupCostError extends Error {
    constructor(readonly code: RollupCostErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class InvalidInputError extends RollupCostError {
    constructor(message: string) {
        super('INVALID_INPUT', message);
    }
}

export class MissingCustomFieldsError extends RollupCostError {
    constructor(readonly missing: readonly string[]) {
        super('MISSING_CUSTOM_FIELDS', `Missing required options for custom profile: ${missing.join(', ')}`);
    }
}

export class UnknownProfileError extends RollupCostError {
    constructor(readonly key: string) {
        super('UNKNOWN_PROFILE', `Unknown profile: ${key}`);
    }
}
