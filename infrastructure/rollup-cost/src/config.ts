import {
    BATCH_SIZE_ENV_VAR,
    CUSTOM_PROFILE_KEY,
    DEFAULT_BATCH_SIZE,
    DEFAULT_GAS_PRICE_GWEI,
    DEFAULT_PROFILE,
    GAS_PRICE_GWEI_ENV_VAR,
    PROFILE_ENV_VAR
} from './constants';
import { InvalidInputError } from './errors';
import { isProfileKey } from './profiles';

export interface CliDefaults {
    profile: string;
    batchSize: number;
    gasPriceGwei: number;
}

/**
 * Reads CLI defaults from the environment. Unset or empty variables fall back
 * to the built-in defaults; anything malformed is rejected.
 */
export function loadDefaults(env: NodeJS.ProcessEnv = process.env): CliDefaults {
    const profile = env[PROFILE_ENV_VAR] || DEFAULT_PROFILE;
    if (profile !== CUSTOM_PROFILE_KEY && !isProfileKey(profile)) {
        throw new InvalidInputError(`${PROFILE_ENV_VAR} must name a known profile, got '${profile}'.`);
    }

    let batchSize = DEFAULT_BATCH_SIZE;
    const rawBatchSize = env[BATCH_SIZE_ENV_VAR];
    if (rawBatchSize) {
        batchSize = Number(rawBatchSize);
        if (!Number.isSafeInteger(batchSize) || batchSize <= 0) {
            throw new InvalidInputError(`${BATCH_SIZE_ENV_VAR} must be a positive integer, got '${rawBatchSize}'.`);
        }
    }

    let gasPriceGwei = DEFAULT_GAS_PRICE_GWEI;
    const rawGasPrice = env[GAS_PRICE_GWEI_ENV_VAR];
    if (rawGasPrice) {
        gasPriceGwei = Number(rawGasPrice);
        if (!Number.isFinite(gasPriceGwei) || gasPriceGwei < 0) {
            throw new InvalidInputError(
                `${GAS_PRICE_GWEI_ENV_VAR} must be a non-negative number, got '${rawGasPrice}'.`
            );
        }
    }

    return { profile, batchSize, gasPriceGwei };
}
