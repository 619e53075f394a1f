export const DEFAULT_PROFILE: string = 'aztec';
export const DEFAULT_BATCH_SIZE: number = 256;
export const DEFAULT_GAS_PRICE_GWEI: number = 20.0;

export const CUSTOM_PROFILE_KEY = 'custom';

export const PROFILE_ENV_VAR = 'ROLLUP_COST_PROFILE';
export const BATCH_SIZE_ENV_VAR = 'ROLLUP_COST_BATCH_SIZE';
export const GAS_PRICE_GWEI_ENV_VAR = 'ROLLUP_COST_GAS_PRICE_GWEI';
