import { CUSTOM_PROFILE_KEY } from './constants';
import { InvalidInputError, MissingCustomFieldsError, UnknownProfileError } from './errors';

export interface RollupProfile {
    readonly key: string;
    readonly name: string;
    readonly description: string;
    /** Gas spent verifying one batch proof. */
    readonly proofGas: number;
    readonly calldataGasPerTx: number;
    readonly overheadGasPerBatch: number;
}

export const PROFILES = Object.freeze({
    aztec: Object.freeze({
        key: 'aztec',
        name: 'Aztec-style zk rollup',
        description:
            'Privacy-preserving zk rollup with relatively expensive proofs but efficient calldata packing.',
        proofGas: 900_000,
        calldataGasPerTx: 320,
        overheadGasPerBatch: 60_000
    }),
    zama: Object.freeze({
        key: 'zama',
        name: 'Zama-style FHE + rollup hybrid',
        description:
            'Conceptual profile for a system combining fully homomorphic encryption with rollup-style batching. ' +
            'Proofs are cheaper but ciphertexts are larger.',
        proofGas: 500_000,
        calldataGasPerTx: 700,
        overheadGasPerBatch: 70_000
    }),
    soundness: Object.freeze({
        key: 'soundness',
        name: 'Soundness-first research rollup',
        description:
            'Profile that prioritizes simple, auditable circuits and extra safety margins over raw gas efficiency.',
        proofGas: 650_000,
        calldataGasPerTx: 420,
        overheadGasPerBatch: 90_000
    })
} satisfies Record<string, RollupProfile>);

export type ProfileKey = keyof typeof PROFILES;

export const PROFILE_KEYS = Object.keys(PROFILES).filter(isProfileKey);

export function isProfileKey(value: string): value is ProfileKey {
    return Object.prototype.hasOwnProperty.call(PROFILES, value);
}

export function getProfile(key: string): RollupProfile {
    if (!isProfileKey(key)) {
        throw new UnknownProfileError(key);
    }
    return PROFILES[key];
}

export function listProfiles(): RollupProfile[] {
    return PROFILE_KEYS.map((key) => PROFILES[key]);
}

export interface CustomProfileFields {
    proofGas?: number;
    calldataGasPerTx?: number;
    overheadGasPerBatch?: number;
}

export function customProfile(fields: CustomProfileFields): RollupProfile {
    const { proofGas, calldataGasPerTx, overheadGasPerBatch } = fields;
    if (proofGas === undefined || calldataGasPerTx === undefined || overheadGasPerBatch === undefined) {
        const missing: string[] = [];
        if (proofGas === undefined) missing.push('--proof-gas');
        if (calldataGasPerTx === undefined) missing.push('--calldata-gas-per-tx');
        if (overheadGasPerBatch === undefined) missing.push('--overhead-gas-per-batch');
        throw new MissingCustomFieldsError(missing);
    }

    for (const [option, value] of [
        ['--proof-gas', proofGas],
        ['--calldata-gas-per-tx', calldataGasPerTx],
        ['--overhead-gas-per-batch', overheadGasPerBatch]
    ] as const) {
        if (value < 0) {
            throw new InvalidInputError(`${option} must not be negative.`);
        }
    }

    return Object.freeze({
        key: CUSTOM_PROFILE_KEY,
        name: 'Custom rollup profile',
        description: 'User-defined gas parameters for a hypothetical rollup.',
        proofGas,
        calldataGasPerTx,
        overheadGasPerBatch
    });
}
