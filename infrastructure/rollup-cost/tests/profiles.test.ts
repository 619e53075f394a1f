/**
 * This suite contains tests for the profile registry and custom profiles.
 */

import { InvalidInputError, MissingCustomFieldsError, UnknownProfileError } from '../src/errors';
import { PROFILES, PROFILE_KEYS, customProfile, getProfile, isProfileKey, listProfiles } from '../src/profiles';

describe('Profile registry', () => {
    test('Lists the built-in profiles in order', () => {
        expect(PROFILE_KEYS).toEqual(['aztec', 'zama', 'soundness']);
        expect(listProfiles().map((profile) => profile.key)).toEqual(['aztec', 'zama', 'soundness']);
    });

    test('Looks up profiles by key', () => {
        expect(getProfile('zama')).toMatchObject({
            name: 'Zama-style FHE + rollup hybrid',
            proofGas: 500_000,
            calldataGasPerTx: 700,
            overheadGasPerBatch: 70_000
        });
        expect(getProfile('soundness')).toMatchObject({
            proofGas: 650_000,
            calldataGasPerTx: 420,
            overheadGasPerBatch: 90_000
        });
    });

    test('Rejects unknown keys', () => {
        expect(() => getProfile('optimism')).toThrow(UnknownProfileError);
        expect(() => getProfile('toString')).toThrow('Unknown profile: toString');
        expect(isProfileKey('custom')).toBe(false);
    });

    test('Keeps built-in profiles immutable', () => {
        expect(Object.isFrozen(getProfile('aztec'))).toBe(true);
        expect(Object.isFrozen(PROFILES)).toBe(true);
    });
});

describe('Custom profiles', () => {
    test('Builds a custom profile from all three fields', () => {
        expect(customProfile({ proofGas: 0, calldataGasPerTx: 16, overheadGasPerBatch: 21_000 })).toEqual({
            key: 'custom',
            name: 'Custom rollup profile',
            description: 'User-defined gas parameters for a hypothetical rollup.',
            proofGas: 0,
            calldataGasPerTx: 16,
            overheadGasPerBatch: 21_000
        });
    });

    test('Reports every missing field in option order', () => {
        let error: unknown;
        try {
            customProfile({ calldataGasPerTx: 16 });
        } catch (e) {
            error = e;
        }
        expect(error).toBeInstanceOf(MissingCustomFieldsError);
        if (error instanceof MissingCustomFieldsError) {
            expect(error.code).toEqual('MISSING_CUSTOM_FIELDS');
            expect(error.missing).toEqual(['--proof-gas', '--overhead-gas-per-batch']);
            expect(error.message).toEqual(
                'Missing required options for custom profile: --proof-gas, --overhead-gas-per-batch'
            );
        }
    });

    test('Rejects negative gas fields', () => {
        expect(() => customProfile({ proofGas: 1, calldataGasPerTx: -1, overheadGasPerBatch: 1 })).toThrow(
            new InvalidInputError('--calldata-gas-per-tx must not be negative.')
        );
    });
});
