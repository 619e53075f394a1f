import { BigNumber, utils } from 'ethers';
import { InvalidInputError } from './errors';
import { RollupProfile } from './profiles';

export interface CostSummary {
    readonly profile: string;
    readonly profileName: string;
    readonly description: string;
    readonly txCount: number;
    readonly batchSize: number;
    readonly batches: number;
    readonly gasPriceGwei: number;
    readonly proofGasPerBatch: number;
    readonly calldataGasPerTx: number;
    readonly overheadGasPerBatch: number;
    readonly totalProofGas: number;
    readonly totalOverheadGas: number;
    readonly totalCalldataGas: number;
    readonly totalGas: number;
    readonly perTxGas: number;
    readonly totalFeeEth: number;
    readonly perTxFeeEth: number;
}

const GWEI = 1_000_000_000;

/** Converts a gwei amount to integer wei, dropping any fraction below one wei. */
export function weiFromGwei(gwei: number): BigNumber {
    const wei = gwei * GWEI;
    if (!Number.isFinite(wei)) {
        throw new InvalidInputError('gas_price_gwei is too large.');
    }
    // BigNumber.from refuses numbers past 2^53, so go through a bigint.
    return BigNumber.from(BigInt(Math.trunc(wei)).toString());
}

export function ethFromWei(wei: BigNumber): number {
    return parseFloat(utils.formatEther(wei));
}

export function feeWei(totalGas: number, gasPriceGwei: number): BigNumber {
    return BigNumber.from(totalGas).mul(weiFromGwei(gasPriceGwei));
}

export function computeCost(
    profile: RollupProfile,
    txCount: number,
    batchSize: number,
    gasPriceGwei: number
): CostSummary {
    if (txCount <= 0) {
        throw new InvalidInputError('tx_count must be positive.');
    }
    if (batchSize <= 0) {
        throw new InvalidInputError('batch_size must be positive.');
    }

    const batches = Math.ceil(txCount / batchSize);

    const totalProofGas = batches * profile.proofGas;
    const totalOverheadGas = batches * profile.overheadGasPerBatch;
    const totalCalldataGas = txCount * profile.calldataGasPerTx;
    const totalGas = totalProofGas + totalOverheadGas + totalCalldataGas;
    if (!Number.isSafeInteger(totalGas)) {
        throw new InvalidInputError('total gas does not fit in a safe integer.');
    }

    const totalFeeEth = ethFromWei(feeWei(totalGas, gasPriceGwei));

    return {
        profile: profile.key,
        profileName: profile.name,
        description: profile.description,
        txCount,
        batchSize,
        batches,
        gasPriceGwei,
        proofGasPerBatch: profile.proofGas,
        calldataGasPerTx: profile.calldataGasPerTx,
        overheadGasPerBatch: profile.overheadGasPerBatch,
        totalProofGas,
        totalOverheadGas,
        totalCalldataGas,
        totalGas,
        perTxGas: totalGas / txCount,
        totalFeeEth,
        perTxFeeEth: totalFeeEth / txCount
    };
}
