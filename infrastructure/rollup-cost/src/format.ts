import { CostSummary } from './estimate';
import { RollupProfile } from './profiles';

export function formatHuman(summary: CostSummary): string {
    return [
        '🔍 Rollup cost estimate',
        `Profile      : ${summary.profileName} (${summary.profile})`,
        `Description  : ${summary.description}`,
        '',
        `Transactions : ${summary.txCount}`,
        `Batch size   : ${summary.batchSize}`,
        `Batches      : ${summary.batches}`,
        `Gas price    : ${summary.gasPriceGwei.toFixed(2)} gwei`,
        '',
        'Gas breakdown (units of gas):',
        `  Proof gas per batch      : ${summary.proofGasPerBatch}`,
        `  Overhead gas per batch   : ${summary.overheadGasPerBatch}`,
        `  Calldata gas per tx      : ${summary.calldataGasPerTx}`,
        '',
        `  Total proof gas          : ${summary.totalProofGas}`,
        `  Total overhead gas       : ${summary.totalOverheadGas}`,
        `  Total calldata gas       : ${summary.totalCalldataGas}`,
        `  Total gas                : ${summary.totalGas}`,
        '',
        'Cost estimate:',
        `  Total fee   : ${summary.totalFeeEth.toFixed(6)} ETH`,
        `  Per tx fee  : ${summary.perTxFeeEth.toFixed(8)} ETH`,
        `  Per tx gas  : ${summary.perTxGas.toFixed(2)} gas`
    ].join('\n');
}

// Recursively sorts object keys.
function sortKeys(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(sortKeys);
    }
    if (value !== null && typeof value === 'object') {
        const sorted: Record<string, unknown> = {};
        for (const [key, inner] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
            sorted[key] = sortKeys(inner);
        }
        return sorted;
    }
    return value;
}

export function formatJson(value: CostSummary | readonly RollupProfile[]): string {
    return JSON.stringify(sortKeys(value), null, 2);
}

export function formatProfileList(profiles: readonly RollupProfile[]): string {
    return [
        'Available profiles:',
        ...profiles.map((profile) => `- ${profile.key}: ${profile.name}`),
        '',
        "Use --profile with one of the keys above, or 'custom' to provide your own parameters."
    ].join('\n');
}
