import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { loadDefaults } from './config';
import { CUSTOM_PROFILE_KEY } from './constants';
import { computeCost } from './estimate';
import { RollupCostError } from './errors';
import { formatHuman, formatJson, formatProfileList } from './format';
import { PROFILE_KEYS, RollupProfile, customProfile, getProfile, listProfiles } from './profiles';

export interface Output {
    log(text: string): void;
    error(text: string): void;
}

export const consoleOutput: Output = {
    log: (text) => console.log(text),
    error: (text) => console.error(text)
};

interface CliOptions {
    profile: string;
    batchSize: number;
    gasPriceGwei: number;
    proofGas?: number;
    calldataGasPerTx?: number;
    overheadGasPerBatch?: number;
    json?: boolean;
    listProfiles?: boolean;
}

export function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!/^[-+]?\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parsed;
}

export function parseGasPrice(value: string): number {
    const parsed = Number(value);
    if (value.trim() === '' || !Number.isFinite(parsed)) {
        throw new InvalidArgumentError('Not a number.');
    }
    if (parsed < 0) {
        throw new InvalidArgumentError('Gas price must not be negative.');
    }
    return parsed;
}

function resolveProfile(options: CliOptions): RollupProfile {
    if (options.profile === CUSTOM_PROFILE_KEY) {
        return customProfile(options);
    }
    return getProfile(options.profile);
}

export function createProgram(out: Output = consoleOutput, env: NodeJS.ProcessEnv = process.env): Command {
    const defaults = loadDefaults(env);

    return new Command('rollup-cost')
        .description('Offline rollup gas and fee estimator for zk, FHE and soundness-focused rollup designs.')
        .argument('[tx_count]', 'Number of transactions you plan to batch.', parseInteger)
        .addOption(
            new Option('--profile <key>', 'Which profile to use.')
                .choices([...PROFILE_KEYS, CUSTOM_PROFILE_KEY])
                .default(defaults.profile)
        )
        .option('--batch-size <n>', 'Number of transactions per batch.', parseInteger, defaults.batchSize)
        .option('--gas-price-gwei <gwei>', 'Gas price in gwei.', parseGasPrice, defaults.gasPriceGwei)
        .option('--proof-gas <gas>', 'Custom proof gas per batch (required when --profile custom).', parseInteger)
        .option(
            '--calldata-gas-per-tx <gas>',
            'Custom calldata gas per transaction (required when --profile custom).',
            parseInteger
        )
        .option(
            '--overhead-gas-per-batch <gas>',
            'Custom overhead gas per batch (required when --profile custom).',
            parseInteger
        )
        .option('--json', 'Print machine-readable JSON instead of a human summary.')
        .option('--list-profiles', 'List known profiles and exit.')
        .exitOverride()
        .configureOutput({
            writeOut: (text) => out.log(text.replace(/\n$/, '')),
            writeErr: (text) => out.error(text.replace(/\n$/, ''))
        })
        .action((txCount: number | undefined, options: CliOptions, command: Command) => {
            if (options.listProfiles) {
                const profiles = listProfiles();
                out.log(options.json ? formatJson(profiles) : formatProfileList(profiles));
                return;
            }
            if (txCount === undefined) {
                command.error("error: missing required argument 'tx_count'", {
                    exitCode: 1,
                    code: 'rollup-cost.missingArgument'
                });
            }

            const summary = computeCost(resolveProfile(options), txCount, options.batchSize, options.gasPriceGwei);
            out.log(options.json ? formatJson(summary) : formatHuman(summary));
        });
}

/**
 * Runs the profiler against user arguments (without the node and script
 * entries) and returns the process exit code.
 */
export function run(args: string[], out: Output = consoleOutput, env: NodeJS.ProcessEnv = process.env): number {
    try {
        createProgram(out, env).parse(args, { from: 'user' });
        return 0;
    } catch (err) {
        if (err instanceof RollupCostError) {
            out.error(`❌ ${err.message}`);
            return 1;
        }
        if (err instanceof CommanderError) {
            return err.exitCode;
        }
        throw err;
    }
}
