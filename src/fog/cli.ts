#!/usr/bin/env npx tsx
/**
 * @module fog/cli
 * @description Command-line interface for the secure fog simulation
 *
 * Usage:
 *   npx tsx src/fog/cli.ts
 *   npx tsx src/fog/cli.ts --seed 123 --duration 2000 --out logs/run.json
 *   npm run simulate
 */

import { wrapError } from '../core/errors';
import { ConsoleLogger } from '../core/logging';
import { DEFAULT_FOG_CONFIG } from './config';
import { DEFAULT_LOG_FILE, saveEventLog } from './persistence';
import { runFogSimulation } from './simulation';

// ==================== Argument Parsing ====================

export interface CliArgs {
    seed: number;
    duration: number;
    out: string;
    quiet: boolean;
    help: boolean;
}

function parseNumber(value: string | undefined, fallback: number): number {
    const parsed = Number(value);
    return value !== undefined && Number.isFinite(parsed) ? parsed : fallback;
}

export function parseArgs(argv: readonly string[]): CliArgs {
    const args: CliArgs = {
        seed: DEFAULT_FOG_CONFIG.seed,
        duration: DEFAULT_FOG_CONFIG.duration,
        out: DEFAULT_LOG_FILE,
        quiet: false,
        help: false,
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (arg === '--help' || arg === '-h') {
            args.help = true;
        } else if (arg === '--seed' || arg === '-s') {
            args.seed = parseNumber(argv[++i], args.seed);
        } else if (arg === '--duration' || arg === '-d') {
            args.duration = parseNumber(argv[++i], args.duration);
        } else if (arg === '--out' || arg === '-o') {
            args.out = argv[++i] ?? args.out;
        } else if (arg === '--quiet' || arg === '-q') {
            args.quiet = true;
        }
    }

    return args;
}

function printHelp(): void {
    console.log(`
fogsim - Secure fog network simulation

Usage:
  npx tsx src/fog/cli.ts [options]

Options:
  -h, --help         Show this help message
  -s, --seed N       Random seed (default: ${DEFAULT_FOG_CONFIG.seed})
  -d, --duration T   Simulated time units (default: ${DEFAULT_FOG_CONFIG.duration})
  -o, --out FILE     Event log output (default: ${DEFAULT_LOG_FILE})
  -q, --quiet        Only print warnings and errors

Examples:
  npx tsx src/fog/cli.ts
  npx tsx src/fog/cli.ts --seed 123 --duration 2000 --out logs/run.json
`);
}

// ==================== Main ====================

/**
 * Run the CLI and return the process exit code
 */
export function main(argv: readonly string[]): number {
    const args = parseArgs(argv);

    if (args.help) {
        printHelp();
        return 0;
    }

    const logger = new ConsoleLogger({
        task: 'secure-fog',
        seed: args.seed,
        level: args.quiet ? 'warn' : 'info',
    });

    try {
        const result = runFogSimulation({ seed: args.seed, duration: args.duration }, { logger });
        const file = saveEventLog(args.out, result.records);

        console.log('');
        console.log('[OK] Simulation finished');
        console.log(`     Events:       ${result.records.length}`);
        console.log(`     Moves:        ${result.stats.moves} (${result.stats.attackerFlags} flagged)`);
        console.log(`     Rekeys:       ${result.stats.rekeys}`);
        console.log(`     Deliveries:   ${result.stats.traffic.delivered}`);
        console.log(`     Config hash:  ${result.configHash}`);
        console.log(`     Event log:    ${file}`);
        console.log('');
        return 0;
    } catch (error) {
        const failure = wrapError(error);
        console.error('');
        console.error('[FAILED] Simulation failed:');
        console.error(`  [${failure.code}] ${failure.message}`);
        console.error('');
        return 1;
    }
}

// Run if executed directly
if (require.main === module) {
    process.exitCode = main(process.argv.slice(2));
}
