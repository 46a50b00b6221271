#!/usr/bin/env node
/**
 * @module tasks/waypoint-tour/cli
 * @description Command-line interface for the waypoint-tour task
 *
 * Usage:
 *   npx tsx src/tasks/waypoint-tour/cli.ts
 *   npx tsx src/tasks/waypoint-tour/cli.ts --file waypoints.txt --radii 1,2 --closed
 *   npm run task:tour
 */

import * as fs from 'fs';
import { ConsoleLogger, MultiLogger, type Logger } from '../../core/logging';
import { JsonlLogger } from '../../core/logging-node';
import type { OrderingMethod } from '../../models/planning/tour/types';
import type { WaypointTourConfig } from './config';
import { loadWaypointsFile, writeExampleWaypointsFile } from './io';
import { formatSummary } from './report';
import { runWaypointTour } from './task';

// ==================== Argument Parsing ====================

interface CliArgs {
    file: string;
    overrides: Partial<WaypointTourConfig>;
    logDir?: string;
    help: boolean;
}

function parseMethod(value: string | undefined): OrderingMethod {
    if (value === 'auto' || value === 'exact' || value === 'greedy') {
        return value;
    }
    throw new Error(`--method must be auto, exact or greedy, got '${value ?? ''}'`);
}

export function parseArgs(argv: readonly string[]): CliArgs {
    const args: CliArgs = {
        file: 'waypoints.txt',
        overrides: {},
        help: false,
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (arg === '--help' || arg === '-h') {
            args.help = true;
        } else if (arg === '--file' || arg === '-f') {
            args.file = argv[++i] ?? args.file;
        } else if (arg === '--radii' || arg === '-r') {
            args.overrides.radii = (argv[++i] ?? '').split(',').map(Number);
        } else if (arg === '--method' || arg === '-m') {
            args.overrides.method = parseMethod(argv[++i]);
        } else if (arg === '--threshold' || arg === '-t') {
            args.overrides.threshold = Number(argv[++i]);
        } else if (arg === '--closed') {
            args.overrides.closeLoop = true;
        } else if (arg === '--per-radius') {
            args.overrides.orderingRadius = 'per-radius';
        } else if (arg === '--log-dir') {
            args.logDir = argv[++i];
        } else {
            throw new Error(`Unknown option '${arg}'`);
        }
    }

    return args;
}

function printHelp(): void {
    console.log(`
Waypoint Tour - shortest Reeds-Shepp tour through oriented waypoints

Usage:
  npx tsx src/tasks/waypoint-tour/cli.ts [options]

Options:
  -h, --help          Show this help message
  -f, --file PATH     Waypoint file, one x,y,theta_degrees per line (default: waypoints.txt)
  -r, --radii LIST    Comma-separated turning radii (default: 0.5,1,2,3)
  -m, --method NAME   auto | exact | greedy (default: auto)
  -t, --threshold N   Waypoint count from which greedy is used (default: 10)
      --closed        Return to the first waypoint
      --per-radius    Optimize the order separately for each radius
      --log-dir DIR   Also write a JSONL log into DIR

Examples:
  npx tsx src/tasks/waypoint-tour/cli.ts
  npx tsx src/tasks/waypoint-tour/cli.ts --radii 1,2 --method greedy
`);
}

// ==================== Main ====================

function main(): void {
    let logger: Logger | undefined;

    try {
        const args = parseArgs(process.argv.slice(2));

        if (args.help) {
            printHelp();
            process.exit(0);
        }

        if (!fs.existsSync(args.file)) {
            writeExampleWaypointsFile(args.file);
            console.log(`[INFO] ${args.file} not found, wrote example waypoints`);
        }

        const { waypoints, skipped } = loadWaypointsFile(args.file);
        for (const s of skipped) {
            console.warn(`[WARN] Skipping line ${s.line} in ${args.file} (${s.reason}): '${s.content}'`);
        }

        const task = args.overrides.taskName ?? 'waypoint-tour';
        const consoleLogger = new ConsoleLogger('warn');
        logger = args.logDir !== undefined
            ? new MultiLogger([consoleLogger, new JsonlLogger({ task, outputDir: args.logDir })])
            : consoleLogger;

        const result = runWaypointTour(waypoints, args.overrides, logger);

        console.log('');
        console.log(formatSummary(result.report));
        console.log('');
    } catch (error) {
        console.error('');
        console.error('[FAILED] Task failed:');
        console.error(`  ${error instanceof Error ? error.message : String(error)}`);
        console.error('');
        process.exitCode = 1;
    } finally {
        logger?.close();
    }
}

// Run if executed directly
if (require.main === module) {
    main();
}
