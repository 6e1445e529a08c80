#!/usr/bin/env node
import { Command, program } from 'commander';
import * as dotenv from 'dotenv';
import { batchAction } from './commands/batch.js';
import { discoverAction } from './commands/discover.js';
import { parseNonNegativeInt, parsePositiveInt } from './commands/run.js';

dotenv.config();

function withDiscoveryOptions(command: Command): Command {
    return command
        .option('--output-dir <path>', 'Output directory', process.env.JOBTRAIL_OUTPUT_DIR ?? './output')
        .option('--config <file>', 'Discovery config JSON file', process.env.JOBTRAIL_CONFIG)
        .option('--concurrency <number>', 'Number of sites discovered in parallel', parsePositiveInt, 1)
        .option('--max-hops <number>', 'Maximum successful navigations per site', parsePositiveInt)
        .option('--max-scroll <pixels>', 'Deepest scroll offset per page', parseNonNegativeInt)
        .option('--step-size <pixels>', 'Scroll step between viewports', parsePositiveInt)
        .option('--click-retries <number>', 'Extra candidates tried per page', parseNonNegativeInt)
        .option('--timeout <seconds>', 'Wall-clock budget per site', parsePositiveInt)
        .option('--headless', 'Run in headless mode', true)
        .option('--no-headless', 'Run in visible mode')
        .option('--quiet', 'Suppress progress logs', false);
}

program
    .name('jobtrail')
    .description('Find the path from a company homepage to its job listings')
    .version('0.1.0');

withDiscoveryOptions(
    program
        .command('discover <url>')
        .description('Run one discovery attempt from a start URL')
).action(discoverAction);

withDiscoveryOptions(
    program
        .command('batch <file>')
        .description('Run discovery for every start URL in a file (one per line, # comments)')
).action(batchAction);

program.parseAsync().catch((e: unknown) => {
    console.error('[JobTrail] Fatal:', e);
    process.exitCode = 1;
});
