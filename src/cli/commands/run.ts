import { InvalidArgumentError } from 'commander';
import { Runner } from '../../scraper/runner.js';
import { buildDiscoveryConfig, ConfigError, DiscoveryConfig } from '../../scraper/config/DiscoveryConfig.js';
import type { RunSummary } from '../../shared/types.js';
import { DiscoverOptions } from '../types.js';

export function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

export function parseNonNegativeInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

/**
 * Layer defaults, the config file and the CLI flags
 */
export function configFromOptions(options: DiscoverOptions): DiscoveryConfig {
    return buildDiscoveryConfig({
        configFile: options.config,
        overrides: {
            maxHops: options.maxHops,
            maxScroll: options.maxScroll,
            stepSize: options.stepSize,
            clickRetries: options.clickRetries,
            attemptTimeoutMs: options.timeout === undefined ? undefined : options.timeout * 1000,
        },
    });
}

/**
 * Run the given start URLs to completion. The first Ctrl+C cancels running attempts
 * and still writes the outputs; a second one exits at once.
 */
export async function runDiscovery(urls: readonly string[], options: DiscoverOptions): Promise<RunSummary | null> {
    let discoveryConfig: DiscoveryConfig;
    try {
        discoveryConfig = configFromOptions(options);
    } catch (e) {
        if (e instanceof ConfigError) {
            console.error(`[JobTrail] ❌ ${e.message}`);
            process.exitCode = 1;
            return null;
        }
        throw e;
    }

    const runner = new Runner(
        {
            outputDir: options.outputDir,
            concurrency: options.concurrency,
            headless: options.headless,
            quiet: options.quiet,
        },
        discoveryConfig
    );

    let interrupted = false;
    const abortHandler = () => {
        if (interrupted) {
            process.exit(130);
        }
        interrupted = true;
        console.log('\n[JobTrail] Interrupted! Cancelling running attempts and saving results...');
        runner.stop();
    };
    process.on('SIGINT', abortHandler);

    try {
        const summary = await runner.run(urls);
        if (summary.totals.sites === 0) {
            console.error('[JobTrail] ❌ No valid start URLs.');
            process.exitCode = 1;
        }
        return summary;
    } finally {
        process.off('SIGINT', abortHandler);
    }
}
