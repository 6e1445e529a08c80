/**
 * CLI Command Types
 *
 * Parsed options shared by `discover` and `batch`.
 */
export interface DiscoverOptions {
    outputDir: string;
    config?: string;
    concurrency: number;
    maxHops?: number;
    maxScroll?: number;
    stepSize?: number;
    clickRetries?: number;
    /** Attempt budget in seconds */
    timeout?: number;
    headless: boolean;
    quiet: boolean;
}
