import type { AttemptOutcome, TerminalState } from '../../types/index.js';

/** One start URL of a batch */
export interface DiscoveryJob {
    url: string;
    /** Position in the batch, 0-based */
    index: number;
}

export interface RunnerConfig {
    outputDir: string;
    /** Parallel attempts, each in its own browser context */
    concurrency: number;
    headless: boolean;
    /** Suppress informational logs */
    quiet?: boolean;
    viewport?: { width: number; height: number };
}

export interface SiteSummary {
    startUrl: string;
    outcome: AttemptOutcome;
    terminalState: TerminalState;
    terminationReason: string;
    hopCount: number;
    recordCount: number;
    /** URLs of the visited pages, in order */
    pages: string[];
    /** Labels of the executed navigation commands, in order */
    clicks: string[];
    attemptFile: string;
    error?: string;
}

export interface RunSummary {
    startedAt: string;
    finishedAt: string;
    totals: {
        sites: number;
        success: number;
        partial: number;
        failed: number;
        records: number;
    };
    sites: SiteSummary[];
}
