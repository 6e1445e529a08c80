import { chromium, Browser } from 'playwright';
import * as path from 'path';
import type { DiscoveryAttempt } from '../../types/index.js';
import type { DiscoveryJob, RunnerConfig, RunSummary, SiteSummary } from '../shared/types.js';
import { EventBus } from '../shared/events/EventBus.js';
import { ErrorHandler, ErrorSeverity, FileSystemHelper } from '../shared/utils/index.js';
import { Renderer } from './adapters/Renderer.js';
import { PlaywrightPage } from './adapters/playwright/PlaywrightPage.js';
import { PlaywrightRenderer } from './adapters/playwright/PlaywrightRenderer.js';
import type { DiscoveryConfig } from './config/DiscoveryConfig.js';
import { CancelToken } from './lib/CancelToken.js';
import { DiscoveryStateMachine } from './phases/DiscoveryStateMachine.js';
import { QueueManager } from './queue/QueueManager.js';
import { TrainingRecordSubscriber } from './subscribers/TrainingRecordSubscriber.js';

export interface RendererSession {
    renderer: Renderer;
    close(): Promise<void>;
}

/** Opens an isolated renderer for one attempt */
export type RendererFactory = () => Promise<RendererSession>;

const DEFAULT_VIEWPORT = { width: 1280, height: 800 };

export class Runner {
    private browser: Browser | null = null;
    private isRunning = false;
    private stopped = false;
    private readonly activeTokens = new Set<CancelToken>();
    private readonly usedAttemptFiles = new Set<string>();
    private readonly sites = new Map<number, SiteSummary>();

    // Components
    readonly eventBus = new EventBus();
    private queueManager: QueueManager;

    constructor(
        private config: RunnerConfig,
        private discoveryConfig: DiscoveryConfig,
        private rendererFactory?: RendererFactory,
        private clock: () => Date = () => new Date()
    ) {
        this.queueManager = new QueueManager((msg) => this.log(msg));
    }

    private log(message: string, ...args: unknown[]) {
        if (!this.config.quiet) {
            console.log(message, ...args);
        }
    }

    /**
     * Run one attempt per start URL with `concurrency` workers and write the outputs.
     */
    async run(urls: readonly string[]): Promise<RunSummary> {
        if (this.isRunning) {
            throw new Error('Runner is already running');
        }
        this.isRunning = true;
        const startedAt = this.clock();

        this.queueManager.addJobs(urls);
        const total = this.queueManager.getQueueLength();
        this.log(`[Runner] Starting discovery on ${total} site(s) (Concurrency: ${this.config.concurrency})`);

        FileSystemHelper.ensureDir(this.config.outputDir);
        const subscriber = new TrainingRecordSubscriber(
            this.eventBus,
            path.join(this.config.outputDir, 'training_records.jsonl')
        );

        try {
            const workerCount = Math.max(1, Math.min(this.config.concurrency, total));
            const workers = Array.from({ length: workerCount }, (_, i) => this.worker(i + 1));
            await Promise.all(workers);
        } finally {
            subscriber.detach();
            await this.closeBrowser();
            this.isRunning = false;
        }

        const summary = this.buildSummary(startedAt);
        FileSystemHelper.safeWriteJSON(path.join(this.config.outputDir, 'summary.json'), summary);
        this.log(`[Runner] ✅ Done: ${summary.totals.success} success, ${summary.totals.partial} partial, ${summary.totals.failed} failed, ${subscriber.count} record(s) written`);
        return summary;
    }

    /**
     * Cancel every running attempt; queued sites are not started.
     */
    stop(): void {
        this.stopped = true;
        for (const token of this.activeTokens) {
            token.cancel();
        }
    }

    private async worker(workerId: number): Promise<void> {
        let job: DiscoveryJob | undefined;
        while (!this.stopped && (job = this.queueManager.getNextJob())) {
            this.log(`[Runner] [Worker ${workerId}] ${job.index + 1}/${this.queueManager.getTotalCount()} ${job.url}`);
            const attempt = await this.runAttempt(job);
            this.sites.set(job.index, this.recordAttempt(attempt));
        }
    }

    private async runAttempt(job: DiscoveryJob): Promise<DiscoveryAttempt> {
        const token = new CancelToken();
        this.activeTokens.add(token);
        const startedAt = this.clock().toISOString();
        let session: RendererSession | null = null;

        try {
            session = await (this.rendererFactory ?? (() => this.openPlaywrightSession()))();
            const machine = new DiscoveryStateMachine({
                renderer: session.renderer,
                config: this.discoveryConfig,
                token,
                eventBus: this.eventBus,
                clock: this.clock,
                log: (msg) => this.log(msg),
            });
            return await machine.run(job.url);
        } catch (e) {
            const info = ErrorHandler.handle(e, { component: 'Runner', operation: 'runAttempt', data: { url: job.url } }, ErrorSeverity.ERROR);
            return {
                startUrl: job.url,
                visited: [],
                outcome: 'failed',
                hopCount: 0,
                terminalState: 'Failed',
                terminationReason: 'browser-error',
                records: [],
                navigationPath: [],
                startedAt,
                finishedAt: this.clock().toISOString(),
                error: info.message,
            };
        } finally {
            this.activeTokens.delete(token);
            const opened = session;
            if (opened) {
                await ErrorHandler.safeExecute(() => opened.close(), { component: 'Runner', operation: 'closeSession' }, undefined, ErrorSeverity.WARNING);
            }
        }
    }

    private async openPlaywrightSession(): Promise<RendererSession> {
        if (!this.browser) {
            this.log('[Runner] Launching browser...');
            this.browser = await chromium.launch({ headless: this.config.headless });
        }
        const context = await this.browser.newContext({ viewport: this.config.viewport ?? DEFAULT_VIEWPORT });
        const page = await context.newPage();
        return {
            renderer: new PlaywrightRenderer(new PlaywrightPage(page), { log: (msg) => this.log(msg) }),
            close: () => context.close(),
        };
    }

    private async closeBrowser(): Promise<void> {
        if (!this.browser) return;
        const browser = this.browser;
        this.browser = null;
        await ErrorHandler.safeExecute(() => browser.close(), { component: 'Runner', operation: 'closeBrowser' }, undefined, ErrorSeverity.WARNING);
    }

    private recordAttempt(attempt: DiscoveryAttempt): SiteSummary {
        const attemptFile = this.attemptFileFor(attempt.startUrl);
        if (!FileSystemHelper.safeWriteJSON(attemptFile, attempt)) {
            console.warn(`[Runner] Could not write ${attemptFile}`);
        }

        const site: SiteSummary = {
            startUrl: attempt.startUrl,
            outcome: attempt.outcome,
            terminalState: attempt.terminalState,
            terminationReason: attempt.terminationReason,
            hopCount: attempt.hopCount,
            recordCount: attempt.records.length,
            pages: attempt.visited.map(v => v.url),
            clicks: attempt.navigationPath.map(a => a.label),
            attemptFile: path.relative(this.config.outputDir, attemptFile),
        };
        if (attempt.error !== undefined) site.error = attempt.error;
        return site;
    }

    private attemptFileFor(url: string): string {
        const slug = FileSystemHelper.hostSlug(url);
        let name = slug;
        for (let n = 2; this.usedAttemptFiles.has(name); n++) {
            name = `${slug}-${n}`;
        }
        this.usedAttemptFiles.add(name);
        return path.join(this.config.outputDir, 'attempts', `${name}.json`);
    }

    private buildSummary(startedAt: Date): RunSummary {
        const sites = [...this.sites.entries()]
            .sort(([a], [b]) => a - b)
            .map(([, site]) => site);
        return {
            startedAt: startedAt.toISOString(),
            finishedAt: this.clock().toISOString(),
            totals: {
                sites: sites.length,
                success: sites.filter(s => s.outcome === 'success').length,
                partial: sites.filter(s => s.outcome === 'partial').length,
                failed: sites.filter(s => s.outcome === 'failed').length,
                records: sites.reduce((sum, s) => sum + s.recordCount, 0),
            },
            sites,
        };
    }
}
