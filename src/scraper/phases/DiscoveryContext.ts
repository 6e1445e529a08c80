import type {
    ActionRecord,
    Candidate,
    DetectedCandidate,
    EntryMethod,
    FallbackCandidate,
    PageVisit,
} from '../../../types/index.js';
import { Renderer, RendererCallOptions } from '../adapters/Renderer.js';
import type { DiscoveryConfig } from '../config/DiscoveryConfig.js';
import { normalizeHost } from '../config/DiscoveryConfig.js';
import { FatalRendererError, errorMessage, isAbortingError } from '../errors.js';
import { CancelToken } from '../lib/CancelToken.js';
import { CandidateRanker } from '../lib/CandidateRanker.js';
import { ScanStep, ViewportScanner } from '../lib/ViewportScanner.js';
import { normalizeUrl } from '../queue/QueueManager.js';
import { TrainingRecordEmitter } from '../services/TrainingRecordEmitter.js';
import { TransitionFacts } from './transitions.js';

export interface PendingEntry {
    url: string;
    method: EntryMethod;
}

/**
 * DiscoveryContext isolates the state of one attempt.
 * Pages and candidates live in insertion-ordered arrays; links between them are URL strings.
 */
export class DiscoveryContext {
    readonly visited: PageVisit[] = [];
    readonly navigationPath: ActionRecord[] = [];
    readonly fallbackQueue: FallbackCandidate[] = [];
    readonly visitedUrls = new Set<string>();

    currentPage: PageVisit | null = null;
    /** Candidates of the current page that the Navigator may still try */
    pageCandidates: DetectedCandidate[] = [];
    readonly triedCandidates = new Set<Candidate>();
    selected: Candidate | null = null;
    hopCount = 0;

    scanner: ViewportScanner | null = null;
    scanIterator: AsyncIterator<ScanStep> | null = null;
    /** Step already pulled by the listing check, not yet run through detection */
    pendingStep: ScanStep | null = null;
    pendingEntry: PendingEntry | null = null;

    private readonly queuedHosts = new Set<string>();

    constructor(
        readonly startUrl: string,
        readonly renderer: Renderer,
        readonly config: DiscoveryConfig,
        readonly emitter: TrainingRecordEmitter,
        readonly token: CancelToken,
        readonly now: () => Date,
        readonly log: (message: string) => void
    ) { }

    operationOptions(): RendererCallOptions {
        return { timeoutMs: this.config.operationTimeoutMs, token: this.token };
    }

    navigationOptions(): RendererCallOptions {
        return { timeoutMs: this.config.navigationTimeoutMs, token: this.token };
    }

    /**
     * Record a new page and make it current. Per-page state is reset.
     */
    enterPage(url: string, entryMethod: EntryMethod): PageVisit {
        const page: PageVisit = {
            url,
            entryMethod,
            scrollPositionsCovered: [],
            candidatesFound: [],
            attemptedCandidates: 0,
            scanDegraded: false,
            maxScrollReached: false,
            menuExpanded: false,
        };
        this.visited.push(page);
        this.visitedUrls.add(normalizeUrl(url));
        this.currentPage = page;
        this.pageCandidates = [];
        this.resetScan();
        return page;
    }

    requirePage(): PageVisit {
        if (!this.currentPage) {
            throw new Error('No current page');
        }
        return this.currentPage;
    }

    resetScan(): void {
        this.scanner = null;
        this.scanIterator = null;
        this.pendingStep = null;
    }

    /** Start a fresh scan of the current page */
    beginScan(): AsyncIterator<ScanStep> {
        this.scanner = new ViewportScanner(this.renderer, {
            maxScroll: this.config.maxScroll,
            stepSize: this.config.stepSize,
            footerBiased: this.config.footerBiasedScan,
            timeoutMs: this.config.operationTimeoutMs,
            token: this.token,
            log: this.log,
        });
        this.scanIterator = this.scanner[Symbol.asyncIterator]();
        return this.scanIterator;
    }

    /**
     * Fold a scan step into the current page. Coverage only grows.
     */
    recordStep(step: ScanStep): void {
        const page = this.requirePage();
        const covered = page.scrollPositionsCovered;
        if (covered.length === 0 || step.scrollPosition > covered[covered.length - 1]) {
            covered.push(step.scrollPosition);
        }
        if (step.degraded) page.scanDegraded = true;
    }

    /**
     * Render url again unless the renderer is already there. A failed restore is fatal.
     */
    async restorePage(url: string): Promise<void> {
        if (normalizeUrl(this.renderer.currentUrl()) === normalizeUrl(url)) return;

        this.log(`[Discovery] ↩️ Returning to ${url}`);
        try {
            await this.renderer.render(url, this.navigationOptions());
        } catch (e) {
            if (isAbortingError(e)) throw e;
            throw new FatalRendererError(`Could not return to ${url}: ${errorMessage(e)}`, e);
        }
    }

    isVisited(url: string): boolean {
        return this.visitedUrls.has(normalizeUrl(url));
    }

    /**
     * Queue the separate career site of a host, once per host
     */
    queueFallbackFor(url: string): boolean {
        let host: string;
        try {
            host = normalizeHost(new URL(url).hostname);
        } catch {
            return false;
        }
        const target = this.config.careerDomainFallbacks[host];
        if (!target || this.queuedHosts.has(host)) return false;

        this.queuedHosts.add(host);
        const candidate: FallbackCandidate = {
            source: 'fallback',
            label: `${host} careers`,
            targetUrl: target,
            pageUrl: url,
            score: 0,
        };
        this.fallbackQueue.push(Object.freeze(candidate));
        this.log(`[Discovery] 🧭 Queued career site for ${host}: ${target}`);
        return true;
    }

    /** Candidates on this page the Navigator may try next, best first */
    untriedCandidates(): DetectedCandidate[] {
        return CandidateRanker.rank(this.pageCandidates.filter(c => !this.triedCandidates.has(c)));
    }

    get attemptBudget(): number {
        return 1 + this.config.clickRetries;
    }

    hasRetryableCandidate(): boolean {
        const page = this.currentPage;
        if (!page) return false;
        return page.attemptedCandidates < this.attemptBudget && this.untriedCandidates().length > 0;
    }

    facts(): TransitionFacts {
        return {
            hopCount: this.hopCount,
            maxHops: this.config.maxHops,
            hasQueuedPage: this.fallbackQueue.length > 0,
            hasRetryableCandidate: this.hasRetryableCandidate(),
        };
    }
}
