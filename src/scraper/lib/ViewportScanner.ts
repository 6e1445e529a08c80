import type { BoundingBox, ScanEndReason, VisibleElement } from '../../../types/index.js';
import { Renderer } from '../adapters/Renderer.js';
import { RendererTimeoutError, errorMessage, isFatalRendererError, AttemptCancelledError } from '../errors.js';
import { CancelToken } from './CancelToken.js';

export interface ScanOptions {
    maxScroll: number;
    stepSize: number;
    /** Halve the step once the position is in the lower half of the page */
    footerBiased: boolean;
    timeoutMs: number;
    token?: CancelToken;
    log?: (message: string) => void;
}

export interface ScanStep {
    /** Offset the page actually reached, or the requested one when the scroll failed */
    scrollPosition: number;
    /** 1-based */
    viewportNumber: number;
    pageHeight: number;
    elements: VisibleElement[];
    /** Scroll or query failed; elements is empty */
    degraded: boolean;
}

export function isValidBox(bbox: BoundingBox): boolean {
    const { xMin, yMin, xMax, yMax } = bbox;
    return [xMin, yMin, xMax, yMax].every(v => Number.isFinite(v) && v >= 0)
        && xMin < xMax
        && yMin < yMax;
}

/**
 * Lazy scroll schedule over the current page.
 * Each `for await` restarts from offset 0; page height is re-read at every stop.
 * Ends once the bottom of the page is in view or a scroll no longer moves the page.
 */
export class ViewportScanner implements AsyncIterable<ScanStep> {
    private _endReason: ScanEndReason | null = null;
    private readonly log: (message: string) => void;

    constructor(private readonly renderer: Renderer, private readonly options: ScanOptions) {
        this.log = options.log ?? console.log;
    }

    /** Why the last completed sequence stopped, null while one is running */
    get endReason(): ScanEndReason | null {
        return this._endReason;
    }

    async *[Symbol.asyncIterator](): AsyncGenerator<ScanStep, void, undefined> {
        const { maxScroll, stepSize, footerBiased } = this.options;
        this._endReason = null;

        let requested = 0;
        let lastOffset: number | null = null;
        let viewportNumber = 0;
        let knownHeight: number | null = null;

        while (true) {
            const scroll = await this.tryCall(() => this.renderer.scrollTo(requested, this.callOptions()), null, `scroll to ${requested}`);
            if (scroll !== null && lastOffset !== null && scroll.offset <= lastOffset) {
                this._endReason = 'end-of-page';
                return;
            }

            viewportNumber++;
            const position = scroll?.offset ?? requested;
            const height = await this.tryCall(() => this.renderer.currentPageHeight(this.callOptions()), null, 'page height');
            if (height !== null) knownHeight = height;
            const pageHeight = knownHeight ?? 0;

            let elements: VisibleElement[] = [];
            let degraded = scroll === null;
            if (scroll !== null) {
                const queried = await this.tryCall(() => this.renderer.queryVisibleElements(this.callOptions()), null, 'element query');
                if (queried === null) {
                    degraded = true;
                } else {
                    elements = queried.filter(e => e.text.trim().length > 0 && isValidBox(e.bbox));
                }
            }

            if (degraded) {
                this.log(`[ViewportScanner] ⚠️ Degraded step ${viewportNumber} at ${position}px`);
            }

            yield { scrollPosition: position, viewportNumber, pageHeight, elements, degraded };
            lastOffset = position;

            // Bottom of the page is in view
            if (scroll !== null && knownHeight !== null && position + scroll.viewportHeight >= knownHeight) {
                this._endReason = 'end-of-page';
                return;
            }

            const inLowerHalf = knownHeight !== null && position >= knownHeight / 2;
            const step = footerBiased && inLowerHalf ? Math.max(1, Math.floor(stepSize / 2)) : stepSize;
            const next = position + step;

            if (next > maxScroll) {
                this._endReason = 'max-scroll';
                return;
            }
            if (scroll === null && knownHeight !== null && next >= knownHeight) {
                this._endReason = 'end-of-page';
                return;
            }
            requested = next;
        }
    }

    private callOptions() {
        return { timeoutMs: this.options.timeoutMs, token: this.options.token };
    }

    /**
     * Run a renderer call; timeouts and non-fatal errors turn into the fallback value
     */
    private async tryCall<T, F>(call: () => Promise<T>, fallback: F, label: string): Promise<T | F> {
        try {
            return await call();
        } catch (e) {
            if (isFatalRendererError(e) || e instanceof AttemptCancelledError) throw e;
            if (!(e instanceof RendererTimeoutError)) {
                this.log(`[ViewportScanner] ${label} failed: ${errorMessage(e)}`);
            }
            return fallback;
        }
    }
}
