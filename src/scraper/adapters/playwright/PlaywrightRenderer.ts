import { errors } from 'playwright';
import type { Point, VisibleElement } from '../../../../types/index.js';
import { BrowserPage, PageArgs } from '../BrowserPage.js';
import { Renderer, RendererCallOptions, ScrollState } from '../Renderer.js';
import { AttemptCancelledError, FatalRendererError, RendererTimeoutError, errorMessage, isFatalRendererError } from '../../errors.js';
import { withTimeout } from '../../lib/withTimeout.js';
import { KEYWORDS, LIMITS, SELECTORS, TIMING } from '../../config/constants.js';
import { ErrorHandler, ErrorSeverity } from '../../../shared/utils/index.js';

const FATAL_MESSAGE = /Target (page, context or browser )?(has been )?closed|Page crashed|Browser has been closed/i;

/** The page navigated while a function was evaluated in it */
const CONTEXT_DESTROYED = /Execution context was destroyed/i;

/** Raw element tuple returned from the page: text, xMin, yMin, xMax, yMax, tag, href, role */
type RawElement = [string, number, number, number, number, string, string, string];

export interface PlaywrightRendererOptions {
    scrollSettleMs?: number;
    renderSettleMs?: number;
    log?: (message: string) => void;
}

/**
 * Renderer on top of the BrowserPage adapter.
 * Crashes and closed targets surface as FatalRendererError.
 * A link that opens a new tab moves the renderer to that tab; the old one is closed.
 */
export class PlaywrightRenderer implements Renderer {
    private readonly scrollSettleMs: number;
    private readonly renderSettleMs: number;
    private readonly log: (message: string) => void;
    private page: BrowserPage;
    private popups: BrowserPage[] = [];
    private stopWatchingPopups: () => void;

    constructor(page: BrowserPage, options: PlaywrightRendererOptions = {}) {
        this.page = page;
        this.scrollSettleMs = options.scrollSettleMs ?? TIMING.SCROLL_SETTLE_DELAY;
        this.renderSettleMs = options.renderSettleMs ?? TIMING.RENDER_SETTLE_DELAY;
        this.log = options.log ?? console.log;
        this.stopWatchingPopups = this.watchPopups();
    }

    async render(url: string, options: RendererCallOptions): Promise<void> {
        await this.guard(async () => {
            await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: options.timeoutMs });
            await this.page.waitForLoadState('load', { timeout: options.timeoutMs }).catch((e: unknown) => {
                if (this.isFatal(e)) throw e;
                this.log(`[PlaywrightRenderer] ⚠️ load event not reached for ${url}, continuing`);
            });
            await this.page.waitForTimeout(this.renderSettleMs);
        }, `render ${url}`, options);
    }

    /** The browser clamps the offset; the state reports where the page really is */
    async scrollTo(offset: number, options: RendererCallOptions): Promise<ScrollState> {
        return await this.guard(async () => {
            await this.page.evaluate(({ numbers: [y] }) => {
                window.scrollTo(0, y);
            }, { numbers: [offset], text: '' });
            await this.page.waitForTimeout(this.scrollSettleMs);
            return await this.page.evaluate(() => ({
                offset: Math.round(window.scrollY),
                viewportHeight: window.innerHeight,
            }));
        }, `scrollTo ${offset}`, options);
    }

    async currentPageHeight(options: RendererCallOptions): Promise<number> {
        return await this.guard(
            () => this.page.evaluate(() => Math.max(
                document.body ? document.body.scrollHeight : 0,
                document.documentElement.scrollHeight
            )),
            'currentPageHeight',
            options
        );
    }

    async queryVisibleElements(options: RendererCallOptions): Promise<VisibleElement[]> {
        const raw = await this.guard(
            () => this.page.evaluate(collectVisibleElements, {
                numbers: [LIMITS.ELEMENT_TEXT_MAX_LENGTH],
                text: SELECTORS.VISIBLE_ELEMENTS.join(', '),
            }),
            'queryVisibleElements',
            options
        );
        return raw.map(([text, xMin, yMin, xMax, yMax, tag, href, role]) => ({
            text,
            bbox: { xMin, yMin, xMax, yMax },
            tag,
            href: href || null,
            role: role || null,
        }));
    }

    async click(point: Point, options: RendererCallOptions): Promise<boolean> {
        return await this.guard(async () => {
            try {
                await this.page.mouseClick(point.x, point.y);
                return true;
            } catch (e) {
                if (this.isFatal(e)) throw e;
                this.log(`[PlaywrightRenderer] ⚠️ mouse click at (${point.x}, ${point.y}) not delivered`);
                return false;
            }
        }, 'click', options);
    }

    /** A navigation that tears down the page mid-call counts as delivered */
    async activate(point: Point, options: RendererCallOptions): Promise<boolean> {
        return await this.guard(async () => {
            try {
                return await this.page.evaluate(({ numbers: [x, y], text: selector }) => {
                    const hit = document.elementFromPoint(x, y);
                    if (!hit) return false;
                    const target = hit.closest(selector) ?? hit;
                    if (!(target instanceof HTMLElement)) return false;
                    target.click();
                    return true;
                }, { numbers: [point.x, point.y], text: SELECTORS.ACTIVATABLE });
            } catch (e) {
                if (this.isFatal(e) || !isContextDestroyed(e)) throw e;
                this.log(`[PlaywrightRenderer] activation at (${point.x}, ${point.y}) started a navigation`);
                return true;
            }
        }, 'activate', options);
    }

    /**
     * Open collapsed header/nav menus, skipping profile and settings toggles
     */
    async expandMenus(options: RendererCallOptions): Promise<number> {
        return await this.guard(async () => {
            const toggles = await this.page.locator(SELECTORS.EXPANDABLE_MENUS.join(', ')).all();
            const excluded = new RegExp(KEYWORDS.EXCLUDED_TOGGLE_KEYWORDS.join('|'), 'i');
            const startUrl = this.page.url();
            let expandedCount = 0;

            for (const toggle of toggles.slice(0, LIMITS.MENU_TOGGLE_SAMPLES)) {
                const label = await toggle.label();
                if (excluded.test(label)) continue;
                if (!(await toggle.isVisible())) continue;

                await toggle.click({ timeout: options.timeoutMs });
                await this.page.waitForTimeout(TIMING.MENU_ANIMATION_DELAY);

                // A toggle that is also a link may navigate; stop expanding there.
                if (this.page.url() !== startUrl) {
                    this.log(`[PlaywrightRenderer] ⚠️ menu toggle "${label}" navigated away`);
                    break;
                }
                expandedCount++;
            }
            return expandedCount;
        }, 'expandMenus', options);
    }

    /** URL of the newest tab opened by the page, else of the current tab */
    currentUrl(): string {
        const popup = this.popups[this.popups.length - 1];
        return (popup ?? this.page).url();
    }

    async wait(ms: number): Promise<void> {
        await this.adoptPopup(TIMING.OPERATION_TIMEOUT);
        await this.page.waitForTimeout(ms);
    }

    private watchPopups(): () => void {
        return this.page.onPopup(popup => {
            this.log(`[PlaywrightRenderer] 🪟 New tab opened: ${popup.url()}`);
            this.popups.push(popup);
        });
    }

    /**
     * Continue in the newest pending tab and close the one left behind
     */
    private async adoptPopup(timeoutMs: number): Promise<void> {
        const popup = this.popups[this.popups.length - 1];
        if (!popup) return;

        const previous = this.page;
        const skipped = this.popups.slice(0, -1);
        this.popups = [];
        this.stopWatchingPopups();
        this.page = popup;
        this.stopWatchingPopups = this.watchPopups();

        await popup.waitForLoadState('domcontentloaded', { timeout: timeoutMs }).catch((e: unknown) => {
            if (this.isFatal(e)) throw new FatalRendererError(`new tab: ${errorMessage(e)}`, e);
            this.log(`[PlaywrightRenderer] ⚠️ new tab did not finish loading: ${errorMessage(e)}`);
        });
        for (const tab of [previous, ...skipped]) {
            await ErrorHandler.safeExecute(
                () => tab.close(),
                { component: 'PlaywrightRenderer', operation: 'closeTab' },
                undefined,
                ErrorSeverity.WARNING
            );
        }
        this.log(`[PlaywrightRenderer] Moved to new tab ${popup.url()}`);
    }

    private isFatal(e: unknown): boolean {
        if (isFatalRendererError(e)) return true;
        if (this.page.isClosed()) return true;
        return e instanceof Error && FATAL_MESSAGE.test(e.message);
    }

    private async guard<T>(operation: () => Promise<T>, label: string, options: RendererCallOptions): Promise<T> {
        const run = async (): Promise<T> => {
            await this.adoptPopup(options.timeoutMs);
            return await operation();
        };
        try {
            return await withTimeout(run(), options.timeoutMs, label, options.token);
        } catch (e) {
            if (e instanceof AttemptCancelledError || e instanceof RendererTimeoutError) throw e;
            if (this.isFatal(e)) {
                throw e instanceof FatalRendererError
                    ? e
                    : new FatalRendererError(`${label}: ${e instanceof Error ? e.message : String(e)}`, e);
            }
            if (e instanceof errors.TimeoutError) {
                throw new RendererTimeoutError(label, options.timeoutMs);
            }
            throw e;
        }
    }
}

function isContextDestroyed(e: unknown): boolean {
    return e instanceof Error && CONTEXT_DESTROYED.test(e.message);
}

/**
 * Runs inside the page. Keeps elements at least partially in the viewport and clamps their boxes.
 */
function collectVisibleElements({ numbers: [maxLength], text: selector }: PageArgs): RawElement[] {
    const width = window.innerWidth;
    const height = window.innerHeight;
    const result: RawElement[] = [];

    for (const el of Array.from(document.querySelectorAll(selector))) {
        if (!(el instanceof HTMLElement)) continue;
        const style = window.getComputedStyle(el);
        if (style.visibility === 'hidden' || style.display === 'none') continue;

        const rect = el.getBoundingClientRect();
        const xMin = Math.max(0, rect.left);
        const yMin = Math.max(0, rect.top);
        const xMax = Math.min(width, rect.right);
        const yMax = Math.min(height, rect.bottom);
        if (xMax <= xMin || yMax <= yMin) continue;

        const text = (el.innerText || el.getAttribute('aria-label') || '').replace(/\s+/g, ' ').trim();
        if (!text || text.length > maxLength) continue;

        const href = el instanceof HTMLAnchorElement ? el.href : '';
        const role = el.getAttribute('role') ?? '';
        result.push([text, Math.round(xMin), Math.round(yMin), Math.round(xMax), Math.round(yMax), el.tagName.toLowerCase(), href, role]);
    }
    return result;
}
