import type { ActionRecord, Candidate, DetectedCandidate, FallbackCandidate, Point } from '../../../types/index.js';
import { Renderer } from '../adapters/Renderer.js';
import { ActivateCommand, ClickCommand, CommandContext, CommandExecutor, NavigateCommand } from '../commands/index.js';
import { NavigationError, RendererTimeoutError, errorMessage, isAbortingError } from '../errors.js';
import { normalizeHost } from '../config/DiscoveryConfig.js';
import { CancelToken } from './CancelToken.js';

export type NavigationMethod = 'click' | 'activate' | 'direct';

export interface NavigationResult {
    success: true;
    newUrl: string;
    methodUsed: NavigationMethod;
    /** More than one distinct URL was observed while the navigation settled */
    redirected: boolean;
}

export type NavigationOutcome =
    | { ok: true; result: NavigationResult }
    | { ok: false; error: NavigationError };

export interface NavigateOptions {
    actionChain: ActionRecord[];
    operationTimeoutMs: number;
    navigationTimeoutMs: number;
    urlPollIntervalMs: number;
    redirectTrapDomains: readonly string[];
    token?: CancelToken;
    now?: () => Date;
    log?: (message: string) => void;
}

export function centerOf(candidate: DetectedCandidate): Point {
    const { xMin, yMin, xMax, yMax } = candidate.bbox;
    return { x: Math.round((xMin + xMax) / 2), y: Math.round((yMin + yMax) / 2) };
}

/** Host of url is a trap domain or one of its subdomains */
export function isRedirectTrap(url: string, trapDomains: readonly string[]): boolean {
    let host: string;
    try {
        host = normalizeHost(new URL(url).hostname);
    } catch {
        return false;
    }
    return trapDomains.some(domain => {
        const trap = normalizeHost(domain);
        return host === trap || host.endsWith(`.${trap}`);
    });
}

/**
 * Activates a chosen candidate and classifies where the browser ended up.
 */
export class Navigator {
    static async navigate(candidate: Candidate, renderer: Renderer, options: NavigateOptions): Promise<NavigationOutcome> {
        const log = options.log ?? console.log;
        const ctx: CommandContext = {
            renderer,
            actionChain: options.actionChain,
            timeoutMs: options.operationTimeoutMs,
            navigationTimeoutMs: options.navigationTimeoutMs,
            urlPollIntervalMs: options.urlPollIntervalMs,
            token: options.token,
            now: options.now ?? (() => new Date()),
            log,
        };

        if (candidate.source === 'fallback') {
            return this.openFallback(candidate, ctx, options.redirectTrapDomains);
        }

        try {
            await renderer.scrollTo(candidate.scrollPosition, { timeoutMs: options.operationTimeoutMs, token: options.token });
        } catch (e) {
            if (isAbortingError(e)) throw e;
            log(`[Navigator] ⚠️ Scroll to ${candidate.scrollPosition}px failed (${errorMessage(e)}), clicking anyway`);
        }

        const point = centerOf(candidate);
        const commands = [
            new ClickCommand(point, { label: candidate.label }),
            new ActivateCommand(point, { label: candidate.label }),
        ];
        const executor = new CommandExecutor(ctx);
        const report = await executor.executeFirstSuccessful(commands);

        if (!report.winner) {
            const newUrl = renderer.currentUrl();
            const dispatched = commands.some(c => c.dispatched);
            const kind = dispatched ? 'timeout' : 'click_failed';
            log(`[Navigator] ❌ "${candidate.label}" ${kind}: ${report.failures.map(f => f.error.message).join('; ')}`);
            return { ok: false, error: new NavigationError(kind, newUrl) };
        }

        const settle = report.winner.settle;
        const newUrl = settle?.finalUrl ?? renderer.currentUrl();
        if (isRedirectTrap(newUrl, options.redirectTrapDomains)) {
            log(`[Navigator] 🪤 "${candidate.label}" landed on redirect trap ${newUrl}`);
            return { ok: false, error: new NavigationError('redirect_unexpected', newUrl) };
        }

        return {
            ok: true,
            result: {
                success: true,
                newUrl,
                methodUsed: report.winner.type,
                redirected: (settle?.observed.length ?? 0) > 1,
            },
        };
    }

    private static async openFallback(
        candidate: FallbackCandidate,
        ctx: CommandContext,
        trapDomains: readonly string[]
    ): Promise<NavigationOutcome> {
        const executor = new CommandExecutor(ctx);
        try {
            await executor.execute(new NavigateCommand(candidate.targetUrl, { label: candidate.label }));
        } catch (e) {
            if (isAbortingError(e)) throw e;
            const kind = e instanceof RendererTimeoutError ? 'timeout' : 'click_failed';
            ctx.log?.(`[Navigator] ❌ Fallback ${candidate.targetUrl} ${kind}: ${errorMessage(e)}`);
            return { ok: false, error: new NavigationError(kind, ctx.renderer.currentUrl()) };
        }

        const newUrl = ctx.renderer.currentUrl();
        if (isRedirectTrap(newUrl, trapDomains)) {
            return { ok: false, error: new NavigationError('redirect_unexpected', newUrl) };
        }
        return {
            ok: true,
            result: {
                success: true,
                newUrl,
                methodUsed: 'direct',
                redirected: !sameUrl(newUrl, candidate.targetUrl),
            },
        };
    }
}

function sameUrl(a: string, b: string): boolean {
    const strip = (url: string) => url.replace(/\/+$/, '');
    return strip(a) === strip(b);
}
