import type { EntryMethod } from '../../../types/index.js';
import { IDiscoveryPhase, DiscoveryEvent } from './IDiscoveryPhase.js';
import { DiscoveryContext } from './DiscoveryContext.js';
import { Navigator } from '../lib/Navigator.js';

/**
 * Activates the selected candidate. On success the current page is left;
 * on failure the page is restored when another of its candidates will be tried.
 */
export class NavigatePhase implements IDiscoveryPhase {
    readonly name = 'Navigating';

    async execute(context: DiscoveryContext): Promise<DiscoveryEvent> {
        const page = context.requirePage();
        const candidate = context.selected;
        if (!candidate) {
            throw new Error('Navigating without a selected candidate');
        }
        context.selected = null;
        context.triedCandidates.add(candidate);
        page.attemptedCandidates++;

        const { config } = context;
        const outcome = await Navigator.navigate(candidate, context.renderer, {
            actionChain: context.navigationPath,
            operationTimeoutMs: config.operationTimeoutMs,
            navigationTimeoutMs: config.navigationTimeoutMs,
            urlPollIntervalMs: config.urlPollIntervalMs,
            redirectTrapDomains: config.redirectTrapDomains,
            token: context.token,
            now: context.now,
            log: context.log,
        });

        if (outcome.ok && !context.isVisited(outcome.result.newUrl)) {
            const { newUrl, methodUsed, redirected } = outcome.result;
            await context.emitter.flush();
            context.hopCount++;

            let method: EntryMethod = 'clicked';
            if (candidate.source === 'fallback') method = 'fallback';
            else if (redirected) method = 'redirected';
            context.pendingEntry = { url: newUrl, method };

            context.log(`[NavigatePhase] ✅ "${candidate.label}" → ${newUrl} (${methodUsed}, hop ${context.hopCount})`);
            return { type: 'NAVIGATION_SUCCEEDED', url: newUrl };
        }

        const failure = outcome.ok
            ? { kind: 'already_visited' as const, url: outcome.result.newUrl }
            : { kind: outcome.error.kind, url: outcome.error.newUrl };
        context.log(`[NavigatePhase] ❌ "${candidate.label}" failed (${failure.kind}) at ${failure.url}`);

        if (context.hasRetryableCandidate()) {
            await context.restorePage(page.url);
        }
        return { type: 'NAVIGATION_FAILED', kind: failure.kind, url: failure.url };
    }
}
