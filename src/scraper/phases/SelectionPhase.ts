import { IDiscoveryPhase, DiscoveryEvent } from './IDiscoveryPhase.js';
import { DiscoveryContext } from './DiscoveryContext.js';

/**
 * Picks the best untried candidate of the current page, then a queued career site.
 */
export class SelectionPhase implements IDiscoveryPhase {
    readonly name = 'CandidatesFound';

    async execute(context: DiscoveryContext): Promise<DiscoveryEvent> {
        const page = context.requirePage();

        if (page.attemptedCandidates < context.attemptBudget) {
            const [best] = context.untriedCandidates();
            if (best) {
                context.selected = best;
                context.log(`[SelectionPhase] 👉 "${best.label}" (score ${best.score.toFixed(2)}, ${best.scrollPosition}px)`);
                return { type: 'CANDIDATE_SELECTED' };
            }
        }

        const fallback = context.fallbackQueue.shift();
        if (fallback) {
            context.selected = fallback;
            context.log(`[SelectionPhase] 👉 Career site ${fallback.targetUrl}`);
            return { type: 'CANDIDATE_SELECTED' };
        }

        context.selected = null;
        return { type: 'NOTHING_TO_TRY' };
    }
}
