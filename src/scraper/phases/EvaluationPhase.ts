import type { VisibleElement } from '../../../types/index.js';
import { IDiscoveryPhase, DiscoveryEvent } from './IDiscoveryPhase.js';
import { DiscoveryContext } from './DiscoveryContext.js';
import { ListingHeuristic } from '../lib/ListingHeuristic.js';

/**
 * Records the page reached by the last hop and checks whether it lists jobs,
 * using the elements of its first viewport.
 */
export class EvaluationPhase implements IDiscoveryPhase {
    readonly name = 'ScanningNextPage';

    async execute(context: DiscoveryContext): Promise<DiscoveryEvent> {
        const entry = context.pendingEntry;
        if (!entry) {
            throw new Error('No page to evaluate');
        }
        context.pendingEntry = null;

        const page = context.enterPage(entry.url, entry.method);
        const first = await context.beginScan().next();

        let elements: VisibleElement[] = [];
        if (!first.done) {
            context.recordStep(first.value);
            context.pendingStep = first.value;
            elements = first.value.elements;
        }

        const evidence = ListingHeuristic.evaluate(page.url, elements, context.config);
        page.listing = evidence;
        context.log(`[EvaluationPhase] ${evidence.satisfied ? '🏁' : '🔎'} ${page.url}: url match ${evidence.urlMatched}, ${evidence.postingCount} posting(s)`);

        return evidence.satisfied ? { type: 'LISTING_REACHED' } : { type: 'NOT_LISTING' };
    }
}
