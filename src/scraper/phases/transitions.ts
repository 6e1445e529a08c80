import { DiscoveryEvent, DiscoveryState, isTerminal } from './IDiscoveryPhase.js';

export interface TransitionFacts {
    hopCount: number;
    maxHops: number;
    /** A fallback career page is waiting to be opened */
    hasQueuedPage: boolean;
    /** The current page has an unattempted candidate and retry budget left */
    hasRetryableCandidate: boolean;
}

export interface Transition {
    next: DiscoveryState;
    /** Set when next is terminal */
    reason?: string;
}

/**
 * Pure state transition of the discovery engine.
 */
export function transition(state: DiscoveryState, event: DiscoveryEvent, facts: TransitionFacts): Transition {
    if (isTerminal(state)) return { next: state };

    switch (event.type) {
        case 'FATAL':
            return { next: 'Failed', reason: 'fatal-error' };
        case 'CANCELLED':
            return { next: 'Cancelled', reason: 'cancelled' };
        case 'BUDGET_EXCEEDED':
            return { next: 'Exhausted', reason: event.budget };
    }

    switch (state) {
        case 'Start':
            if (event.type === 'START_RENDERED') return { next: 'Scanning' };
            if (event.type === 'START_TRAPPED') {
                return facts.hasQueuedPage
                    ? { next: 'CandidatesFound' }
                    : { next: 'Exhausted', reason: 'redirect-trap' };
            }
            break;

        case 'Scanning':
            if (event.type === 'STEP_EMPTY') return { next: 'Scanning' };
            if (event.type === 'CANDIDATES_DETECTED') return { next: 'CandidatesFound' };
            if (event.type === 'SCAN_EXHAUSTED') {
                return facts.hasQueuedPage
                    ? { next: 'CandidatesFound' }
                    : { next: 'Exhausted', reason: 'no-candidates' };
            }
            break;

        case 'CandidatesFound':
            if (event.type === 'CANDIDATE_SELECTED') return { next: 'Navigating' };
            if (event.type === 'NOTHING_TO_TRY') return { next: 'Exhausted', reason: 'candidates-exhausted' };
            break;

        case 'Navigating':
            if (event.type === 'NAVIGATION_SUCCEEDED') {
                return facts.hopCount > facts.maxHops
                    ? { next: 'Exhausted', reason: 'hop-budget' }
                    : { next: 'ScanningNextPage' };
            }
            if (event.type === 'NAVIGATION_FAILED') {
                return facts.hasRetryableCandidate || facts.hasQueuedPage
                    ? { next: 'CandidatesFound' }
                    : { next: 'Exhausted', reason: 'navigation-failed' };
            }
            break;

        case 'ScanningNextPage':
            if (event.type === 'LISTING_REACHED') return { next: 'JobListingReached', reason: 'listing-reached' };
            if (event.type === 'NOT_LISTING') return { next: 'Scanning' };
            break;
    }

    return { next: 'Failed', reason: `invalid-transition:${state}:${event.type}` };
}
