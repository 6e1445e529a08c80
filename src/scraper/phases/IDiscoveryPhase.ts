import type { TerminalState } from '../../../types/index.js';
import type { NavigationErrorKind } from '../errors.js';
import { DiscoveryContext } from './DiscoveryContext.js';

export type ActiveState = 'Start' | 'Scanning' | 'CandidatesFound' | 'Navigating' | 'ScanningNextPage';

export type DiscoveryState = ActiveState | TerminalState;

export type BudgetKind = 'attempt-timeout' | 'step-limit';

/**
 * What a phase observed. The transition function turns it into the next state.
 */
export type DiscoveryEvent =
    | { type: 'START_RENDERED' }
    | { type: 'START_TRAPPED'; url: string }
    | { type: 'STEP_EMPTY' }
    | { type: 'CANDIDATES_DETECTED'; count: number }
    | { type: 'SCAN_EXHAUSTED' }
    | { type: 'CANDIDATE_SELECTED' }
    | { type: 'NOTHING_TO_TRY' }
    | { type: 'NAVIGATION_SUCCEEDED'; url: string }
    | { type: 'NAVIGATION_FAILED'; kind: NavigationErrorKind | 'already_visited'; url: string }
    | { type: 'LISTING_REACHED' }
    | { type: 'NOT_LISTING' }
    | { type: 'FATAL'; message: string }
    | { type: 'CANCELLED' }
    | { type: 'BUDGET_EXCEEDED'; budget: BudgetKind };

/**
 * Interface for all discovery phases (Strategy Pattern). One phase per active state.
 */
export interface IDiscoveryPhase {
    readonly name: ActiveState;
    execute(context: DiscoveryContext): Promise<DiscoveryEvent>;
}

export function isTerminal(state: DiscoveryState): state is TerminalState {
    return state === 'JobListingReached' || state === 'Exhausted' || state === 'Failed' || state === 'Cancelled';
}
