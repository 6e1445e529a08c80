import { describe, it, expect } from 'vitest';
import { transition, TransitionFacts } from '../../scraper/phases/transitions.js';
import { isTerminal } from '../../scraper/phases/IDiscoveryPhase.js';

const facts: TransitionFacts = { hopCount: 0, maxHops: 4, hasQueuedPage: false, hasRetryableCandidate: false };

describe('transition', () => {
    it('should move from Start to Scanning once the start page rendered', () => {
        expect(transition('Start', { type: 'START_RENDERED' }, facts)).toEqual({ next: 'Scanning' });
    });

    it('should end a trapped start without a queued career site', () => {
        const event = { type: 'START_TRAPPED', url: 'https://accounts.google.com/' } as const;

        expect(transition('Start', event, facts)).toEqual({ next: 'Exhausted', reason: 'redirect-trap' });
        expect(transition('Start', event, { ...facts, hasQueuedPage: true })).toEqual({ next: 'CandidatesFound' });
    });

    it('should keep scanning on an empty step', () => {
        expect(transition('Scanning', { type: 'STEP_EMPTY' }, facts)).toEqual({ next: 'Scanning' });
        expect(transition('Scanning', { type: 'CANDIDATES_DETECTED', count: 2 }, facts)).toEqual({ next: 'CandidatesFound' });
    });

    it('should exhaust a page scan without candidates', () => {
        expect(transition('Scanning', { type: 'SCAN_EXHAUSTED' }, facts)).toEqual({ next: 'Exhausted', reason: 'no-candidates' });
        expect(transition('Scanning', { type: 'SCAN_EXHAUSTED' }, { ...facts, hasQueuedPage: true })).toEqual({ next: 'CandidatesFound' });
    });

    it('should select or give up from CandidatesFound', () => {
        expect(transition('CandidatesFound', { type: 'CANDIDATE_SELECTED' }, facts)).toEqual({ next: 'Navigating' });
        expect(transition('CandidatesFound', { type: 'NOTHING_TO_TRY' }, facts)).toEqual({ next: 'Exhausted', reason: 'candidates-exhausted' });
    });

    it('should enforce the hop budget after a successful navigation', () => {
        const event = { type: 'NAVIGATION_SUCCEEDED', url: 'https://careers.example.com/' } as const;

        expect(transition('Navigating', event, { ...facts, hopCount: 4 })).toEqual({ next: 'ScanningNextPage' });
        expect(transition('Navigating', event, { ...facts, hopCount: 5 })).toEqual({ next: 'Exhausted', reason: 'hop-budget' });
    });

    it('should retry another candidate after a failed navigation', () => {
        const event = { type: 'NAVIGATION_FAILED', kind: 'timeout', url: 'https://www.example.com/' } as const;

        expect(transition('Navigating', event, { ...facts, hasRetryableCandidate: true })).toEqual({ next: 'CandidatesFound' });
        expect(transition('Navigating', event, { ...facts, hasQueuedPage: true })).toEqual({ next: 'CandidatesFound' });
        expect(transition('Navigating', event, facts)).toEqual({ next: 'Exhausted', reason: 'navigation-failed' });
    });

    it('should finish on a listing and continue scanning otherwise', () => {
        expect(transition('ScanningNextPage', { type: 'LISTING_REACHED' }, facts)).toEqual({ next: 'JobListingReached', reason: 'listing-reached' });
        expect(transition('ScanningNextPage', { type: 'NOT_LISTING' }, facts)).toEqual({ next: 'Scanning' });
    });

    it('should handle fatal errors, cancellation and budgets from any active state', () => {
        expect(transition('Navigating', { type: 'FATAL', message: 'crash' }, facts)).toEqual({ next: 'Failed', reason: 'fatal-error' });
        expect(transition('Scanning', { type: 'CANCELLED' }, facts)).toEqual({ next: 'Cancelled', reason: 'cancelled' });
        expect(transition('Start', { type: 'BUDGET_EXCEEDED', budget: 'attempt-timeout' }, facts)).toEqual({ next: 'Exhausted', reason: 'attempt-timeout' });
    });

    it('should fail on an event the state does not accept', () => {
        expect(transition('Start', { type: 'LISTING_REACHED' }, facts)).toEqual({
            next: 'Failed',
            reason: 'invalid-transition:Start:LISTING_REACHED',
        });
    });

    it('should never leave a terminal state', () => {
        expect(transition('JobListingReached', { type: 'FATAL', message: 'late' }, facts)).toEqual({ next: 'JobListingReached' });
        expect(isTerminal('Exhausted')).toBe(true);
        expect(isTerminal('Navigating')).toBe(false);
    });
});
