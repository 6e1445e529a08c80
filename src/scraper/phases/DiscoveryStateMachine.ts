import type { AttemptOutcome, DiscoveryAttempt, TerminalState } from '../../../types/index.js';
import { Renderer } from '../adapters/Renderer.js';
import type { DiscoveryConfig } from '../config/DiscoveryConfig.js';
import { LIMITS } from '../config/constants.js';
import { AttemptCancelledError, errorMessage } from '../errors.js';
import { CancelToken } from '../lib/CancelToken.js';
import { TrainingRecordEmitter } from '../services/TrainingRecordEmitter.js';
import { EventBus } from '../../shared/events/EventBus.js';
import { DiscoveryContext } from './DiscoveryContext.js';
import { ActiveState, DiscoveryEvent, DiscoveryState, IDiscoveryPhase, isTerminal } from './IDiscoveryPhase.js';
import { StartPhase } from './StartPhase.js';
import { ScanPhase } from './ScanPhase.js';
import { SelectionPhase } from './SelectionPhase.js';
import { NavigatePhase } from './NavigatePhase.js';
import { EvaluationPhase } from './EvaluationPhase.js';
import { transition } from './transitions.js';

export interface DiscoveryEngineOptions {
    renderer: Renderer;
    config: DiscoveryConfig;
    token?: CancelToken;
    eventBus?: EventBus;
    /** Wall clock for timestamps and the attempt budget */
    clock?: () => Date;
    log?: (message: string) => void;
    maxSteps?: number;
}

export function outcomeFor(state: TerminalState, recordCount: number): AttemptOutcome {
    switch (state) {
        case 'JobListingReached':
            return 'success';
        case 'Failed':
            return 'failed';
        case 'Exhausted':
        case 'Cancelled':
            return recordCount > 0 ? 'partial' : 'failed';
    }
}

/**
 * Drives one discovery attempt from a start URL to a terminal state.
 * Every attempt ends with a DiscoveryAttempt; errors inside phases become Failed or Cancelled.
 */
export class DiscoveryStateMachine {
    private readonly phases: Record<ActiveState, IDiscoveryPhase> = {
        Start: new StartPhase(),
        Scanning: new ScanPhase(),
        CandidatesFound: new SelectionPhase(),
        Navigating: new NavigatePhase(),
        ScanningNextPage: new EvaluationPhase(),
    };
    private readonly clock: () => Date;
    private readonly log: (message: string) => void;
    private readonly token: CancelToken;
    private readonly maxSteps: number;

    constructor(private readonly options: DiscoveryEngineOptions) {
        this.clock = options.clock ?? (() => new Date());
        this.log = options.log ?? console.log;
        this.token = options.token ?? new CancelToken();
        this.maxSteps = options.maxSteps ?? LIMITS.MAX_ENGINE_STEPS;
    }

    async run(startUrl: string): Promise<DiscoveryAttempt> {
        const { renderer, config } = this.options;
        const emitter = new TrainingRecordEmitter(this.options.eventBus ?? null, this.clock);
        const context = new DiscoveryContext(startUrl, renderer, config, emitter, this.token, this.clock, this.log);

        const startedAt = this.clock();
        let state: DiscoveryState = 'Start';
        let reason = '';
        let error: string | undefined;
        let steps = 0;

        this.log(`[Discovery] 🚀 Starting attempt for: ${startUrl}`);

        while (!isTerminal(state)) {
            const event = await this.nextEvent(state, context, startedAt, steps);
            steps++;
            if (event.type === 'FATAL') error = event.message;

            const result = transition(state, event, context.facts());
            if (result.next !== state) {
                this.log(`[Discovery] ${state} --${event.type}--> ${result.next}`);
            }
            state = result.next;
            if (result.reason) reason = result.reason;
        }

        if (state === 'Cancelled') {
            const dropped = emitter.discard();
            if (dropped > 0) this.log(`[Discovery] Discarded ${dropped} staged record(s)`);
        } else {
            await emitter.flush();
        }

        const records = [...emitter.records];
        const attempt: DiscoveryAttempt = {
            startUrl,
            visited: context.visited,
            outcome: outcomeFor(state, records.length),
            hopCount: context.hopCount,
            terminalState: state,
            terminationReason: reason,
            records,
            navigationPath: context.navigationPath,
            startedAt: startedAt.toISOString(),
            finishedAt: this.clock().toISOString(),
        };
        if (error !== undefined) attempt.error = error;

        this.log(`[Discovery] ${state === 'JobListingReached' ? '✅' : '🛑'} ${startUrl}: ${state} (${reason}), ${records.length} record(s), ${context.hopCount} hop(s)`);
        if (this.options.eventBus) {
            await this.options.eventBus.publish('attempt-finished', attempt);
        }
        return attempt;
    }

    private async nextEvent(state: ActiveState, context: DiscoveryContext, startedAt: Date, steps: number): Promise<DiscoveryEvent> {
        if (this.token.canceled) return { type: 'CANCELLED' };
        if (this.clock().getTime() - startedAt.getTime() > this.options.config.attemptTimeoutMs) {
            return { type: 'BUDGET_EXCEEDED', budget: 'attempt-timeout' };
        }
        if (steps >= this.maxSteps) return { type: 'BUDGET_EXCEEDED', budget: 'step-limit' };

        try {
            return await this.phases[state].execute(context);
        } catch (e) {
            if (e instanceof AttemptCancelledError || this.token.canceled) return { type: 'CANCELLED' };
            this.log(`[Discovery] 💥 ${state} failed: ${errorMessage(e)}`);
            return { type: 'FATAL', message: errorMessage(e) };
        }
    }
}
