import type { ActionRecord } from '../../../types/index.js';
import { Renderer } from '../adapters/Renderer.js';
import { CancelToken } from '../lib/CancelToken.js';

/**
 * Context passed to all Commands during execution.
 */
export interface CommandContext {
    renderer: Renderer;
    /** Navigation path of the attempt; every executed command appends to it */
    actionChain: ActionRecord[];
    /** Timeout of a single renderer interaction */
    timeoutMs: number;
    /** Timeout of a page render or of waiting for a URL change */
    navigationTimeoutMs: number;
    urlPollIntervalMs: number;
    token?: CancelToken;
    now: () => Date;
    log?: (message: string) => void;
}

/**
 * Command interface for encapsulating browser actions.
 * Enables action-path recording and alternatives in CommandExecutor.
 */
export interface Command {
    /** Action type identifier */
    readonly type: ActionRecord['type'];

    /** Human-readable label for logging */
    readonly label: string;

    /** Throws when the action could not be dispatched */
    execute(ctx: CommandContext): Promise<void>;

    /**
     * Optional check run after execute().
     * Returns true if the expected effect was observed.
     */
    validate?(ctx: CommandContext): Promise<boolean>;

    toRecord(url: string, timestamp: string): ActionRecord;
}

export interface CommandOptions {
    label?: string;
}
