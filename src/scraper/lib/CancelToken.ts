import { AttemptCancelledError } from '../errors.js';

/**
 * Cooperative cancellation primitive.
 * Checked by the state machine between stages; pending renderer waits reject on cancel.
 */
export class CancelToken {
    private _canceled = false;
    private listeners: Array<() => void> = [];

    get canceled(): boolean {
        return this._canceled;
    }

    cancel(): void {
        if (this._canceled) return;
        this._canceled = true;
        const listeners = this.listeners;
        this.listeners = [];
        for (const fn of listeners) {
            try {
                fn();
            } catch (e) {
                console.error('[CancelToken] Listener failed:', e);
            }
        }
    }

    /** Returns an unsubscribe function */
    onCancel(fn: () => void): () => void {
        if (this._canceled) {
            fn();
            return () => { };
        }
        this.listeners.push(fn);
        return () => {
            this.listeners = this.listeners.filter(l => l !== fn);
        };
    }

    throwIfCanceled(): void {
        if (this._canceled) throw new AttemptCancelledError();
    }
}
