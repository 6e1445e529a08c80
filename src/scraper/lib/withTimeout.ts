import { AttemptCancelledError, RendererTimeoutError } from '../errors.js';
import { CancelToken } from './CancelToken.js';

/**
 * Race a renderer call against a timer and the attempt's cancel token.
 * The underlying operation is abandoned, not aborted: its late result is ignored.
 */
export function withTimeout<T>(
    operation: Promise<T>,
    timeoutMs: number,
    label: string,
    token?: CancelToken
): Promise<T> {
    if (token?.canceled) {
        return Promise.reject(new AttemptCancelledError());
    }

    return new Promise<T>((resolve, reject) => {
        let settled = false;
        let unsubscribe: (() => void) | undefined;

        const timer = setTimeout(() => {
            finish(() => reject(new RendererTimeoutError(label, timeoutMs)));
        }, timeoutMs);

        function finish(settle: () => void): void {
            if (settled) return;
            settled = true;
            clearTimeout(timer);
            unsubscribe?.();
            settle();
        }

        unsubscribe = token?.onCancel(() => {
            finish(() => reject(new AttemptCancelledError()));
        });

        operation.then(
            value => finish(() => resolve(value)),
            (error: unknown) => finish(() => reject(error))
        );
    });
}
