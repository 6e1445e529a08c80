/**
 * Error taxonomy of the discovery engine.
 *
 * Only FatalRendererError ends an attempt as Failed. Everything else is turned
 * into a structured outcome by the component that observed it.
 */

export type NavigationErrorKind = 'click_failed' | 'redirect_unexpected' | 'timeout';

export class NavigationError extends Error {
    constructor(
        public readonly kind: NavigationErrorKind,
        public readonly newUrl: string,
        message?: string
    ) {
        super(message ?? `Navigation failed (${kind}) at ${newUrl}`);
        this.name = 'NavigationError';
    }
}

/** Page crash, closed target or a required render that never completed */
export class FatalRendererError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'FatalRendererError';
    }
}

export class RendererTimeoutError extends Error {
    constructor(public readonly operation: string, public readonly timeoutMs: number) {
        super(`${operation} timed out after ${timeoutMs}ms`);
        this.name = 'RendererTimeoutError';
    }
}

/** A command dispatched without error but its expected effect was not observed */
export class CommandValidationError extends Error {
    constructor(public readonly commandType: string, message?: string) {
        super(message ?? `Execution completed but validation failed for ${commandType}`);
        this.name = 'CommandValidationError';
    }
}

export class AttemptCancelledError extends Error {
    constructor() {
        super('Attempt cancelled');
        this.name = 'AttemptCancelledError';
    }
}

export function isFatalRendererError(e: unknown): e is FatalRendererError {
    return e instanceof FatalRendererError;
}

/** Errors that end the attempt instead of degrading a step */
export function isAbortingError(e: unknown): boolean {
    return e instanceof FatalRendererError || e instanceof AttemptCancelledError;
}

export function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
