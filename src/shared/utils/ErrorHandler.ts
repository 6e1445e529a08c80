/**
 * Centralized Error Handler
 *
 * Runner-level and file-system failures are routed through here with a severity.
 * Engine components report their failures as structured outcomes instead.
 */

export enum ErrorSeverity {
    /** Not logged; the caller reports the failure itself */
    SILENT = 'silent',
    /** Logged as a warning; the run is unaffected */
    WARNING = 'warning',
    /** Logged as an error; the affected site is recorded as failed */
    ERROR = 'error'
}

export interface ErrorContext {
    /** Component that hit the failure, e.g. Runner */
    component: string;
    operation?: string;
    data?: Record<string, unknown>;
}

export interface ErrorInfo {
    name: string;
    message: string;
    context: ErrorContext;
}

export class ErrorHandler {
    private static prefix(ctx: ErrorContext): string {
        return ctx.operation ? `[${ctx.component}.${ctx.operation}]` : `[${ctx.component}]`;
    }

    static toError(error: unknown): Error {
        return error instanceof Error ? error : new Error(String(error));
    }

    /**
     * Log an error at the given severity and return its summary
     */
    static handle(error: unknown, context: ErrorContext, severity: ErrorSeverity = ErrorSeverity.ERROR): ErrorInfo {
        const err = this.toError(error);
        const prefix = this.prefix(context);

        if (severity === ErrorSeverity.WARNING) {
            console.warn(`${prefix} ⚠️ ${err.message}`);
        } else if (severity === ErrorSeverity.ERROR) {
            const where = context.data ? ` ${JSON.stringify(context.data)}` : '';
            console.error(`${prefix} ❌ ${err.message}${where}`);
        }

        return { name: err.name, message: err.message, context };
    }

    /**
     * Run an async function, returning fallback when it throws
     */
    static async safeExecute<T>(
        fn: () => Promise<T>,
        context: ErrorContext,
        fallback: T,
        severity: ErrorSeverity = ErrorSeverity.ERROR
    ): Promise<T> {
        try {
            return await fn();
        } catch (error) {
            this.handle(error, context, severity);
            return fallback;
        }
    }

    static safeExecuteSync<T>(
        fn: () => T,
        context: ErrorContext,
        fallback: T,
        severity: ErrorSeverity = ErrorSeverity.ERROR
    ): T {
        try {
            return fn();
        } catch (error) {
            this.handle(error, context, severity);
            return fallback;
        }
    }
}
