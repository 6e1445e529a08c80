import { Command, CommandContext } from './Command.js';
import { CommandValidationError, errorMessage, isAbortingError } from '../errors.js';

/**
 * Outcome of running alternatives until one succeeds
 */
export interface FirstSuccessReport<C extends Command> {
    winner: C | null;
    failures: Array<{ command: C; error: Error }>;
}

/**
 * CommandExecutor runs a command and checks its effect.
 * Fatal renderer errors and cancellation propagate; other failures are reported per command.
 */
export class CommandExecutor {
    private log: (message: string) => void;

    constructor(private ctx: CommandContext) {
        this.log = ctx.log ?? console.log;
    }

    /**
     * Execute a command, then its validate() when it has one.
     * @throws CommandValidationError when the effect was not observed
     */
    async execute(command: Command): Promise<void> {
        await command.execute(this.ctx);

        if (command.validate) {
            const isValid = await command.validate(this.ctx);
            if (!isValid) {
                throw new CommandValidationError(command.type);
            }
        }
    }

    /**
     * Execute commands sequentially until one succeeds.
     */
    async executeFirstSuccessful<C extends Command>(commands: C[]): Promise<FirstSuccessReport<C>> {
        const failures: Array<{ command: C; error: Error }> = [];

        for (const command of commands) {
            try {
                await this.execute(command);
                return { winner: command, failures };
            } catch (e) {
                if (isAbortingError(e)) throw e;
                this.log(`[Executor] ⚠️ ${command.type}: "${command.label}" failed: ${errorMessage(e)}`);
                failures.push({ command, error: e instanceof Error ? e : new Error(errorMessage(e)) });
            }
        }

        return { winner: null, failures };
    }
}
