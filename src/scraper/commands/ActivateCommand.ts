import { CommandContext } from './Command.js';
import { PointerCommand } from './PointerCommand.js';

/**
 * Synthetic activation of the link or button under the point.
 * Reaches elements covered by overlays that swallow pointer events.
 */
export class ActivateCommand extends PointerCommand {
    readonly type = 'activate';

    protected async dispatch(ctx: CommandContext): Promise<boolean> {
        return await ctx.renderer.activate(this.point, { timeoutMs: ctx.timeoutMs, token: ctx.token });
    }
}
