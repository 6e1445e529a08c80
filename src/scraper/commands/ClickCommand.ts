import { CommandContext } from './Command.js';
import { PointerCommand } from './PointerCommand.js';

/**
 * Coordinate mouse click at the candidate's center.
 */
export class ClickCommand extends PointerCommand {
    readonly type = 'click';

    protected async dispatch(ctx: CommandContext): Promise<boolean> {
        return await ctx.renderer.click(this.point, { timeoutMs: ctx.timeoutMs, token: ctx.token });
    }
}
