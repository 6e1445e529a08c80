import type { ActionRecord } from '../../../types/index.js';
import { Command, CommandContext, CommandOptions } from './Command.js';
import { THRESHOLDS } from '../config/constants.js';

/**
 * Direct render of a URL, used for known separate career domains.
 */
export class NavigateCommand implements Command {
    readonly type = 'navigate';
    readonly label: string;

    constructor(readonly targetUrl: string, options: CommandOptions = {}) {
        this.label = options.label || targetUrl;
    }

    async execute(ctx: CommandContext): Promise<void> {
        ctx.actionChain.push(this.toRecord(this.targetUrl, ctx.now().toISOString()));
        await ctx.renderer.render(this.targetUrl, { timeoutMs: ctx.navigationTimeoutMs, token: ctx.token });
    }

    toRecord(url: string, timestamp: string): ActionRecord {
        return {
            type: this.type,
            label: this.label.substring(0, THRESHOLDS.LABEL_MAX_LENGTH),
            url,
            timestamp,
        };
    }
}
