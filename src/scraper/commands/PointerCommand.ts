import type { ActionRecord, Point } from '../../../types/index.js';
import { Command, CommandContext, CommandOptions } from './Command.js';
import { SettleResult, waitForUrlSettle } from '../lib/UrlWatcher.js';
import { THRESHOLDS } from '../config/constants.js';

/**
 * Base for commands that act on a viewport point and are expected to change the URL.
 */
export abstract class PointerCommand implements Command {
    abstract readonly type: ActionRecord['type'];
    readonly label: string;

    /** The action reached the page */
    dispatched = false;
    /** Result of the last validate() */
    settle: SettleResult | null = null;

    private fromUrl = '';

    constructor(protected readonly point: Point, options: CommandOptions = {}) {
        this.label = options.label || 'element';
    }

    protected abstract dispatch(ctx: CommandContext): Promise<boolean>;

    async execute(ctx: CommandContext): Promise<void> {
        this.fromUrl = ctx.renderer.currentUrl();
        ctx.actionChain.push(this.toRecord(this.fromUrl, ctx.now().toISOString()));

        const delivered = await this.dispatch(ctx);
        if (!delivered) {
            throw new Error(`${this.type} on "${this.label}" was not delivered`);
        }
        this.dispatched = true;
    }

    async validate(ctx: CommandContext): Promise<boolean> {
        this.settle = await waitForUrlSettle(ctx.renderer, this.fromUrl, {
            timeoutMs: ctx.navigationTimeoutMs,
            pollIntervalMs: ctx.urlPollIntervalMs,
            token: ctx.token,
        });
        return this.settle.changed;
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
