import { Renderer } from '../adapters/Renderer.js';
import { CancelToken } from './CancelToken.js';

export interface SettleOptions {
    timeoutMs: number;
    pollIntervalMs: number;
    token?: CancelToken;
}

export interface SettleResult {
    /** The URL moved away from the starting URL */
    changed: boolean;
    finalUrl: string;
    /** Distinct URLs seen after leaving the starting URL, in order */
    observed: string[];
    /** The final URL held still for one poll interval */
    stable: boolean;
}

/**
 * Poll the renderer URL until it leaves fromUrl and then holds for one interval.
 * Gives up after timeoutMs worth of polls.
 */
export async function waitForUrlSettle(renderer: Renderer, fromUrl: string, options: SettleOptions): Promise<SettleResult> {
    const pollIntervalMs = Math.max(1, options.pollIntervalMs);
    const maxPolls = Math.max(2, Math.ceil(options.timeoutMs / pollIntervalMs));
    const observed: string[] = [];
    let last = fromUrl;

    for (let poll = 0; poll < maxPolls; poll++) {
        options.token?.throwIfCanceled();
        await renderer.wait(pollIntervalMs);
        const url = renderer.currentUrl();

        if (url !== fromUrl && url === last) {
            return { changed: true, finalUrl: url, observed, stable: true };
        }
        if (url !== last && url !== fromUrl) {
            observed.push(url);
        }
        last = url;
    }

    return { changed: last !== fromUrl, finalUrl: last, observed, stable: false };
}
