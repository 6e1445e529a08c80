import { IDiscoveryPhase, DiscoveryEvent } from './IDiscoveryPhase.js';
import { DiscoveryContext } from './DiscoveryContext.js';
import { isRedirectTrap } from '../lib/Navigator.js';
import { normalizeUrl } from '../queue/QueueManager.js';
import { FatalRendererError, errorMessage, isAbortingError } from '../errors.js';

/**
 * Renders the start URL and records the landing page.
 */
export class StartPhase implements IDiscoveryPhase {
    readonly name = 'Start';

    async execute(context: DiscoveryContext): Promise<DiscoveryEvent> {
        const { renderer, startUrl, log } = context;
        log(`[StartPhase] 🌐 Navigating to: ${startUrl}`);

        try {
            await renderer.render(startUrl, context.navigationOptions());
        } catch (e) {
            if (isAbortingError(e)) throw e;
            throw new FatalRendererError(`Start page could not be loaded: ${errorMessage(e)}`, e);
        }

        const landedUrl = renderer.currentUrl();
        const redirected = normalizeUrl(landedUrl) !== normalizeUrl(startUrl);
        if (redirected) {
            log(`[StartPhase] ↪️ Redirected to ${landedUrl}`);
        }

        context.queueFallbackFor(startUrl);
        context.queueFallbackFor(landedUrl);
        context.visitedUrls.add(normalizeUrl(startUrl));
        context.enterPage(landedUrl, redirected ? 'redirected' : 'initial');

        if (isRedirectTrap(landedUrl, context.config.redirectTrapDomains)) {
            log(`[StartPhase] 🪤 Start page landed on redirect trap ${landedUrl}`);
            return { type: 'START_TRAPPED', url: landedUrl };
        }
        return { type: 'START_RENDERED' };
    }
}
