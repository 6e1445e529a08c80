import type { DetectedCandidate } from '../../../types/index.js';
import { IDiscoveryPhase, DiscoveryEvent } from './IDiscoveryPhase.js';
import { DiscoveryContext } from './DiscoveryContext.js';
import { CandidateDetector } from '../lib/CandidateDetector.js';
import { ScanStep, isValidBox } from '../lib/ViewportScanner.js';
import { errorMessage, isAbortingError } from '../errors.js';
import { normalizeUrl } from '../queue/QueueManager.js';

/**
 * Advances the scan of the current page by one step and detects candidates there.
 * Before giving up on a page, opens collapsed menus once and looks again at the top.
 */
export class ScanPhase implements IDiscoveryPhase {
    readonly name = 'Scanning';

    async execute(context: DiscoveryContext): Promise<DiscoveryEvent> {
        const step = await this.nextStep(context);
        if (step) {
            context.recordStep(step);
            const found = this.detect(context, step, 'detected');
            return found.length > 0
                ? { type: 'CANDIDATES_DETECTED', count: found.length }
                : { type: 'STEP_EMPTY' };
        }

        const page = context.requirePage();
        const reason = context.scanner?.endReason ?? 'end-of-page';
        page.scanEndReason = reason;
        page.maxScrollReached = reason === 'max-scroll';
        context.log(`[ScanPhase] Scan of ${page.url} ended (${reason}) after ${page.scrollPositionsCovered.length} step(s)`);

        if (context.config.expandMenus && !page.menuExpanded) {
            page.menuExpanded = true;
            const found = await this.scanExpandedMenus(context);
            if (found.length > 0) {
                return { type: 'CANDIDATES_DETECTED', count: found.length };
            }
        }
        return { type: 'SCAN_EXHAUSTED' };
    }

    private async nextStep(context: DiscoveryContext): Promise<ScanStep | null> {
        if (context.pendingStep) {
            const pending = context.pendingStep;
            context.pendingStep = null;
            return pending;
        }
        const iterator = context.scanIterator ?? context.beginScan();
        const result = await iterator.next();
        return result.done ? null : result.value;
    }

    private detect(context: DiscoveryContext, step: ScanStep, source: 'detected' | 'menu'): DetectedCandidate[] {
        const page = context.requirePage();
        const found = CandidateDetector.detect(step.elements, {
            pageUrl: page.url,
            scrollPosition: step.scrollPosition,
            viewportNumber: step.viewportNumber,
            pageHeight: step.pageHeight,
            source,
        }, context.config);

        for (const candidate of found) {
            context.emitter.stage(candidate);
        }
        if (found.length > 0) {
            page.candidatesFound.push(...found);
            context.pageCandidates = found;
            context.log(`[ScanPhase] 🎯 ${found.length} candidate(s) at ${step.scrollPosition}px: ${found.map(c => `"${c.label}"`).join(', ')}`);
        }
        return found;
    }

    private async scanExpandedMenus(context: DiscoveryContext): Promise<DetectedCandidate[]> {
        const { renderer } = context;
        try {
            await renderer.scrollTo(0, context.operationOptions());
            const expanded = await renderer.expandMenus(context.operationOptions());

            const page = context.requirePage();
            if (normalizeUrl(renderer.currentUrl()) !== normalizeUrl(page.url)) {
                context.log(`[ScanPhase] ⚠️ Menu toggle left ${page.url} for ${renderer.currentUrl()}`);
                await context.restorePage(page.url);
                return [];
            }
            if (expanded === 0) return [];

            context.log(`[ScanPhase] 🍔 Expanded ${expanded} menu(s)`);
            const pageHeight = await renderer.currentPageHeight(context.operationOptions());
            const elements = (await renderer.queryVisibleElements(context.operationOptions()))
                .filter(e => e.text.trim().length > 0 && isValidBox(e.bbox));
            return this.detect(context, { scrollPosition: 0, viewportNumber: 1, pageHeight, elements, degraded: false }, 'menu');
        } catch (e) {
            if (isAbortingError(e)) throw e;
            context.log(`[ScanPhase] ⚠️ Menu expansion failed: ${errorMessage(e)}`);
            return [];
        }
    }
}
