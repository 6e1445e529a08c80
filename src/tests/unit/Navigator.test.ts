import { describe, it, expect, beforeEach } from 'vitest';
import type { ActionRecord, DetectedCandidate, FallbackCandidate } from '../../../types/index.js';
import { Navigator, NavigateOptions, centerOf, isRedirectTrap } from '../../scraper/lib/Navigator.js';
import { waitForUrlSettle } from '../../scraper/lib/UrlWatcher.js';
import { DEFAULT_DISCOVERY_CONFIG } from '../../scraper/config/DiscoveryConfig.js';
import { FatalRendererError } from '../../scraper/errors.js';
import { FakeRenderer, FakeSite } from '../fixtures/FakeRenderer.js';

const HOME = 'https://www.example.com/';
const CAREERS = 'https://careers.example.com/';
const NOW = new Date('2026-01-01T00:00:00Z');

const SITE: FakeSite = {
    [HOME]: {
        height: 1600,
        elements: [
            { text: 'Jobs', x: 300, y: 100, target: 'https://www.example.com/jobs-redirect' },
            { text: 'Sign in to apply', x: 500, y: 100, target: 'https://accounts.google.com/signin' },
            { text: 'Dead link', x: 700, y: 100 },
            { text: 'Broken', x: 900, y: 100, clickFails: true, target: CAREERS },
            { text: 'Unclickable', x: 1100, y: 100, clickFails: true, activateFails: true, target: CAREERS },
            { text: 'Careers', x: 100, y: 900, width: 80, height: 20, target: CAREERS },
        ],
    },
    'https://www.example.com/jobs-redirect': { height: 800, elements: [], redirectTo: 'https://jobs.example.com/search' },
    [CAREERS]: { height: 800, elements: [] },
};

function detected(label: string, x: number, y: number, scrollPosition = 0): DetectedCandidate {
    return {
        source: 'detected',
        label,
        matchedTerm: label.toLowerCase(),
        bbox: { xMin: x, yMin: y, xMax: x + 100, yMax: y + 20 },
        scrollPosition,
        viewportNumber: 1,
        pageUrl: HOME,
        labelWeight: 1,
        positionalBonus: 1,
        score: 1,
    };
}

describe('Navigator', () => {
    let renderer: FakeRenderer;
    let actionChain: ActionRecord[];
    let options: NavigateOptions;

    beforeEach(async () => {
        renderer = new FakeRenderer(SITE);
        await renderer.render(HOME, { timeoutMs: 1000 });
        actionChain = [];
        options = {
            actionChain,
            operationTimeoutMs: 1000,
            navigationTimeoutMs: 1000,
            urlPollIntervalMs: 250,
            redirectTrapDomains: DEFAULT_DISCOVERY_CONFIG.redirectTrapDomains,
            now: () => NOW,
            log: () => { },
        };
    });

    it('should click the center of the candidate after scrolling to it', async () => {
        const careers: DetectedCandidate = {
            ...detected('Careers', 100, 100, 800),
            bbox: { xMin: 100, yMin: 100, xMax: 180, yMax: 120 },
        };

        const outcome = await Navigator.navigate(careers, renderer, options);

        expect(outcome).toEqual({
            ok: true,
            result: { success: true, newUrl: CAREERS, methodUsed: 'click', redirected: false },
        });
        expect(renderer.calls).toEqual([`render ${HOME}`, 'click 140,110']);
        expect(actionChain).toEqual([
            { type: 'click', label: 'Careers', url: HOME, timestamp: '2026-01-01T00:00:00.000Z' },
        ]);
    });

    it('should report a redirect when several URLs were observed', async () => {
        const outcome = await Navigator.navigate(detected('Jobs', 300, 100), renderer, options);

        expect(outcome).toEqual({
            ok: true,
            result: { success: true, newUrl: 'https://jobs.example.com/search', methodUsed: 'click', redirected: true },
        });
    });

    it('should classify a landing on a trap domain as redirect_unexpected', async () => {
        const outcome = await Navigator.navigate(detected('Sign in to apply', 500, 100), renderer, options);

        expect(outcome.ok).toBe(false);
        if (!outcome.ok) {
            expect(outcome.error.kind).toBe('redirect_unexpected');
            expect(outcome.error.newUrl).toBe('https://accounts.google.com/signin');
        }
    });

    it('should fall back to synthetic activation when the click is not delivered', async () => {
        const outcome = await Navigator.navigate(detected('Broken', 900, 100), renderer, options);

        expect(outcome.ok && outcome.result.methodUsed).toBe('activate');
        expect(actionChain.map(a => a.type)).toEqual(['click', 'activate']);
    });

    it('should report timeout when both methods dispatched but the URL never changed', async () => {
        const outcome = await Navigator.navigate(detected('Dead link', 700, 100), renderer, options);

        expect(outcome.ok).toBe(false);
        if (!outcome.ok) {
            expect(outcome.error.kind).toBe('timeout');
            expect(outcome.error.newUrl).toBe(HOME);
        }
        expect(actionChain.map(a => a.type)).toEqual(['click', 'activate']);
    });

    it('should report click_failed when no method could be delivered', async () => {
        const outcome = await Navigator.navigate(detected('Unclickable', 1100, 100), renderer, options);

        expect(outcome.ok).toBe(false);
        if (!outcome.ok) {
            expect(outcome.error.kind).toBe('click_failed');
        }
    });

    it('should propagate a renderer crash', async () => {
        renderer.crash.add('click');

        await expect(Navigator.navigate(detected('Jobs', 300, 100), renderer, options)).rejects.toBeInstanceOf(FatalRendererError);
    });

    describe('fallback candidates', () => {
        const fallback = (targetUrl: string): FallbackCandidate => ({
            source: 'fallback',
            label: 'example.com careers',
            targetUrl,
            pageUrl: HOME,
            score: 0,
        });

        it('should render the career site directly', async () => {
            const outcome = await Navigator.navigate(fallback(CAREERS), renderer, options);

            expect(outcome).toEqual({
                ok: true,
                result: { success: true, newUrl: CAREERS, methodUsed: 'direct', redirected: false },
            });
            expect(actionChain).toEqual([
                { type: 'navigate', label: 'example.com careers', url: CAREERS, timestamp: '2026-01-01T00:00:00.000Z' },
            ]);
        });

        it('should report click_failed when the career site does not load', async () => {
            const outcome = await Navigator.navigate(fallback('https://gone.example.com/'), renderer, options);

            expect(outcome.ok).toBe(false);
            if (!outcome.ok) {
                expect(outcome.error.kind).toBe('click_failed');
                expect(outcome.error.newUrl).toBe(HOME);
            }
        });

        it('should report timeout when the render hangs', async () => {
            renderer.hang.add('render');
            options.navigationTimeoutMs = 10;

            const outcome = await Navigator.navigate(fallback(CAREERS), renderer, options);

            expect(outcome.ok).toBe(false);
            if (!outcome.ok) {
                expect(outcome.error.kind).toBe('timeout');
            }
        });
    });
});

describe('isRedirectTrap', () => {
    const traps = DEFAULT_DISCOVERY_CONFIG.redirectTrapDomains;

    it('should match trap hosts and their subdomains', () => {
        expect(isRedirectTrap('https://accounts.google.com/signin', traps)).toBe(true);
        expect(isRedirectTrap('https://eu.consent.google.com/x', traps)).toBe(true);
        expect(isRedirectTrap('https://www.accounts.google.com/', traps)).toBe(true);
    });

    it('should not match the parent domain or unparseable URLs', () => {
        expect(isRedirectTrap('https://google.com/about/careers', traps)).toBe(false);
        expect(isRedirectTrap('not a url', traps)).toBe(false);
    });
});

describe('centerOf', () => {
    it('should round the box center', () => {
        expect(centerOf(detected('Careers', 150, 510))).toEqual({ x: 200, y: 520 });
    });
});

describe('waitForUrlSettle', () => {
    it('should give up when the URL never leaves the start', async () => {
        const renderer = new FakeRenderer(SITE);
        await renderer.render(HOME, { timeoutMs: 1000 });

        const result = await waitForUrlSettle(renderer, HOME, { timeoutMs: 1000, pollIntervalMs: 250 });

        expect(result).toEqual({ changed: false, finalUrl: HOME, observed: [], stable: false });
    });
});
