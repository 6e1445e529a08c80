import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Runner, RendererFactory } from '../../scraper/runner.js';
import { buildDiscoveryConfig } from '../../scraper/config/DiscoveryConfig.js';
import type { RunnerConfig } from '../../shared/types.js';
import { FakeRenderer, FakeSite } from '../fixtures/FakeRenderer.js';

const SITE: FakeSite = {
    'https://www.example.com/': {
        height: 800,
        elements: [{ text: 'Careers', x: 100, y: 100, target: 'https://www.example.com/jobs/search' }],
    },
    'https://www.example.com/jobs/search': { height: 800, elements: [] },
    'https://www.example.com/about': { height: 800, elements: [] },
    'https://www.example.org/': { height: 800, elements: [{ text: 'About us', x: 100, y: 100 }] },
};

const CLOCK = () => new Date('2026-03-01T09:00:00Z');

describe('Runner', () => {
    let outputDir: string;
    let config: RunnerConfig;
    let closed: number;
    let factory: RendererFactory;

    beforeEach(() => {
        outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'jobtrail-run-'));
        config = { outputDir, concurrency: 2, headless: true, quiet: true };
        closed = 0;
        factory = async () => ({
            renderer: new FakeRenderer(SITE),
            close: async () => { closed++; },
        });
    });

    afterEach(() => {
        fs.rmSync(outputDir, { recursive: true, force: true });
        vi.restoreAllMocks();
    });

    it('should run every site and write records, attempts and the summary', async () => {
        const runner = new Runner(config, buildDiscoveryConfig(), factory, CLOCK);

        const summary = await runner.run(['https://www.example.com/', 'https://www.example.org/', 'https://www.example.com']);

        expect(summary.totals).toEqual({ sites: 2, success: 1, partial: 0, failed: 1, records: 1 });
        expect(summary.sites.map(s => [s.startUrl, s.outcome, s.terminationReason, s.attemptFile])).toEqual([
            ['https://www.example.com/', 'success', 'listing-reached', path.join('attempts', 'example.com.json')],
            ['https://www.example.org/', 'failed', 'no-candidates', path.join('attempts', 'example.org.json')],
        ]);
        expect(summary.sites[0].pages).toEqual(['https://www.example.com/', 'https://www.example.com/jobs/search']);
        expect(summary.sites[0].clicks).toEqual(['Careers']);
        expect(closed).toBe(2);

        const lines = fs.readFileSync(path.join(outputDir, 'training_records.jsonl'), 'utf-8').trimEnd().split('\n');
        expect(lines.map(line => JSON.parse(line).label)).toEqual(['Careers']);

        const attempt = JSON.parse(fs.readFileSync(path.join(outputDir, 'attempts', 'example.com.json'), 'utf-8'));
        expect(attempt.terminalState).toBe('JobListingReached');

        const written = JSON.parse(fs.readFileSync(path.join(outputDir, 'summary.json'), 'utf-8'));
        expect(written).toEqual(summary);
    });

    it('should give attempts on the same host distinct files', async () => {
        const runner = new Runner({ ...config, concurrency: 1 }, buildDiscoveryConfig(), factory, CLOCK);

        const summary = await runner.run(['https://www.example.com/', 'https://www.example.com/about']);

        expect(summary.sites.map(s => s.attemptFile)).toEqual([
            path.join('attempts', 'example.com.json'),
            path.join('attempts', 'example.com-2.json'),
        ]);
    });

    it('should record a failed attempt when the browser cannot be opened', async () => {
        vi.spyOn(console, 'error').mockImplementation(() => { });
        const broken: RendererFactory = async () => { throw new Error('browserType.launch: Executable does not exist'); };
        const runner = new Runner(config, buildDiscoveryConfig(), broken, CLOCK);

        const summary = await runner.run(['https://www.example.com/']);

        expect(summary.sites).toHaveLength(1);
        expect(summary.sites[0]).toMatchObject({
            outcome: 'failed',
            terminalState: 'Failed',
            terminationReason: 'browser-error',
            error: 'browserType.launch: Executable does not exist',
        });
    });

    it('should not start queued sites after stop', async () => {
        const runner = new Runner({ ...config, concurrency: 1 }, buildDiscoveryConfig(), async () => {
            runner.stop();
            return { renderer: new FakeRenderer(SITE), close: async () => { } };
        }, CLOCK);

        const summary = await runner.run(['https://www.example.com/', 'https://www.example.org/']);

        expect(summary.sites.map(s => [s.startUrl, s.terminalState])).toEqual([
            ['https://www.example.com/', 'Cancelled'],
        ]);
    });

    it('should refuse a second concurrent run', async () => {
        const runner = new Runner(config, buildDiscoveryConfig(), factory, CLOCK);
        const first = runner.run(['https://www.example.com/']);

        await expect(runner.run(['https://www.example.org/'])).rejects.toThrow('Runner is already running');
        await first;
    });
});
