import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { DetectedCandidate, TrainingRecord } from '../../../types/index.js';
import { TrainingRecordEmitter } from '../../scraper/services/TrainingRecordEmitter.js';
import { TrainingRecordSubscriber } from '../../scraper/subscribers/TrainingRecordSubscriber.js';
import { EventBus } from '../../shared/events/EventBus.js';

const NOW = () => new Date('2026-03-01T09:00:00Z');

function candidate(label: string, scrollPosition = 4000): DetectedCandidate {
    return {
        source: 'detected',
        label,
        matchedTerm: 'careers',
        bbox: { xMin: 150, yMin: 510, xMax: 201, yMax: 523 },
        scrollPosition,
        viewportNumber: 7,
        pageUrl: 'https://www.example.com/',
        labelWeight: 1,
        positionalBonus: 1.5,
        score: 1.5,
    };
}

describe('TrainingRecordEmitter', () => {
    it('should convert a candidate to the record wire shape', () => {
        expect(TrainingRecordEmitter.toRecord(candidate('Careers'), '2026-03-01T09:00:00.000Z')).toEqual({
            label: 'Careers',
            bbox: [150, 510, 201, 523],
            page_url: 'https://www.example.com/',
            scroll_position: 4000,
            viewport_number: 7,
            timestamp: '2026-03-01T09:00:00.000Z',
        });
    });

    it('should stage each detection once per attempt', async () => {
        const emitter = new TrainingRecordEmitter(null, NOW);

        expect(emitter.stage(candidate('Careers'))).toBe(true);
        expect(emitter.stage(candidate('Careers'))).toBe(false);
        expect(emitter.stage(candidate('Careers', 4400))).toBe(true);
        expect(emitter.pendingCount).toBe(2);

        await emitter.flush();

        expect(emitter.stage(candidate('Careers'))).toBe(false);
        expect(emitter.records).toHaveLength(2);
        expect(emitter.pendingCount).toBe(0);
    });

    it('should publish flushed records in order', async () => {
        const eventBus = new EventBus();
        const published: string[] = [];
        eventBus.subscribe('training-record', r => { published.push(`${r.label}@${r.scroll_position}`); });
        const emitter = new TrainingRecordEmitter(eventBus, NOW);

        emitter.stage(candidate('Careers', 0));
        emitter.stage(candidate('Jobs', 800));
        const batch = await emitter.flush();

        expect(batch.map(r => r.label)).toEqual(['Careers', 'Jobs']);
        expect(published).toEqual(['Careers@0', 'Jobs@800']);
    });

    it('should drop staged records on discard and release their keys', async () => {
        const emitter = new TrainingRecordEmitter(null, NOW);
        emitter.stage(candidate('Careers'));

        expect(emitter.discard()).toBe(1);
        expect(await emitter.flush()).toEqual([]);
        expect(emitter.stage(candidate('Careers'))).toBe(true);
    });
});

describe('TrainingRecordSubscriber', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'jobtrail-records-'));
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should append one JSON line per record until detached', async () => {
        const eventBus = new EventBus();
        const outputPath = path.join(tmpDir, 'nested', 'training_records.jsonl');
        const subscriber = new TrainingRecordSubscriber(eventBus, outputPath);
        const first = TrainingRecordEmitter.toRecord(candidate('Careers'), '2026-03-01T09:00:00.000Z');
        const second = TrainingRecordEmitter.toRecord(candidate('Jobs', 0), '2026-03-01T09:00:01.000Z');

        await eventBus.publish('training-record', first);
        await eventBus.publish('training-record', second);
        subscriber.detach();
        await eventBus.publish('training-record', first);

        const lines = fs.readFileSync(outputPath, 'utf-8').trimEnd().split('\n');
        const parsed: TrainingRecord[] = lines.map(line => JSON.parse(line));
        expect(parsed).toEqual([first, second]);
        expect(subscriber.count).toBe(2);
    });
});

describe('EventBus', () => {
    it('should keep notifying other handlers when one fails', async () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => { });
        const eventBus = new EventBus();
        const seen: string[] = [];
        eventBus.subscribe('training-record', () => { throw new Error('disk full'); });
        eventBus.subscribe('training-record', r => { seen.push(r.label); });

        await eventBus.publish('training-record', TrainingRecordEmitter.toRecord(candidate('Careers'), 't'));

        expect(seen).toEqual(['Careers']);
        expect(errorSpy).toHaveBeenCalledTimes(1);
        errorSpy.mockRestore();
    });

    it('should drop all handlers on clear', async () => {
        const eventBus = new EventBus();
        const handler = vi.fn();
        eventBus.subscribe('attempt-finished', handler);
        eventBus.clear();

        await eventBus.publish('training-record', TrainingRecordEmitter.toRecord(candidate('Careers'), 't'));

        expect(handler).not.toHaveBeenCalled();
    });
});
