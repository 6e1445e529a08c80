import type { DetectedCandidate, TrainingRecord } from '../../../types/index.js';
import { EventBus } from '../../shared/events/EventBus.js';

/**
 * Holds the current page's records until the engine leaves the page.
 * Each (page_url, label, scroll_position, bbox) is emitted at most once per attempt.
 */
export class TrainingRecordEmitter {
    private staged: TrainingRecord[] = [];
    private readonly seenKeys = new Set<string>();
    private readonly emitted: TrainingRecord[] = [];

    constructor(
        private readonly eventBus: EventBus | null = null,
        private readonly now: () => Date = () => new Date()
    ) { }

    static toRecord(candidate: DetectedCandidate, timestamp: string): TrainingRecord {
        const { xMin, yMin, xMax, yMax } = candidate.bbox;
        return {
            label: candidate.label,
            bbox: [xMin, yMin, xMax, yMax],
            page_url: candidate.pageUrl,
            scroll_position: candidate.scrollPosition,
            viewport_number: candidate.viewportNumber,
            timestamp,
        };
    }

    static keyOf(record: TrainingRecord): string {
        return JSON.stringify([record.page_url, record.label, record.scroll_position, record.bbox]);
    }

    /**
     * Stage a detection. Returns false when the same detection was already staged or emitted.
     */
    stage(candidate: DetectedCandidate): boolean {
        const record = TrainingRecordEmitter.toRecord(candidate, this.now().toISOString());
        const key = TrainingRecordEmitter.keyOf(record);
        if (this.seenKeys.has(key)) return false;

        this.seenKeys.add(key);
        this.staged.push(record);
        return true;
    }

    get pendingCount(): number {
        return this.staged.length;
    }

    /** All records flushed so far, in emission order */
    get records(): readonly TrainingRecord[] {
        return this.emitted;
    }

    /**
     * Emit the staged records: publish each as 'training-record' and keep it.
     */
    async flush(): Promise<TrainingRecord[]> {
        const batch = this.staged;
        this.staged = [];

        for (const record of batch) {
            this.emitted.push(record);
            if (this.eventBus) {
                await this.eventBus.publish('training-record', record);
            }
        }
        return batch;
    }

    /**
     * Drop staged records without emitting. Their keys are released.
     */
    discard(): number {
        const dropped = this.staged.length;
        for (const record of this.staged) {
            this.seenKeys.delete(TrainingRecordEmitter.keyOf(record));
        }
        this.staged = [];
        return dropped;
    }
}
