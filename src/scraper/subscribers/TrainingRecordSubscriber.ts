import type { TrainingRecord } from '../../../types/index.js';
import { EventBus } from '../../shared/events/EventBus.js';
import { FileSystemHelper } from '../../shared/utils/index.js';

/**
 * TrainingRecordSubscriber appends every emitted record to a JSONL file.
 */
export class TrainingRecordSubscriber {
    private written = 0;
    private readonly handler = (record: TrainingRecord) => this.handleRecord(record);

    constructor(private readonly eventBus: EventBus, readonly outputPath: string) {
        FileSystemHelper.ensureDirForFile(outputPath);
        eventBus.subscribe('training-record', this.handler);
    }

    get count(): number {
        return this.written;
    }

    detach(): void {
        this.eventBus.unsubscribe('training-record', this.handler);
    }

    private handleRecord(record: TrainingRecord): void {
        if (FileSystemHelper.appendLine(this.outputPath, JSON.stringify(record))) {
            this.written++;
        }
    }
}
