import * as fs from 'fs';
import { QueueManager } from '../../scraper/queue/QueueManager.js';
import { FileSystemHelper } from '../../shared/utils/index.js';
import { DiscoverOptions } from '../types.js';
import { runDiscovery } from './run.js';

export async function batchAction(file: string, options: DiscoverOptions): Promise<void> {
    if (!fs.existsSync(file)) {
        console.error(`Error: batch file not found: ${file}`);
        process.exitCode = 1;
        return;
    }

    const urls = QueueManager.parseBatchFile(FileSystemHelper.safeReadText(file));
    console.log(`\n[JobTrail] Batch: ${urls.length} start URL(s) from ${file}`);

    const summary = await runDiscovery(urls, options);
    if (!summary) return;

    for (const site of summary.sites) {
        console.log(`  ${site.outcome.padEnd(7)} ${site.startUrl} (${site.terminationReason}, ${site.recordCount} record(s))`);
    }
}
