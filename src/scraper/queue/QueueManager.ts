import type { DiscoveryJob } from '../../shared/types.js';

/**
 * Origin + path without a trailing slash, then the query; the fragment is dropped.
 * Two URLs with the same normal form are the same page for discovery.
 */
export function normalizeUrl(url: string): string {
    try {
        const u = new URL(url);
        const path = u.pathname.endsWith('/') ? u.pathname.slice(0, -1) : u.pathname;
        return u.origin.toLowerCase() + path + u.search;
    } catch { return url; }
}

/**
 * Accepts bare hosts ("example.com") by assuming https. Returns null for anything else unusable.
 */
export function toStartUrl(input: string): string | null {
    const trimmed = input.trim();
    if (!trimmed) return null;
    const candidate = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
    try {
        const u = new URL(candidate);
        if (u.protocol !== 'http:' && u.protocol !== 'https:') return null;
        return u.toString();
    } catch {
        return null;
    }
}

/**
 * Start URLs of a batch, handed out one at a time to the workers.
 */
export class QueueManager {
    private queue: DiscoveryJob[] = [];
    private seen = new Set<string>();
    private nextIndex = 0;

    constructor(private log: (msg: string) => void = console.log) { }

    /**
     * Queue start URLs, skipping invalid entries and duplicates. Returns how many were added.
     */
    public addJobs(urls: readonly string[]): number {
        let addedCount = 0;
        for (const raw of urls) {
            const url = toStartUrl(raw);
            if (!url) {
                this.log(`[QueueManager] ⚠️ Skipping invalid URL: ${raw}`);
                continue;
            }
            const normalized = normalizeUrl(url);
            if (this.seen.has(normalized)) continue;

            this.seen.add(normalized);
            this.queue.push({ url, index: this.nextIndex++ });
            addedCount++;
        }
        return addedCount;
    }

    public getNextJob(): DiscoveryJob | undefined {
        return this.queue.shift();
    }

    public getQueueLength(): number { return this.queue.length; }
    public getTotalCount(): number { return this.nextIndex; }

    /**
     * Parse a batch file: one URL per line, blank lines and # comments skipped
     */
    public static parseBatchFile(content: string): string[] {
        return content
            .split(/\r?\n/)
            .map(line => line.trim())
            .filter(line => line.length > 0 && !line.startsWith('#'));
    }
}
