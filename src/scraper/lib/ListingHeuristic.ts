import type { ListingEvidence, VisibleElement } from '../../../types/index.js';
import type { DiscoveryConfig } from '../config/DiscoveryConfig.js';
import { KEYWORDS, LIMITS } from '../config/constants.js';
import { normalizeLabel } from './CandidateDetector.js';

export type ListingConfig = Pick<DiscoveryConfig, 'listingUrlPatterns' | 'minJobPostings'>;

const JOB_TITLE = new RegExp(`\\b(${KEYWORDS.JOB_TITLE_TERMS.join('|')})s?\\b`, 'i');

/** Path plus query of a URL, or the raw string when it does not parse */
function pathAndQuery(url: string): string {
    try {
        const parsed = new URL(url);
        return `${parsed.pathname}${parsed.search}`;
    } catch {
        return url;
    }
}

/**
 * Decides whether a page is a job listing: a listing URL, or enough posting-like titles.
 */
export class ListingHeuristic {
    static matchesListingUrl(url: string, patterns: readonly string[]): boolean {
        const target = pathAndQuery(url);
        return patterns.some(pattern => new RegExp(pattern, 'i').test(target));
    }

    /** Distinct texts that read like a job title */
    static countPostings(elements: readonly VisibleElement[]): number {
        const titles = new Set<string>();
        for (const element of elements) {
            const text = normalizeLabel(element.text);
            if (!text || text.split(' ').length > LIMITS.MAX_POSTING_WORDS) continue;
            if (JOB_TITLE.test(text)) titles.add(text);
        }
        return titles.size;
    }

    static evaluate(url: string, elements: readonly VisibleElement[], config: ListingConfig): ListingEvidence {
        const urlMatched = this.matchesListingUrl(url, config.listingUrlPatterns);
        const postingCount = this.countPostings(elements);
        return {
            urlMatched,
            postingCount,
            satisfied: urlMatched || postingCount >= config.minJobPostings,
        };
    }
}
