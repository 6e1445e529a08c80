import { describe, it, expect } from 'vitest';
import type { VisibleElement } from '../../../types/index.js';
import { ListingHeuristic } from '../../scraper/lib/ListingHeuristic.js';
import { DEFAULT_DISCOVERY_CONFIG } from '../../scraper/config/DiscoveryConfig.js';

const patterns = DEFAULT_DISCOVERY_CONFIG.listingUrlPatterns;

function texts(...values: string[]): VisibleElement[] {
    return values.map((text, i) => ({
        text,
        bbox: { xMin: 0, yMin: i * 30, xMax: 300, yMax: i * 30 + 20 },
        tag: 'a',
        href: null,
        role: null,
    }));
}

describe('ListingHeuristic', () => {
    describe('matchesListingUrl', () => {
        it('should match job search paths', () => {
            expect(ListingHeuristic.matchesListingUrl('https://jobs.example.com/jobs/search?q=data', patterns)).toBe(true);
            expect(ListingHeuristic.matchesListingUrl('https://example.com/company/open-positions', patterns)).toBe(true);
        });

        it('should match a jobs page only with a query', () => {
            expect(ListingHeuristic.matchesListingUrl('https://example.com/jobs?location=remote', patterns)).toBe(true);
            expect(ListingHeuristic.matchesListingUrl('https://example.com/jobs', patterns)).toBe(false);
        });

        it('should ignore the host', () => {
            expect(ListingHeuristic.matchesListingUrl('https://openings.example.com/about', patterns)).toBe(false);
        });
    });

    describe('countPostings', () => {
        it('should count distinct texts that read like job titles', () => {
            const count = ListingHeuristic.countPostings(texts(
                'Senior Software Engineer',
                'Product Manager',
                'product   manager',
                'About us',
                'Engineering',
                'Leadership principles'
            ));

            expect(count).toBe(2);
        });

        it('should skip long paragraphs', () => {
            const count = ListingHeuristic.countPostings(texts(
                'Our engineers build the tools that help every analyst and designer across the whole company each day'
            ));

            expect(count).toBe(0);
        });
    });

    describe('evaluate', () => {
        it('should be satisfied by enough postings', () => {
            const evidence = ListingHeuristic.evaluate(
                'https://careers.example.com/',
                texts('Data Scientist', 'Backend Developer', 'Office Coordinator'),
                DEFAULT_DISCOVERY_CONFIG
            );

            expect(evidence).toEqual({ urlMatched: false, postingCount: 3, satisfied: true });
        });

        it('should be satisfied by the URL alone', () => {
            const evidence = ListingHeuristic.evaluate('https://careers.example.com/search-jobs', [], DEFAULT_DISCOVERY_CONFIG);

            expect(evidence).toEqual({ urlMatched: true, postingCount: 0, satisfied: true });
        });

        it('should not be satisfied below the posting threshold', () => {
            const evidence = ListingHeuristic.evaluate(
                'https://careers.example.com/',
                texts('Find jobs', 'Data Scientist'),
                DEFAULT_DISCOVERY_CONFIG
            );

            expect(evidence).toEqual({ urlMatched: false, postingCount: 1, satisfied: false });
        });
    });
});
