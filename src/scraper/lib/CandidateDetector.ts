import type { BoundingBox, DetectedCandidate, VisibleElement } from '../../../types/index.js';
import type { DiscoveryConfig } from '../config/DiscoveryConfig.js';
import { KEYWORDS, THRESHOLDS } from '../config/constants.js';

export type DetectorConfig = Pick<DiscoveryConfig, 'vocabulary' | 'footerFraction' | 'footerBonus' | 'maxLabelWords'>;

/** Where the elements were observed */
export interface PageContext {
    pageUrl: string;
    scrollPosition: number;
    viewportNumber: number;
    pageHeight: number;
    source?: 'detected' | 'menu';
}

export interface VocabularyMatch {
    term: string;
    weight: number;
}

/** Lower-case with runs of whitespace collapsed */
export function normalizeLabel(text: string): string {
    return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Best vocabulary term for a text, or null.
 * A term matches when it occurs in the text or the text (4+ chars) occurs in the term.
 */
export function matchVocabulary(
    text: string,
    vocabulary: Readonly<Record<string, number>>,
    maxLabelWords: number
): VocabularyMatch | null {
    const label = normalizeLabel(text);
    if (!label || label.split(' ').length > maxLabelWords) return null;

    let best: VocabularyMatch | null = null;
    for (const [rawTerm, weight] of Object.entries(vocabulary)) {
        const term = normalizeLabel(rawTerm);
        const matches = label.includes(term)
            || (label.length >= THRESHOLDS.MIN_FRAGMENT_LENGTH && term.includes(label));
        if (!matches) continue;

        if (!best
            || weight > best.weight
            || (weight === best.weight && term.length > best.term.length)
            || (weight === best.weight && term.length === best.term.length && term < best.term)) {
            best = { term, weight };
        }
    }
    return best;
}

/**
 * Anchor with an href, a button, or an element with a link, button or menuitem role.
 * Headings and table cells are reported for the listing check but are not navigation targets.
 */
export function isLinkLike(element: VisibleElement): boolean {
    const roles = (element.role ?? '').toLowerCase().split(/\s+/);
    if (roles.some(role => KEYWORDS.LINK_ROLES.some(linkRole => linkRole === role))) return true;
    if (element.tag === 'button') return true;
    return element.tag === 'a' && !!element.href;
}

function contains(outer: BoundingBox, inner: BoundingBox): boolean {
    return outer.xMin <= inner.xMin && outer.yMin <= inner.yMin
        && outer.xMax >= inner.xMax && outer.yMax >= inner.yMax;
}

function sameBox(a: BoundingBox, b: BoundingBox): boolean {
    return a.xMin === b.xMin && a.yMin === b.yMin && a.xMax === b.xMax && a.yMax === b.yMax;
}

interface Match {
    element: VisibleElement;
    label: string;
    vocabulary: VocabularyMatch;
}

/**
 * Drop wrappers: a match whose box contains another match with the same label.
 * Of identical boxes the first one stays.
 */
function innermost(matches: Match[]): Match[] {
    return matches.filter((outer, i) => !matches.some((inner, j) =>
        j !== i
        && inner.label === outer.label
        && contains(outer.element.bbox, inner.element.bbox)
        && (j < i || !sameBox(outer.element.bbox, inner.element.bbox))
    ));
}

/**
 * Turns visible elements into scored career-link candidates. Pure.
 */
export class CandidateDetector {
    static detect(elements: readonly VisibleElement[], ctx: PageContext, config: DetectorConfig): DetectedCandidate[] {
        const footerStart = ctx.pageHeight * (1 - config.footerFraction);
        const candidates: DetectedCandidate[] = [];

        const matches: Match[] = [];
        for (const element of elements) {
            if (!isLinkLike(element)) continue;
            const vocabularyMatch = matchVocabulary(element.text, config.vocabulary, config.maxLabelWords);
            if (vocabularyMatch) {
                matches.push({ element, label: normalizeLabel(element.text), vocabulary: vocabularyMatch });
            }
        }

        for (const { element, vocabulary: match } of innermost(matches)) {
            const absoluteY = ctx.scrollPosition + element.bbox.yMin;
            const positionalBonus = ctx.pageHeight > 0 && absoluteY >= footerStart ? config.footerBonus : 1.0;

            const candidate: DetectedCandidate = {
                source: ctx.source ?? 'detected',
                label: element.text.trim(),
                matchedTerm: match.term,
                bbox: Object.freeze({ ...element.bbox }),
                scrollPosition: ctx.scrollPosition,
                viewportNumber: ctx.viewportNumber,
                pageUrl: ctx.pageUrl,
                labelWeight: match.weight,
                positionalBonus,
                score: match.weight * positionalBonus,
            };
            candidates.push(Object.freeze(candidate));
        }
        return candidates;
    }
}
