import type { BoundingBox, DetectedCandidate } from '../../../types/index.js';

export function boxArea(bbox: BoundingBox): number {
    return (bbox.xMax - bbox.xMin) * (bbox.yMax - bbox.yMin);
}

/**
 * Total order: score desc, area desc, scroll position asc, then label, yMin, xMin.
 */
export function compareCandidates(a: DetectedCandidate, b: DetectedCandidate): number {
    return (b.score - a.score)
        || (boxArea(b.bbox) - boxArea(a.bbox))
        || (a.scrollPosition - b.scrollPosition)
        || (a.label < b.label ? -1 : a.label > b.label ? 1 : 0)
        || (a.bbox.yMin - b.bbox.yMin)
        || (a.bbox.xMin - b.bbox.xMin);
}

export class CandidateRanker {
    /** Returns a new, fully ordered array; the input is untouched */
    static rank(candidates: readonly DetectedCandidate[]): DetectedCandidate[] {
        return [...candidates].sort(compareCandidates);
    }
}
