/** Rectangle in viewport pixel coordinates at the moment of detection */
export interface BoundingBox {
    xMin: number;
    yMin: number;
    xMax: number;
    yMax: number;
}

export interface Point {
    x: number;
    y: number;
}

/** One element reported by the renderer for the current scroll stop */
export interface VisibleElement {
    /** Normalized visible text (or aria-label when the element has no text) */
    text: string;
    bbox: BoundingBox;
    /** Lower-cased tag name */
    tag: string;
    /** Resolved href for anchors */
    href: string | null;
    /** ARIA role attribute */
    role: string | null;
}

export interface DetectedCandidate {
    readonly source: 'detected' | 'menu';
    /** Element text as rendered */
    readonly label: string;
    /** Vocabulary term the label matched */
    readonly matchedTerm: string;
    readonly bbox: BoundingBox;
    readonly scrollPosition: number;
    /** 1-based scan step index on the owning page */
    readonly viewportNumber: number;
    readonly pageUrl: string;
    readonly labelWeight: number;
    readonly positionalBonus: number;
    readonly score: number;
}

/** Synthetic candidate opening a known separate career domain */
export interface FallbackCandidate {
    readonly source: 'fallback';
    readonly label: string;
    readonly targetUrl: string;
    readonly pageUrl: string;
    readonly score: number;
}

export type Candidate = DetectedCandidate | FallbackCandidate;

export type EntryMethod = 'initial' | 'clicked' | 'redirected' | 'fallback';

export type ScanEndReason = 'max-scroll' | 'end-of-page';

export interface ListingEvidence {
    urlMatched: boolean;
    postingCount: number;
    satisfied: boolean;
}

export interface PageVisit {
    url: string;
    entryMethod: EntryMethod;
    /** Strictly increasing, starts at 0 */
    scrollPositionsCovered: number[];
    candidatesFound: Candidate[];
    /** Number of candidates the Navigator tried from this page */
    attemptedCandidates: number;
    /** At least one scan step on this page was degraded */
    scanDegraded: boolean;
    scanEndReason?: ScanEndReason;
    /** The scan stopped at the configured max scroll before the page ended */
    maxScrollReached: boolean;
    menuExpanded: boolean;
    listing?: ListingEvidence;
}

export type AttemptOutcome = 'success' | 'partial' | 'failed';

export type TerminalState = 'JobListingReached' | 'Exhausted' | 'Failed' | 'Cancelled';

/** Exact wire shape of an emitted training example */
export interface TrainingRecord {
    label: string;
    bbox: [number, number, number, number];
    page_url: string;
    scroll_position: number;
    viewport_number: number;
    timestamp: string;
}

/** One executed navigation command */
export interface ActionRecord {
    type: 'click' | 'activate' | 'navigate';
    label: string;
    url: string;
    timestamp: string;
}

export interface DiscoveryAttempt {
    startUrl: string;
    visited: PageVisit[];
    outcome: AttemptOutcome;
    hopCount: number;
    terminalState: TerminalState;
    /** Short machine-readable reason, e.g. 'listing-reached', 'hop-budget', 'redirect-trap' */
    terminationReason: string;
    records: TrainingRecord[];
    navigationPath: ActionRecord[];
    startedAt: string;
    finishedAt: string;
    error?: string;
}
