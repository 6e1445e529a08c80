/**
 * Centralized constants for the discovery engine.
 * DiscoveryConfig defaults are built from these.
 */

// ============================================================
// TIMING CONSTANTS (milliseconds)
// ============================================================

export const TIMING = {
    /** Timeout for scroll, query and click calls */
    OPERATION_TIMEOUT: 5000,

    /** Timeout for a page render */
    NAVIGATION_TIMEOUT: 15000,

    /** Wall-clock budget of one attempt */
    ATTEMPT_TIMEOUT: 120000,

    /** Interval between URL checks while a navigation settles */
    URL_POLL_INTERVAL: 250,

    /** Wait after a scroll so lazy content can attach */
    SCROLL_SETTLE_DELAY: 400,

    /** Wait after a render before the first query */
    RENDER_SETTLE_DELAY: 1000,

    /** Wait for menu animations */
    MENU_ANIMATION_DELAY: 500,
} as const;

// ============================================================
// LIMITS
// ============================================================

export const LIMITS = {
    /** Default hop budget */
    MAX_HOPS: 4,

    /** Default deepest scroll offset (px) */
    MAX_SCROLL: 10000,

    /** Default scroll step (px) */
    STEP_SIZE: 800,

    /** Candidates tried on a page after the first one fails */
    CLICK_RETRIES: 3,

    /** Link labels longer than this are treated as prose */
    MAX_LABEL_WORDS: 6,

    /** Posting titles longer than this are not counted */
    MAX_POSTING_WORDS: 12,

    /** Menu toggles opened per page */
    MENU_TOGGLE_SAMPLES: 8,

    /** Hard cap on state machine steps per attempt */
    MAX_ENGINE_STEPS: 500,

    /** Longest text the renderer reports for one element */
    ELEMENT_TEXT_MAX_LENGTH: 200,
} as const;

// ============================================================
// THRESHOLDS
// ============================================================

export const THRESHOLDS = {
    /** Lower fraction of the page that counts as footer */
    FOOTER_FRACTION: 0.3,

    /** Score multiplier for candidates in the footer region */
    FOOTER_BONUS: 1.5,

    /** Distinct posting titles that mark a listing page */
    MIN_JOB_POSTINGS: 3,

    /** Shortest text allowed to match as a fragment of a vocabulary term */
    MIN_FRAGMENT_LENGTH: 4,

    /** Maximum label length for ActionRecord */
    LABEL_MAX_LENGTH: 60,
} as const;

// ============================================================
// DOMAIN KEYWORDS
// ============================================================

export const KEYWORDS = {
    /** Career link labels with their weights */
    CAREER_VOCABULARY: {
        'careers': 1.0,
        'jobs': 1.0,
        'career opportunities': 0.9,
        'join us': 0.5,
        'work with us': 0.5,
        'open positions': 0.8,
        'job openings': 0.8,
        'current openings': 0.8,
        'find jobs': 0.8,
        'search jobs': 0.8,
        'view jobs': 0.8,
        'early careers': 0.7,
        'join our team': 0.6,
        'vacancies': 0.6,
        'hiring': 0.5,
        'internships': 0.4,
        'employment': 0.4,
        'opportunities': 0.3,
    },

    /** Path fragments of job search and listing pages */
    LISTING_URL_PATTERNS: [
        '/jobs/search',
        '/search-jobs',
        '/job-search',
        '/jobs/results',
        '/listings',
        '/open-positions',
        '/openings',
        '/positions',
        '/vacancies',
        '/jobs\\?',
    ],

    /** Words typical of a job posting title */
    JOB_TITLE_TERMS: [
        'engineer',
        'manager',
        'developer',
        'designer',
        'analyst',
        'scientist',
        'specialist',
        'director',
        'coordinator',
        'associate',
        'consultant',
        'architect',
        'administrator',
        'intern',
        'technician',
        'representative',
        'lead',
        'officer',
        'assistant',
        'accountant',
        'recruiter',
    ],

    /** Hosts that swallow navigation (login walls, consent pages) */
    REDIRECT_TRAP_DOMAINS: [
        'accounts.google.com',
        'login.microsoftonline.com',
        'consent.google.com',
        'consent.yahoo.com',
    ],

    /** ARIA roles of elements that navigate when activated */
    LINK_ROLES: ['link', 'button', 'menuitem'],

    /** Menu toggles that are never opened */
    EXCLUDED_TOGGLE_KEYWORDS: [
        'profile',
        'settings',
        'theme',
        'logout',
        'language',
        'search',
    ],
} as const;

// ============================================================
// SELECTORS
// ============================================================

export const SELECTORS = {
    /** Elements reported by queryVisibleElements */
    VISIBLE_ELEMENTS: [
        'a',
        'button',
        '[role="link"]',
        '[role="button"]',
        '[role="menuitem"]',
        'h1', 'h2', 'h3', 'h4',
        'li',
        'td',
    ],

    /** Collapsed header and navigation menus */
    EXPANDABLE_MENUS: [
        'header button[aria-expanded="false"]',
        'nav button[aria-expanded="false"]',
        'header a[aria-expanded="false"]',
        'nav a[aria-expanded="false"]',
        'button[aria-label*="menu" i][aria-expanded="false"]',
    ],

    /** Targets of synthetic activation */
    ACTIVATABLE: 'a, button, [role="link"], [role="button"], [role="menuitem"]',
} as const;
