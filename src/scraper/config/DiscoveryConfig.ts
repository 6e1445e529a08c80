import { JsonValidator, Validators, findInvalidKey, type Shape } from '../../shared/utils/index.js';
import { KEYWORDS, LIMITS, THRESHOLDS, TIMING } from './constants.js';

/**
 * Settings of one discovery run. Built once, deep-frozen, and passed into every component.
 */
export interface DiscoveryConfig {
    /** Career label term → weight in (0, 1] */
    readonly vocabulary: Readonly<Record<string, number>>;
    /** Hosts that end a navigation as redirect_unexpected */
    readonly redirectTrapDomains: readonly string[];
    /** Company host → URL of its separate career site */
    readonly careerDomainFallbacks: Readonly<Record<string, string>>;
    readonly maxHops: number;
    readonly maxScroll: number;
    readonly stepSize: number;
    readonly footerBiasedScan: boolean;
    readonly clickRetries: number;
    readonly operationTimeoutMs: number;
    readonly navigationTimeoutMs: number;
    readonly attemptTimeoutMs: number;
    readonly urlPollIntervalMs: number;
    readonly footerFraction: number;
    readonly footerBonus: number;
    readonly maxLabelWords: number;
    /** Regular expression sources tested against path + query */
    readonly listingUrlPatterns: readonly string[];
    readonly minJobPostings: number;
    readonly expandMenus: boolean;
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

/** Keys a config file or override may set */
export type DiscoveryConfigOverrides = Partial<Mutable<DiscoveryConfig>>;

export const DEFAULT_DISCOVERY_CONFIG: DiscoveryConfig = deepFreeze({
    vocabulary: KEYWORDS.CAREER_VOCABULARY,
    redirectTrapDomains: KEYWORDS.REDIRECT_TRAP_DOMAINS,
    careerDomainFallbacks: {},
    maxHops: LIMITS.MAX_HOPS,
    maxScroll: LIMITS.MAX_SCROLL,
    stepSize: LIMITS.STEP_SIZE,
    footerBiasedScan: true,
    clickRetries: LIMITS.CLICK_RETRIES,
    operationTimeoutMs: TIMING.OPERATION_TIMEOUT,
    navigationTimeoutMs: TIMING.NAVIGATION_TIMEOUT,
    attemptTimeoutMs: TIMING.ATTEMPT_TIMEOUT,
    urlPollIntervalMs: TIMING.URL_POLL_INTERVAL,
    footerFraction: THRESHOLDS.FOOTER_FRACTION,
    footerBonus: THRESHOLDS.FOOTER_BONUS,
    maxLabelWords: LIMITS.MAX_LABEL_WORDS,
    listingUrlPatterns: KEYWORDS.LISTING_URL_PATTERNS,
    minJobPostings: THRESHOLDS.MIN_JOB_POSTINGS,
    expandMenus: true,
});

const weight = (value: unknown): value is number =>
    typeof value === 'number' && value > 0 && value <= 1;

const regexSource = (value: unknown): value is string => {
    if (typeof value !== 'string') return false;
    try {
        new RegExp(value, 'i');
        return true;
    } catch {
        return false;
    }
};

const optional = Validators.optional;

const CONFIG_FILE_SHAPE: Shape<DiscoveryConfigOverrides> = {
    vocabulary: optional(Validators.record(weight)),
    redirectTrapDomains: optional(Validators.array(Validators.string)),
    careerDomainFallbacks: optional(Validators.record(Validators.string)),
    maxHops: optional(Validators.positiveInt),
    maxScroll: optional(Validators.nonNegativeInt),
    stepSize: optional(Validators.positiveInt),
    footerBiasedScan: optional(Validators.boolean),
    clickRetries: optional(Validators.nonNegativeInt),
    operationTimeoutMs: optional(Validators.positiveInt),
    navigationTimeoutMs: optional(Validators.positiveInt),
    attemptTimeoutMs: optional(Validators.positiveInt),
    urlPollIntervalMs: optional(Validators.positiveInt),
    footerFraction: optional(Validators.fraction),
    footerBonus: optional((value: unknown): value is number => typeof value === 'number' && value >= 1),
    maxLabelWords: optional(Validators.positiveInt),
    listingUrlPatterns: optional(Validators.array(regexSource)),
    minJobPostings: optional(Validators.positiveInt),
    expandMenus: optional(Validators.boolean),
};

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Read and validate a JSON config file. Throws ConfigError with the offending key.
 */
export function readConfigFile(filePath: string): DiscoveryConfigOverrides {
    const result = JsonValidator.parseFile(filePath, CONFIG_FILE_SHAPE);
    if (!result.success || !result.data) {
        throw new ConfigError(result.error ?? `Could not load config ${filePath}`);
    }
    return result.data;
}

/**
 * Recursively freeze an object graph
 */
export function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

function validateOverrides(value: unknown): void {
    if (!Validators.object(value)) {
        throw new ConfigError('Discovery config must be an object');
    }
    const badKey = findInvalidKey(value, CONFIG_FILE_SHAPE);
    if (badKey !== null) {
        throw new ConfigError(`Invalid value for "${badKey}"`);
    }
}

function stripUndefined(overrides: DiscoveryConfigOverrides): DiscoveryConfigOverrides {
    const result: DiscoveryConfigOverrides = {};
    for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined) {
            Object.assign(result, { [key]: value });
        }
    }
    return result;
}

/**
 * Layer defaults, an optional config file and explicit overrides, then freeze.
 * Host keys of careerDomainFallbacks are lower-cased with any leading www. removed.
 */
export function buildDiscoveryConfig(options: {
    configFile?: string;
    overrides?: DiscoveryConfigOverrides;
} = {}): DiscoveryConfig {
    const fromFile = options.configFile ? readConfigFile(options.configFile) : {};
    const fromOverrides = stripUndefined(options.overrides ?? {});

    const merged: Mutable<DiscoveryConfig> = {
        ...DEFAULT_DISCOVERY_CONFIG,
        ...stripUndefined(fromFile),
        ...fromOverrides,
    };

    validateOverrides(merged);

    const fallbacks: Record<string, string> = {};
    for (const [host, url] of Object.entries(merged.careerDomainFallbacks)) {
        fallbacks[normalizeHost(host)] = url;
    }

    return deepFreeze({
        ...merged,
        vocabulary: { ...merged.vocabulary },
        redirectTrapDomains: merged.redirectTrapDomains.map(normalizeHost),
        careerDomainFallbacks: fallbacks,
        listingUrlPatterns: [...merged.listingUrlPatterns],
    });
}

/** Lower-case host without a leading www. */
export function normalizeHost(host: string): string {
    return host.trim().toLowerCase().replace(/^www\./, '');
}
