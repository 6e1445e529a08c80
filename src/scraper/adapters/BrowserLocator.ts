import { BrowserElement } from './BrowserElement.js';

export interface BrowserLocator {
    /** Every element matched at the time of the call */
    all(): Promise<BrowserElement[]>;
}
