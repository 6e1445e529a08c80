import { Locator } from 'playwright';
import { BrowserLocator } from '../BrowserLocator.js';
import { BrowserElement } from '../BrowserElement.js';
import { PlaywrightElement } from './PlaywrightElement.js';

export class PlaywrightLocator implements BrowserLocator {
    constructor(private playwrightLocator: Locator) { }

    async all(): Promise<BrowserElement[]> {
        const matches = await this.playwrightLocator.all();
        return matches.map(match => new PlaywrightElement(match));
    }
}
