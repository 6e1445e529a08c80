import { Locator } from 'playwright';
import { BrowserElement } from '../BrowserElement.js';

export class PlaywrightElement implements BrowserElement {
    constructor(private target: Locator) { }

    async label(): Promise<string> {
        const text = (await this.target.innerText()).trim();
        return text || (await this.target.getAttribute('aria-label')) || '';
    }

    async isVisible(): Promise<boolean> {
        return await this.target.isVisible();
    }

    async click(options?: { timeout?: number }): Promise<void> {
        await this.target.click(options);
    }
}
