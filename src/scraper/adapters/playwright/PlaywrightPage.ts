import { Page } from 'playwright';
import { BrowserPage, NavigationOptions, PageArgs } from '../BrowserPage.js';
import { PlaywrightLocator } from './PlaywrightLocator.js';
import { BrowserLocator } from '../BrowserLocator.js';

export class PlaywrightPage implements BrowserPage {
    constructor(private readonly page: Page) { }

    locator(selector: string): BrowserLocator {
        return new PlaywrightLocator(this.page.locator(selector));
    }

    url(): string {
        return this.page.url();
    }

    async goto(url: string, options?: NavigationOptions): Promise<void> {
        await this.page.goto(url, options);
    }

    async evaluate<R>(fn: (args: PageArgs) => R | Promise<R>, args: PageArgs = { numbers: [], text: '' }): Promise<R> {
        return await this.page.evaluate(fn, args);
    }

    async waitForLoadState(state: 'load' | 'domcontentloaded' | 'networkidle', options?: { timeout?: number }): Promise<void> {
        await this.page.waitForLoadState(state, options);
    }

    async waitForTimeout(timeout: number): Promise<void> {
        await this.page.waitForTimeout(timeout);
    }

    async mouseClick(x: number, y: number): Promise<void> {
        await this.page.mouse.click(x, y);
    }

    onPopup(listener: (popup: BrowserPage) => void): () => void {
        const handler = (popup: Page) => listener(new PlaywrightPage(popup));
        this.page.on('popup', handler);
        return () => {
            this.page.off('popup', handler);
        };
    }

    async close(): Promise<void> {
        await this.page.close();
    }

    isClosed(): boolean {
        return this.page.isClosed();
    }
}
