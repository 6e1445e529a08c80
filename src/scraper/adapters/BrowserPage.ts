import { BrowserLocator } from './BrowserLocator.js';

export interface NavigationOptions {
    waitUntil?: 'load' | 'domcontentloaded' | 'networkidle' | 'commit';
    timeout?: number;
}

/** Serializable arguments handed to a function evaluated in the page */
export interface PageArgs {
    numbers: number[];
    text: string;
}

/** The slice of a browser tab the renderer drives */
export interface BrowserPage {
    locator(selector: string): BrowserLocator;
    url(): string;
    goto(url: string, options?: NavigationOptions): Promise<void>;
    /** Run a self-contained fn inside the page; it cannot see variables of this module */
    evaluate<R>(fn: (args: PageArgs) => R | Promise<R>, args?: PageArgs): Promise<R>;
    waitForLoadState(state: 'load' | 'domcontentloaded' | 'networkidle', options?: { timeout?: number }): Promise<void>;
    waitForTimeout(timeout: number): Promise<void>;
    isClosed(): boolean;
    /** Left click at viewport coordinates */
    mouseClick(x: number, y: number): Promise<void>;
    /** Listen for tabs this page opens; returns the unsubscribe function */
    onPopup(listener: (popup: BrowserPage) => void): () => void;
    close(): Promise<void>;
}
