/** A menu toggle or other element located by selector */
export interface BrowserElement {
    /** Visible text, or the aria-label when the element has none */
    label(): Promise<string>;
    isVisible(): Promise<boolean>;
    click(options?: { timeout?: number }): Promise<void>;
}
