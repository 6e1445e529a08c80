import type { Point, VisibleElement } from '../../../types/index.js';
import { CancelToken } from '../lib/CancelToken.js';

/**
 * Per-call options. Every renderer interaction is a suspension point with its own timeout.
 */
export interface RendererCallOptions {
    timeoutMs: number;
    token?: CancelToken;
}

/** Where a scroll ended up; browsers clamp at the bottom of the page */
export interface ScrollState {
    offset: number;
    viewportHeight: number;
}

/**
 * Capability set the discovery engine consumes from a browser driver.
 *
 * Implementations throw FatalRendererError for crashes or closed targets.
 * A `false` click or activate means the action could not be delivered but the page is still usable.
 */
export interface Renderer {
    /** Navigate to url and wait for the page to settle */
    render(url: string, options: RendererCallOptions): Promise<void>;
    scrollTo(offset: number, options: RendererCallOptions): Promise<ScrollState>;
    currentPageHeight(options: RendererCallOptions): Promise<number>;
    /** Elements at least partially inside the viewport, boxes clamped to it */
    queryVisibleElements(options: RendererCallOptions): Promise<VisibleElement[]>;
    /** Coordinate click */
    click(point: Point, options: RendererCallOptions): Promise<boolean>;
    /** Synthetic activation of the element under point (no pointer events) */
    activate(point: Point, options: RendererCallOptions): Promise<boolean>;
    /** Open collapsed header/nav menus, returns how many were expanded */
    expandMenus(options: RendererCallOptions): Promise<number>;
    currentUrl(): string;
    wait(ms: number): Promise<void>;
}
