import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { BrowserContext, Frame, Page } from 'playwright';
import { DriverHandle } from '../../src/driver/handle';

export interface MockElement {
    text?: string;
    visible?: boolean;
    attributes?: Record<string, string>;
    /** Returned by elementHandle().contentFrame() */
    frame?: MockFrame;
    onClick?: () => void;
    onScroll?: () => void;
    /** Rendered without a layout box: actionability-based scrolling times out */
    boxless?: boolean;
}

/** What a script passed to locator.evaluate() gets to touch */
export interface MockDomElement {
    scrollIntoView(options?: ScrollIntoViewOptions): void;
}

/**
 * A document whose contents tests swap out per selector. Once `detached` is
 * set every lookup inside it rejects, like a remounted iframe.
 */
export class MockFrame {
    detached = false;
    private readonly elements = new Map<string, MockElement[]>();

    constructor(readonly name: string = 'frame') { }

    set(selector: string, elements: MockElement[]): this {
        this.elements.set(selector, elements);
        return this;
    }

    get(selector: string): MockElement[] {
        return this.elements.get(selector) ?? [];
    }

    locator = vi.fn((selector: string) => createMockLocator(this, selector));

    isDetached = vi.fn(() => this.detached);
}

export interface MockLocator {
    count: Mock<() => Promise<number>>;
    isVisible: Mock<() => Promise<boolean>>;
    innerText: Mock<() => Promise<string>>;
    getAttribute: Mock<(name: string) => Promise<string | null>>;
    dispatchEvent: Mock<(type: string) => Promise<void>>;
    scrollIntoViewIfNeeded: Mock<() => Promise<void>>;
    evaluate: Mock<(fn: (element: MockDomElement) => unknown) => Promise<unknown>>;
    waitFor: Mock<() => Promise<void>>;
    elementHandle: Mock<() => Promise<{ contentFrame: () => Promise<MockFrame | null> }>>;
    first: Mock<() => MockLocator>;
    nth: Mock<(index: number) => MockLocator>;
}

/**
 * Locator that resolves lazily against the frame, so clicks that re-render
 * the frame are visible to locators created before them.
 */
export const createMockLocator = (frame: MockFrame, selector: string, index?: number): MockLocator => {
    const ensureAttached = () => {
        if (frame.detached) {
            throw new Error(`Frame "${frame.name}" was detached`);
        }
    };
    const target = () => frame.get(selector)[index ?? 0];
    const requireTarget = (): MockElement => {
        ensureAttached();
        const element = target();
        if (!element) {
            throw new Error(`No element for ${selector}${index === undefined ? '' : ` [${index}]`}`);
        }
        return element;
    };

    const locator: MockLocator = {
        count: vi.fn(async () => {
            ensureAttached();
            if (index === undefined) return frame.get(selector).length;
            return target() ? 1 : 0;
        }),
        isVisible: vi.fn(async () => {
            ensureAttached();
            const element = target();
            return element !== undefined && element.visible !== false;
        }),
        innerText: vi.fn(async () => requireTarget().text ?? ''),
        getAttribute: vi.fn(async (name: string) => requireTarget().attributes?.[name] ?? null),
        dispatchEvent: vi.fn(async (_type: string) => {
            requireTarget().onClick?.();
        }),
        scrollIntoViewIfNeeded: vi.fn(async () => {
            if (requireTarget().boxless) {
                throw new Error('locator.scrollIntoViewIfNeeded: Timeout 30000ms exceeded. element is not visible');
            }
        }),
        evaluate: vi.fn(async (fn: (element: MockDomElement) => unknown) => {
            const element = requireTarget();
            return fn({ scrollIntoView: () => element.onScroll?.() });
        }),
        waitFor: vi.fn(async () => {
            requireTarget();
        }),
        elementHandle: vi.fn(async () => {
            const element = requireTarget();
            return { contentFrame: async () => element.frame ?? null };
        }),
        first: vi.fn(() => createMockLocator(frame, selector, 0)),
        nth: vi.fn((i: number) => createMockLocator(frame, selector, i)),
    };

    return locator;
};

export const createMockPage = (main: MockFrame = new MockFrame('main')) => {
    let closed = false;
    const page = {
        main,
        mainFrame: vi.fn(() => main),
        locator: vi.fn((selector: string) => main.locator(selector)),
        goto: vi.fn().mockResolvedValue(null),
        reload: vi.fn().mockResolvedValue(null),
        evaluate: vi.fn().mockResolvedValue('about:blank'),
        isClosed: vi.fn(() => closed),
        close: vi.fn(async () => {
            closed = true;
        }),
        bringToFront: vi.fn().mockResolvedValue(undefined),
        content: vi.fn().mockResolvedValue('<html><body>debug</body></html>'),
        screenshot: vi.fn().mockResolvedValue(Buffer.from('')),
        url: vi.fn().mockReturnValue('about:blank'),
    };
    return page;
};

export type MockPage = ReturnType<typeof createMockPage>;

export const createMockContext = (pages: MockPage[] = []) => {
    const context = {
        openedPages: pages,
        pages: vi.fn(() => pages),
        newPage: vi.fn(async () => {
            const page = createMockPage();
            pages.push(page);
            return page;
        }),
        close: vi.fn().mockResolvedValue(undefined),
    };
    return context;
};

export type MockContext = ReturnType<typeof createMockContext>;

export const createMockHandle = (page: MockPage = createMockPage()) => {
    const context = createMockContext([page]);
    const handle = new DriverHandle(context as unknown as BrowserContext, page as unknown as Page);
    return { handle, page, context };
};

/** Point the handle's lookups at a mock frame, as entering the iframe would. */
export const useScope = (handle: DriverHandle, frame: MockFrame) => {
    handle.scope = frame as unknown as Frame;
};

export interface PanelOptions {
    /** Content is rendered before any trigger is clicked */
    pregenerated?: boolean;
    onSelect?: (index: number) => void;
}

/**
 * Extension panel with one tab per entry. The active tab shows its content in
 * `.content` once generated; `.summarize` generates the active tab.
 */
export const createPanel = (contents: string[], options: PanelOptions = {}) => {
    const frame = new MockFrame('extension');
    const generated = contents.map(() => options.pregenerated === true);
    let active = 0;

    const render = () => {
        frame.set('.tab', contents.map((_, i) => ({
            text: `Tab ${i + 1}`,
            onClick: () => {
                active = i;
                render();
                options.onSelect?.(i);
            },
        })));
        frame.set('.content', generated[active] ? [{ text: contents[active] }] : []);
        frame.set('.summarize', generated[active] ? [] : [{
            text: 'Summarize Video',
            onClick: () => {
                generated[active] = true;
                render();
            },
        }]);
        frame.set('body', [{ text: generated[active] ? `Tabs\n${contents[active]}` : 'Tabs' }]);
    };
    render();

    return {
        frame,
        get active() {
            return active;
        },
    };
};

/**
 * Mount `frame` as the extension iframe of the page's main document.
 */
export const mountExtension = (page: MockPage, frame: MockFrame, id: string = 'eightify-iframe') => {
    page.main.set('#eightify-iframe', [{ attributes: { id }, frame }]);
};
