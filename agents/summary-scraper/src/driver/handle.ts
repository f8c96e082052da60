import type { BrowserContext, Frame, Page } from 'playwright';

let handleCounter = 0;

/**
 * One live browser session.
 *
 * `scope` is the frame every lookup runs against: the top-level document by
 * default, the extension iframe while the surface is entered.
 */
export class DriverHandle {
    readonly id: string;
    readonly createdAt: number;
    scope: Frame;

    constructor(readonly context: BrowserContext, public page: Page) {
        handleCounter += 1;
        this.id = `driver-${handleCounter}-${Math.random().toString(36).substring(2, 7)}`;
        this.createdAt = Date.now();
        this.scope = page.mainFrame();
    }

    /**
     * Cheap liveness probe: reads the current location through the page.
     */
    async isResponsive(): Promise<boolean> {
        if (this.page.isClosed()) return false;
        try {
            await this.page.evaluate(() => window.location.href);
            return true;
        } catch {
            return false;
        }
    }

    /** Replace the working page (after tab hygiene) and reset the scope to it. */
    usePage(page: Page): void {
        this.page = page;
        this.scope = page.mainFrame();
    }

    async close(): Promise<void> {
        await this.context.close();
    }
}
