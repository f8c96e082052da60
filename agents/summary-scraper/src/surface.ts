import { getLogger, toErrorMessage } from '@digest/shared';
import type { Timings } from './config';
import type { DriverHandle } from './driver/handle';
import { SurfaceNotFoundError } from './errors';
import type { SurfaceSelectors } from './selectors';
import { sleep } from './utils';

export interface SurfaceLocatorOptions {
    selectors: SurfaceSelectors;
    timings: Pick<Timings, 'recovery'>;
}

/**
 * Finds the extension's injected iframe and moves the handle's scope into it.
 *
 * Whoever enters the surface must leave it on every exit path; `withSurface`
 * does that for a block of work.
 */
export class SurfaceLocator {
    constructor(private readonly options: SurfaceLocatorOptions) { }

    async enterSurface(handle: DriverHandle): Promise<boolean> {
        this.exitSurface(handle);
        return this.search(handle, this.options.selectors.iframes);
    }

    /**
     * Back to the top-level document, then retry with the most specific selector only.
     */
    async recover(handle: DriverHandle): Promise<boolean> {
        const logger = getLogger();
        this.exitSurface(handle);
        await sleep(this.options.timings.recovery);
        const recovered = await this.search(handle, this.options.selectors.iframes.slice(0, 1));
        if (recovered) {
            logger.info('Successfully switched back to iframe context');
        } else {
            logger.error('Failed to recover iframe context');
        }
        return recovered;
    }

    exitSurface(handle: DriverHandle): void {
        handle.scope = handle.page.mainFrame();
    }

    isContextLost(handle: DriverHandle): boolean {
        return handle.scope.isDetached();
    }

    async withSurface<T>(handle: DriverHandle, work: () => Promise<T>): Promise<T> {
        try {
            if (!await this.enterSurface(handle)) {
                throw new SurfaceNotFoundError('Could not locate the extension iframe');
            }
            return await work();
        } finally {
            this.exitSurface(handle);
        }
    }

    private async search(handle: DriverHandle, selectors: string[]): Promise<boolean> {
        const logger = getLogger();
        const { iframeId, catchAll } = this.options.selectors;

        for (const selector of selectors) {
            let count: number;
            const matches = handle.page.locator(selector);
            try {
                count = await matches.count();
            } catch (e) {
                logger.error(`Error with iframe selector ${selector}`, { error: toErrorMessage(e) });
                continue;
            }
            logger.debug(`Found ${count} iframes with selector: ${selector}`);

            for (let i = 0; i < count; i++) {
                const candidate = matches.nth(i);
                try {
                    if (!await candidate.isVisible()) continue;
                    const id = await candidate.getAttribute('id');
                    if (id !== iframeId && selector !== catchAll) continue;

                    const element = await candidate.elementHandle();
                    const frame = await element.contentFrame();
                    if (!frame) continue;

                    handle.scope = frame;
                    logger.info('Entered extension iframe', { selector, id });
                    return true;
                } catch (e) {
                    logger.error('Error processing iframe', { selector, index: i, error: toErrorMessage(e) });
                }
            }
        }

        return false;
    }
}
