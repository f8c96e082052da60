import type { Page } from 'playwright';
import { getLogger, toErrorMessage } from '@digest/shared';
import type { Timings } from './config';
import type { DriverHandle } from './driver/handle';
import { NavigationError } from './errors';
import type { ScraperSelectors } from './selectors';
import type { NavigationOutcome } from './types';
import { pollUntil, sleep } from './utils';

const TIME_PARAM = /([?&])t=[^&#]*/;

/**
 * Force playback to start at 0: rewrite an existing `t` parameter or add one.
 */
export function normalizeVideoUrl(url: string): string {
    if (TIME_PARAM.test(url)) {
        return url.replace(TIME_PARAM, '$1t=0');
    }
    const hashIndex = url.indexOf('#');
    const base = hashIndex === -1 ? url : url.slice(0, hashIndex);
    const hash = hashIndex === -1 ? '' : url.slice(hashIndex);
    return `${base}${base.includes('?') ? '&' : '?'}t=0${hash}`;
}

export interface PageNavigatorOptions {
    selectors: ScraperSelectors;
    timings: Pick<Timings, 'load' | 'refresh' | 'extension'>;
    /** Loads of the page before giving up on the player (first load included) */
    attempts: number;
}

export class PageNavigator {
    constructor(private readonly options: PageNavigatorOptions) { }

    async load(handle: DriverHandle, url: string): Promise<NavigationOutcome> {
        const logger = getLogger();
        const target = normalizeVideoUrl(url);
        const { page } = handle;

        logger.info('Navigating', { url: target });
        try {
            await page.goto(target, { waitUntil: 'domcontentloaded' });
        } catch (e) {
            throw new NavigationError(`Error during navigation: ${toErrorMessage(e)}`, target);
        }

        const { attempts } = this.options;
        for (let attempt = 1; attempt <= attempts; attempt++) {
            const playerPresent = await this.waitForPlayer(page);
            const errorShown = await this.hasErrorBanner(page);

            if (playerPresent && !errorShown) {
                await this.resetPlayback(page);
                logger.info('Video loaded', { attempt });
                return { ready: true, url: target, attempts: attempt };
            }

            if (attempt < attempts) {
                logger.warn(`${errorShown ? 'Host error banner detected' : 'Timed out waiting for video player'} (attempt ${attempt}/${attempts}), refreshing...`);
                await this.reload(page);
            }
        }

        logger.warn('Video player not ready after retries, continuing anyway', { url: target });
        return { ready: false, url: target, attempts };
    }

    /**
     * Wait for the extension to inject its iframe; reload once if it never shows up.
     */
    async waitForSurface(handle: DriverHandle): Promise<boolean> {
        const logger = getLogger();
        const candidates = this.options.selectors.surface.iframes.slice(0, 3);
        const anyAttached = async (): Promise<boolean> => {
            for (const selector of candidates) {
                try {
                    if (await handle.page.locator(selector).count() > 0) return true;
                } catch (e) {
                    logger.debug('Iframe probe failed', { selector, error: toErrorMessage(e) });
                }
            }
            return false;
        };

        if (await pollUntil(anyAttached, this.options.timings.extension)) {
            return true;
        }

        logger.warn('Extension not detected, trying page refresh...');
        await this.reload(handle.page);
        return pollUntil(anyAttached, this.options.timings.extension);
    }

    private async waitForPlayer(page: Page): Promise<boolean> {
        try {
            await page.locator(this.options.selectors.page.player).first()
                .waitFor({ state: 'attached', timeout: this.options.timings.load });
            return true;
        } catch {
            return false;
        }
    }

    private async hasErrorBanner(page: Page): Promise<boolean> {
        try {
            const banner = page.locator(this.options.selectors.page.errorBanner).first();
            return await banner.count() > 0 && await banner.isVisible();
        } catch {
            return false;
        }
    }

    private async resetPlayback(page: Page): Promise<void> {
        try {
            await page.evaluate((selector) => {
                const video = document.querySelector(selector);
                if (!(video instanceof HTMLVideoElement)) {
                    throw new Error(`No video element for ${selector}`);
                }
                video.currentTime = 0;
            }, this.options.selectors.page.video);
            getLogger().debug('Reset video position to beginning');
        } catch (e) {
            getLogger().warn('Could not reset video time', { error: toErrorMessage(e) });
        }
    }

    private async reload(page: Page): Promise<void> {
        try {
            await page.reload({ waitUntil: 'domcontentloaded' });
        } catch (e) {
            getLogger().warn('Page refresh failed', { error: toErrorMessage(e) });
        }
        await sleep(this.options.timings.refresh);
    }
}
