import * as fs from 'fs';
import * as path from 'path';
import { AppError, getLogger, toErrorMessage } from '@digest/shared';
import type { DriverHandle } from './driver/handle';
import { ExtractionEmptyError } from './errors';
import type { TabExtractionEngine } from './extraction/engine';
import { buildResult, countFilled, DEFAULT_NEXT_STEPS, errorResult } from './extraction/result';
import type { PageNavigator } from './navigator';
import type { SurfaceLocator } from './surface';
import type { ExtractionResult } from './types';
import { extractVideoId } from './utils';

export interface VideoScraperOptions {
    navigator: PageNavigator;
    surface: SurfaceLocator;
    engine: TabExtractionEngine;
    /** Where page HTML and screenshots of failed videos go; unset disables dumps */
    debugDir?: string;
}

const NEXT_STEPS_BY_CODE: Record<string, string> = {
    NAVIGATION_FAILED: 'Check that the URL opens in a normal browser and that the network is reachable',
    SURFACE_NOT_FOUND: [
        '1. Verify the summary extension is installed and enabled in the browser profile',
        '2. Check the saved HTML and screenshots in the debug directory',
    ].join('\n'),
    PROVISION_FAILED: 'Close other browser windows using the profile and check the browser installation',
};

export function nextStepsFor(error: unknown): string {
    if (error instanceof AppError && NEXT_STEPS_BY_CODE[error.code]) {
        return NEXT_STEPS_BY_CODE[error.code];
    }
    return DEFAULT_NEXT_STEPS;
}

/**
 * One video: load the page, enter the extension surface, extract, build the result.
 * Never throws; failures come back as Error results.
 */
export class VideoScraper {
    constructor(private readonly options: VideoScraperOptions) { }

    async scrape(handle: DriverHandle, videoUrl: string): Promise<ExtractionResult> {
        const logger = getLogger();
        const { navigator, surface, engine } = this.options;

        try {
            const navigation = await navigator.load(handle, videoUrl);

            logger.info('Waiting for the extension to load...');
            if (!await navigator.waitForSurface(handle)) {
                logger.warn('Extension iframe did not appear, searching anyway');
            }

            const report = await surface.withSurface(handle, () => engine.run(handle));
            if (countFilled(report.sections) === 0) {
                throw new ExtractionEmptyError('Could not locate summary data');
            }

            const result = buildResult(navigation.url, report.sections);
            logger.info('Successfully extracted summary data', {
                sections: Object.fromEntries(Object.entries(result.sections).map(([kind, text]) => [kind, text.length])),
            });
            return result;
        } catch (e) {
            const message = toErrorMessage(e);
            logger.error('Extraction failed', { url: videoUrl, error: message });
            await this.dumpState(handle, videoUrl);
            return errorResult(videoUrl, message, nextStepsFor(e));
        }
    }

    /**
     * Save page HTML and a screenshot for a failed video. Never throws.
     */
    async dumpState(handle: DriverHandle, videoUrl: string): Promise<{ htmlPath: string; pngPath: string } | null> {
        const { debugDir } = this.options;
        if (!debugDir) return null;

        const prefix = `${extractVideoId(videoUrl)}_${Date.now()}`;
        const htmlPath = path.join(debugDir, `${prefix}.html`);
        const pngPath = path.join(debugDir, `${prefix}.png`);

        try {
            fs.mkdirSync(debugDir, { recursive: true });
            getLogger().info('Dumping page state', { htmlPath, pngPath });
            fs.writeFileSync(htmlPath, await handle.page.content(), 'utf-8');
            await handle.page.screenshot({ path: pngPath, fullPage: true });
            return { htmlPath, pngPath };
        } catch (e) {
            getLogger().warn('Failed to dump page state', { error: toErrorMessage(e) });
            return null;
        }
    }
}
