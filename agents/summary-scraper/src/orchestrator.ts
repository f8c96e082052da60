import { getLogger, toErrorMessage } from '@digest/shared';
import type { BrowserProfile, Timings } from './config';
import type { DriverHandle } from './driver/handle';
import type { SessionManager } from './driver/session-manager';
import { countFilled, errorResult } from './extraction/result';
import { nextStepsFor } from './scraper';
import type { ResultStore } from './store';
import { ExtractionResult, SECTION_KINDS } from './types';
import { sleep, sleepUntilAborted } from './utils';

export interface UrlScraper {
    scrape(handle: DriverHandle, videoUrl: string): Promise<ExtractionResult>;
}

export interface BatchOrchestratorOptions {
    sessions: SessionManager;
    scraper: UrlScraper;
    store: ResultStore;
    profile: BrowserProfile;
    maxRetries: number;
    timings: Pick<Timings, 'retryBackoff' | 'hygiene' | 'keepAlivePoll'>;
    keepAlive: boolean;
    /** Stops the run between URLs and ends the keep-alive wait */
    signal?: AbortSignal;
}

export interface RunSummary {
    processed: number;
    skipped: number;
    succeeded: number;
    failed: number;
    results: ExtractionResult[];
}

export function isSuccessful(result: ExtractionResult): boolean {
    return result.status === 'Success' || countFilled(result.sections) > 0;
}

/**
 * Runs the URL list against one browser session at a time, persisting after
 * every URL so an interrupted run resumes where it stopped.
 */
export class BatchOrchestrator {
    constructor(private readonly options: BatchOrchestratorOptions) { }

    async run(urls: string[]): Promise<RunSummary> {
        const logger = getLogger();
        const { store, sessions, signal } = this.options;
        const summary: RunSummary = { processed: 0, skipped: 0, succeeded: 0, failed: 0, results: [] };

        try {
            for (let i = 0; i < urls.length; i++) {
                const url = urls[i];
                const label = `[${i + 1}/${urls.length}]`;

                if (signal?.aborted) {
                    logger.warn('Run interrupted, stopping before next URL');
                    break;
                }

                if (store.has(url)) {
                    logger.warn(`${label} Skipping already processed URL: ${url}`);
                    summary.skipped++;
                    continue;
                }

                logger.info(`${label} Processing: ${url}`);
                const result = await this.processUrl(url);

                store.set(url, result.sections);
                store.save();

                summary.processed++;
                summary.results.push(result);

                const success = isSuccessful(result);
                if (success) {
                    summary.succeeded++;
                    logger.info(`${label} Successfully extracted data for ${url}`, {
                        sections: `${countFilled(result.sections)}/${SECTION_KINDS.length}`,
                    });
                } else {
                    summary.failed++;
                    logger.error(`${label} Failed to extract data for ${url}`, { message: result.message });
                }

                if (!success || i === urls.length - 1) continue;
                await this.prepareForNextUrl();
            }

            if (this.options.keepAlive) {
                await this.keepAlive();
            }
        } catch (e) {
            logger.error('Error in main program', {
                error: toErrorMessage(e),
                stack: e instanceof Error ? e.stack : undefined,
            });
        } finally {
            await sessions.release();
        }

        logger.info('Run finished', {
            processed: summary.processed,
            skipped: summary.skipped,
            succeeded: summary.succeeded,
            failed: summary.failed,
        });
        return summary;
    }

    /**
     * First attempt reuses the session; every retry starts a brand-new browser.
     */
    async processUrl(url: string): Promise<ExtractionResult> {
        const logger = getLogger();
        const { sessions, scraper, profile, maxRetries, timings } = this.options;

        let result = errorResult(url, 'Not attempted');
        for (let attempt = 0; attempt <= maxRetries; attempt++) {
            if (attempt > 0) {
                logger.info(`Retry attempt ${attempt}/${maxRetries} for ${url}`);
                await sleep(timings.retryBackoff);
                await sessions.release();
            }

            try {
                const handle = await sessions.acquire(profile, attempt > 0);
                result = await scraper.scrape(handle, url);
            } catch (e) {
                logger.error('Error during extraction', { url, attempt, error: toErrorMessage(e) });
                result = errorResult(url, `Extraction failed after ${attempt + 1} attempt(s): ${toErrorMessage(e)}`, nextStepsFor(e));
            }

            if (isSuccessful(result)) {
                return result;
            }
            logger.warn(`Extraction failed: ${result.message || 'No error message'}`);
        }
        return result;
    }

    /**
     * Swap the working tab for a blank one. If that fails the session is torn
     * down so the next URL gets a clean browser.
     */
    async prepareForNextUrl(): Promise<boolean> {
        const logger = getLogger();
        const { sessions, timings } = this.options;
        const handle = sessions.current;
        if (!handle) return false;

        try {
            logger.info('Creating a clean new tab for next URL...');
            const previous = handle.page;
            const fresh = await handle.context.newPage();
            await sleep(timings.hygiene);
            await previous.close();
            await fresh.bringToFront();
            handle.usePage(fresh);
            await sleep(timings.hygiene);
            return true;
        } catch (e) {
            logger.error('Error preparing browser for next URL', { error: toErrorMessage(e) });
            await sessions.release(handle);
            logger.warn('Browser reset for next URL');
            return false;
        }
    }

    /**
     * Hold the browser open until interrupted or closed from outside.
     */
    async keepAlive(): Promise<void> {
        const logger = getLogger();
        const { sessions, signal, timings } = this.options;
        const handle = sessions.current;
        if (!handle) return;

        logger.info('Browser is open - press Ctrl+C to close it');
        while (!signal?.aborted) {
            await sleepUntilAborted(timings.keepAlivePoll, signal);
            if (signal?.aborted) {
                logger.info('Interrupt received, closing browser');
                break;
            }
            if (!await handle.isResponsive()) {
                logger.warn('Browser was closed externally');
                break;
            }
            logger.debug('Browser still open', { url: handle.page.url() });
        }
    }
}
