import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import { ConfigLoader } from '@digest/shared';

export const APP_NAME = 'summary-scraper';

const timingsSchema = z.object({
    /** Upper bound for the player element to appear */
    load: z.coerce.number().int().nonnegative().default(15000),
    /** Upper bound for the extension iframe to be injected */
    extension: z.coerce.number().int().nonnegative().default(10000),
    /** Pause after the main "summarize" trigger */
    processing: z.coerce.number().int().nonnegative().default(20000),
    tabSettle: z.coerce.number().int().nonnegative().default(2000),
    tabContent: z.coerce.number().int().nonnegative().default(5000),
    stabilize: z.coerce.number().int().nonnegative().default(5000),
    recovery: z.coerce.number().int().nonnegative().default(1000),
    scroll: z.coerce.number().int().nonnegative().default(500),
    refresh: z.coerce.number().int().nonnegative().default(5000),
    retryBackoff: z.coerce.number().int().nonnegative().default(5000),
    hygiene: z.coerce.number().int().nonnegative().default(2000),
    keepAlivePoll: z.coerce.number().int().positive().default(5000),
    browserShutdown: z.coerce.number().int().nonnegative().default(2000),
});

export const configSchema = z.object({
    paths: z.object({
        inputFile: z.string().default('video_urls.txt'),
        outputFile: z.string().default('summary_data.json'),
        debugDir: z.string().default('debug'),
    }).default({}),
    browser: z.object({
        userDataDir: z.string().default(path.join(os.homedir(), '.config', APP_NAME, 'user-data')),
        channel: z.string().default('chrome'),
        executablePath: z.string().optional(),
        extensionPath: z.string().optional(),
        headless: z.boolean().default(false),
        closeExisting: z.boolean().default(true),
        processName: z.string().default('chrome'),
    }).default({}),
    timings: timingsSchema.default({}),
    extraction: z.object({
        minContentLength: z.coerce.number().int().nonnegative().default(50),
        maxRetries: z.coerce.number().int().nonnegative().default(2),
        navigationAttempts: z.coerce.number().int().positive().default(3),
    }).default({}),
    keepAlive: z.boolean().default(true),
    selectorsFile: z.string().optional(),
});

export type ScraperConfig = z.infer<typeof configSchema>;
export type Timings = z.infer<typeof timingsSchema>;
export type BrowserProfile = ScraperConfig['browser'];

export function loadConfig(profile?: string): ScraperConfig {
    const loader = new ConfigLoader({ schema: configSchema, appName: APP_NAME, profile });
    return loader.load();
}
