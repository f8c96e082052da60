import type { ScraperConfig } from './config';
import { PlaywrightProvisioner, DriverProvisioner } from './driver/provisioner';
import { SessionManager } from './driver/session-manager';
import { TabExtractionEngine } from './extraction/engine';
import { PageNavigator } from './navigator';
import { BatchOrchestrator } from './orchestrator';
import { VideoScraper } from './scraper';
import { loadSelectors, ScraperSelectors, setSelectorsFile } from './selectors';
import type { ResultStore } from './store';
import { SurfaceLocator } from './surface';

export interface ScraperComponents {
    navigator: PageNavigator;
    surface: SurfaceLocator;
    engine: TabExtractionEngine;
    scraper: VideoScraper;
}

/**
 * Wire the per-video pipeline from configuration and selectors.
 */
export function createScraper(config: ScraperConfig, selectors: ScraperSelectors): ScraperComponents {
    const { timings, extraction } = config;

    const navigator = new PageNavigator({
        selectors,
        timings,
        attempts: extraction.navigationAttempts,
    });
    const surface = new SurfaceLocator({ selectors: selectors.surface, timings });
    const engine = new TabExtractionEngine({
        selectors: selectors.extraction,
        sectionHeaders: selectors.sectionHeaders,
        timings,
        minContentLength: extraction.minContentLength,
        surface,
    });
    const scraper = new VideoScraper({ navigator, surface, engine, debugDir: config.paths.debugDir });

    return { navigator, surface, engine, scraper };
}

export interface CreateOrchestratorOptions {
    store: ResultStore;
    signal?: AbortSignal;
    provisioner?: DriverProvisioner;
    selectors?: ScraperSelectors;
}

export function createSessionManager(config: ScraperConfig, provisioner: DriverProvisioner = new PlaywrightProvisioner()): SessionManager {
    return new SessionManager(provisioner, { shutdownDelayMs: config.timings.browserShutdown });
}

export function resolveSelectors(config: ScraperConfig): ScraperSelectors {
    if (config.selectorsFile) {
        setSelectorsFile(config.selectorsFile);
    }
    return loadSelectors();
}

export function createOrchestrator(config: ScraperConfig, options: CreateOrchestratorOptions): BatchOrchestrator {
    const selectors = options.selectors ?? resolveSelectors(config);
    const { scraper } = createScraper(config, selectors);
    return new BatchOrchestrator({
        sessions: createSessionManager(config, options.provisioner),
        scraper,
        store: options.store,
        profile: config.browser,
        maxRetries: config.extraction.maxRetries,
        timings: config.timings,
        keepAlive: config.keepAlive,
        signal: options.signal,
    });
}
