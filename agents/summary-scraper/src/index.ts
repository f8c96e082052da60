/**
 * Summary Scraper
 *
 * Drives a browser across a list of video URLs and collects the sections the
 * summary extension renders in its iframe.
 */

export * from './types';
export * from './errors';
export { APP_NAME, configSchema, loadConfig } from './config';
export type { ScraperConfig, Timings, BrowserProfile } from './config';
export { defaultSelectors, loadSelectors, reloadSelectors, setSelectorsFile } from './selectors';
export type { ScraperSelectors, PageSelectors, SurfaceSelectors, ExtractionSelectors, SectionHeaders } from './selectors';
export { DriverHandle } from './driver/handle';
export { PlaywrightProvisioner, closeExistingBrowsers } from './driver/provisioner';
export type { DriverProvisioner } from './driver/provisioner';
export { SessionManager } from './driver/session-manager';
export { PageNavigator, normalizeVideoUrl } from './navigator';
export { SurfaceLocator } from './surface';
export { TabExtractionEngine } from './extraction/engine';
export { segmentSections } from './extraction/segmenter';
export { structureTranscript, isTimestampLine } from './extraction/transcript';
export { buildResult, errorResult, mergeSections, missingSections, countFilled, deriveStatus } from './extraction/result';
export { VideoScraper, nextStepsFor } from './scraper';
export { ResultStore, loadUrls, createInputFile, INPUT_PLACEHOLDER } from './store';
export { BatchOrchestrator, isSuccessful } from './orchestrator';
export type { RunSummary, UrlScraper, BatchOrchestratorOptions } from './orchestrator';
export { createScraper, createOrchestrator, createSessionManager, resolveSelectors } from './app';
export { extractVideoId } from './utils';
