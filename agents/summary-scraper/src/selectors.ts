/**
 * Selector Configuration
 *
 * Loads selector lists from selectors.yaml. When the extension's UI changes,
 * update selectors.yaml instead of the extraction code.
 *
 * Every list is ordered: cheapest / most specific first, generic fallbacks last.
 * Selectors starting with `//` are XPath, everything else is CSS.
 *
 * @module selectors
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';
import { getLogger, toErrorMessage } from '@digest/shared';
import { SECTION_KINDS, SectionKind } from './types';

export interface PageSelectors {
    player: string;
    errorBanner: string;
    video: string;
}

export interface SurfaceSelectors {
    /** Candidate iframe selectors in priority order */
    iframes: string[];
    /** Value of the `id` attribute that identifies the extension iframe */
    iframeId: string;
    /** Selector whose matches are accepted without the id check */
    catchAll: string;
}

export interface ExtractionSelectors {
    tabs: string;
    content: string[];
    preflight: string[];
    triggers: string[];
}

export type SectionHeaders = Record<SectionKind, string[]>;

export interface ScraperSelectors {
    page: PageSelectors;
    surface: SurfaceSelectors;
    extraction: ExtractionSelectors;
    sectionHeaders: SectionHeaders;
}

// Default selectors (fallback if YAML fails to load)
export const defaultSelectors: ScraperSelectors = {
    page: {
        player: '#movie_player',
        errorBanner: "//div[contains(text(), 'Something went wrong')]",
        video: 'video',
    },
    surface: {
        iframes: [
            '#eightify-iframe',
            "iframe[title*='Eightify']",
            "iframe[src*='eightify']",
            'iframe.eightify',
            'iframe',
        ],
        iframeId: 'eightify-iframe',
        catchAll: 'iframe',
    },
    extraction: {
        tabs: ".SummaryTabsView_item__Zjswl, .SummaryTabsView_tabs__69LdY > div, button[role='tab'], .tab, div[role='tab']",
        content: [
            '.tab-content',
            '.SummaryTabsView_content__6OYs8',
            "[class*='content']",
            '.content',
            "[data-testid='content']",
            '.tab-panel',
            "[role='tabpanel']",
            "div[id*='panel']",
            "div[class*='panel']",
            'main',
            'body',
        ],
        preflight: [
            '.SummaryTabsView_content__6OYs8',
            "[class*='content']",
            '.tab-content',
        ],
        triggers: [
            "//button[contains(text(), 'Summarize Video')]",
            "//button[contains(text(), 'Summarize')]",
            "//button[contains(text(), 'Generate')]",
            "//button[.//span[contains(text(), 'Summarize')]]",
            "//div[@role='button' and contains(text(), 'Summarize')]",
            'button.SummaryButton_button__hMBbW',
            'button.summarize-button',
            'button.primary',
            'button.btn-primary',
            'button.cta',
            "div[role='button']",
        ],
    },
    sectionHeaders: {
        key_insights: ['Key Insights', 'Main Points', 'Key Points', 'Highlights'],
        timestamped_summary: ['Timestamped Summary', 'Summary', 'Video Summary', 'Timeline'],
        top_comments: ['Top Comments', 'Comments', 'User Comments', 'Best Comments'],
        transcript: ['Transcript', 'Full Transcript', 'Video Transcript', 'CC'],
    },
};

const selectorList = z.array(z.string().min(1)).min(1);

const selectorFileSchema = z.object({
    page: z.object({
        player: z.string(),
        errorBanner: z.string(),
        video: z.string(),
    }).partial().optional(),
    surface: z.object({
        iframes: selectorList,
        iframeId: z.string(),
        catchAll: z.string(),
    }).partial().optional(),
    extraction: z.object({
        tabs: z.string(),
        content: selectorList,
        preflight: selectorList,
        triggers: selectorList,
    }).partial().optional(),
    sectionHeaders: z.object({
        key_insights: selectorList,
        timestamped_summary: selectorList,
        top_comments: selectorList,
        transcript: selectorList,
    }).partial().optional(),
});

type SelectorFile = z.infer<typeof selectorFileSchema>;

function mergeSelectors(parsed: SelectorFile): ScraperSelectors {
    const headers = { ...defaultSelectors.sectionHeaders };
    for (const kind of SECTION_KINDS) {
        const aliases = parsed.sectionHeaders?.[kind];
        if (aliases) headers[kind] = aliases;
    }
    return {
        page: { ...defaultSelectors.page, ...parsed.page },
        surface: { ...defaultSelectors.surface, ...parsed.surface },
        extraction: { ...defaultSelectors.extraction, ...parsed.extraction },
        sectionHeaders: headers,
    };
}

let cachedSelectors: ScraperSelectors | null = null;
let selectorsFileOverride: string | undefined;

/**
 * Point the loader at a different YAML file (from configuration). Clears the cache.
 */
export function setSelectorsFile(file: string | undefined): void {
    selectorsFileOverride = file;
    cachedSelectors = null;
}

/**
 * Load selectors from YAML configuration file.
 * Falls back to hardcoded defaults if file is missing or invalid.
 */
export function loadSelectors(): ScraperSelectors {
    if (cachedSelectors) {
        return cachedSelectors;
    }

    const logger = getLogger();
    const yamlPath = selectorsFileOverride || path.join(__dirname, 'selectors.yaml');
    try {
        if (fs.existsSync(yamlPath)) {
            const content = fs.readFileSync(yamlPath, 'utf-8');
            const parsed = selectorFileSchema.safeParse(yaml.parse(content) ?? {});
            if (parsed.success) {
                cachedSelectors = mergeSelectors(parsed.data);
                logger.debug('[Selectors] Loaded', { file: yamlPath });
            } else {
                logger.error('[Selectors] Invalid selectors file, using defaults', {
                    file: yamlPath,
                    issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
                });
                cachedSelectors = defaultSelectors;
            }
        } else {
            logger.warn('[Selectors] selectors.yaml not found, using defaults', { file: yamlPath });
            cachedSelectors = defaultSelectors;
        }
    } catch (error) {
        logger.error('[Selectors] Failed to load selectors.yaml', { error: toErrorMessage(error) });
        cachedSelectors = defaultSelectors;
    }

    return cachedSelectors;
}

/**
 * Force reload of selectors from YAML file.
 */
export function reloadSelectors(): ScraperSelectors {
    cachedSelectors = null;
    return loadSelectors();
}
