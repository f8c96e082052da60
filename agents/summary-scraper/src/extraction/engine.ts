/**
 * Tab Extraction Engine
 *
 * Walks the extension's tabbed panel inside the entered iframe and collects
 * the text of each logical section:
 *
 *   Idle -> ContentPreflighted -> TabsDiscovered -> PerTabGenerate -> PerTabExtract -> Merged -> Done
 *
 * A failing tab ends up `skipped` with empty text; nothing thrown inside a
 * tab step escapes `run()`. Passes are merged first-value-wins. Once the
 * iframe is lost for good the scope is the host page, so every later step
 * is skipped instead of reading or clicking the wrong document.
 */

import { getLogger, toErrorMessage } from '@digest/shared';
import type { Timings } from '../config';
import type { DriverHandle } from '../driver/handle';
import { ContextLostError } from '../errors';
import type { ExtractionSelectors, SectionHeaders } from '../selectors';
import type { SurfaceLocator } from '../surface';
import {
    EnginePhase,
    EngineReport,
    emptySections,
    SECTION_KINDS,
    SectionKind,
    TabOutcome,
} from '../types';
import { sleep } from '../utils';
import { countFilled, mergeSections, missingSections } from './result';
import { segmentSections } from './segmenter';

export interface TabExtractionEngineOptions {
    selectors: ExtractionSelectors;
    sectionHeaders: SectionHeaders;
    timings: Pick<Timings, 'processing' | 'stabilize' | 'scroll' | 'tabSettle' | 'tabContent'>;
    minContentLength: number;
    surface: SurfaceLocator;
}

interface ExtractedText {
    text: string;
    source: string;
}

type PartialSections = Partial<Record<SectionKind, string>>;

/** Number of content selectors tried before the generic ones */
const HIGH_PRIORITY_TIER = 3;

export class TabExtractionEngine {
    constructor(private readonly options: TabExtractionEngineOptions) { }

    async run(handle: DriverHandle): Promise<EngineReport> {
        const logger = getLogger();
        const report: EngineReport = {
            sections: emptySections(),
            preflighted: false,
            triggerClicked: false,
            tabCount: 0,
            tabs: [],
            missingTabs: [],
            phases: ['Idle'],
            surfaceLost: false,
        };

        report.preflighted = await this.preflight(handle);
        if (report.preflighted) {
            this.enter(report, 'ContentPreflighted');
            logger.info('Content already present - extracting without clicking buttons');
            report.sections = mergeSections(report.sections, await this.walkTabs(handle, report, false));
        }

        if (countFilled(report.sections) === 0 && !report.surfaceLost) {
            report.triggerClicked = await this.withRecovery(
                handle,
                report,
                'Main summarize button',
                () => this.clickFirstVisible(handle, this.options.selectors.triggers, 'main summarize button'),
                false
            );
            if (report.triggerClicked) {
                logger.info('Clicked main summarize button, waiting for generation');
                await sleep(this.options.timings.processing);
            }
            report.sections = mergeSections(report.sections, await this.walkTabs(handle, report, true));
        }

        report.missingTabs = missingSections(report.sections);
        if (report.missingTabs.length > 0 && !report.surfaceLost) {
            report.sections = mergeSections(report.sections, await this.directExtraction(handle, report));
            report.missingTabs = missingSections(report.sections);
        }

        this.enter(report, 'Merged');
        logger.info(`Extracted content for ${countFilled(report.sections)}/${SECTION_KINDS.length} sections`, {
            missing: report.missingTabs,
        });
        this.enter(report, 'Done');
        return report;
    }

    /**
     * Whether generated content is already rendered (e.g. on a reused session).
     */
    async preflight(handle: DriverHandle): Promise<boolean> {
        const { minContentLength } = this.options;
        for (const selector of this.options.selectors.preflight) {
            try {
                const elements = handle.scope.locator(selector);
                const count = await elements.count();
                for (let i = 0; i < count; i++) {
                    const element = elements.nth(i);
                    if (!await element.isVisible()) continue;
                    if ((await element.innerText()).trim().length > minContentLength) {
                        return true;
                    }
                }
            } catch (e) {
                getLogger().error('Error checking for existing content', { selector, error: toErrorMessage(e) });
            }
        }
        return false;
    }

    /**
     * Click the first visible match across the whole list, not just the first selector.
     */
    async clickFirstVisible(handle: DriverHandle, selectors: string[], purpose: string): Promise<boolean> {
        const logger = getLogger();
        for (const selector of selectors) {
            try {
                const buttons = handle.scope.locator(selector);
                const count = await buttons.count();
                for (let i = 0; i < count; i++) {
                    const button = buttons.nth(i);
                    if (!await button.isVisible()) continue;
                    // Direct event dispatch: no pointer movement, no actionability checks
                    await button.dispatchEvent('click');
                    logger.info(`Clicked ${purpose}`, { selector });
                    return true;
                }
            } catch (e) {
                this.rethrowIfContextLost(handle);
                logger.error(`Error with button selector ${selector} (${purpose})`, { error: toErrorMessage(e) });
            }
        }
        logger.warn(`Could not find button for ${purpose}`);
        return false;
    }

    /**
     * Content of the active tab: high-priority selectors, then the rest, then the whole body.
     */
    async extractContent(handle: DriverHandle, kind: SectionKind): Promise<ExtractedText | null> {
        const logger = getLogger();
        const { content } = this.options.selectors;
        const tiers = [content.slice(0, HIGH_PRIORITY_TIER), content.slice(HIGH_PRIORITY_TIER)];

        for (const tier of tiers) {
            for (const selector of tier) {
                const found = await this.firstVisibleText(handle, selector);
                if (found) {
                    logger.info(`Extracted content from ${kind} tab`, { selector, chars: found.length });
                    return { text: found, source: selector };
                }
            }
        }

        try {
            const body = (await handle.scope.locator('body').innerText()).trim();
            if (body.length > this.options.minContentLength) {
                logger.info(`Extracted content from ${kind} tab using body`, { chars: body.length });
                return { text: body, source: 'body' };
            }
        } catch (e) {
            this.rethrowIfContextLost(handle);
            logger.error('Error getting body text', { error: toErrorMessage(e) });
        }
        return null;
    }

    private async firstVisibleText(handle: DriverHandle, selector: string): Promise<string | null> {
        try {
            const elements = handle.scope.locator(selector);
            const count = await elements.count();
            for (let i = 0; i < count; i++) {
                const element = elements.nth(i);
                if (!await element.isVisible()) continue;
                const text = (await element.innerText()).trim();
                if (text.length > this.options.minContentLength) {
                    return text;
                }
            }
        } catch (e) {
            this.rethrowIfContextLost(handle);
            getLogger().error(`Error with content selector ${selector}`, { error: toErrorMessage(e) });
        }
        return null;
    }

    private async walkTabs(handle: DriverHandle, report: EngineReport, generate: boolean): Promise<PartialSections> {
        const logger = getLogger();
        const found: PartialSections = {};

        await sleep(this.options.timings.stabilize);

        const tabCount = await this.countTabs(handle, report);
        report.tabCount = tabCount;
        if (tabCount === 0) {
            logger.warn('No tabs found in the extension interface');
            return found;
        }
        this.enter(report, 'TabsDiscovered');

        // Never more sections than tabs physically present
        const bound = Math.min(tabCount, SECTION_KINDS.length);
        logger.info(`Found ${tabCount} tabs, processing ${bound}`);

        for (let index = 0; index < bound; index++) {
            const kind = SECTION_KINDS[index];
            logger.info(`Processing tab ${index + 1}/${bound}: ${kind}`);

            const skipped: TabOutcome = { kind, index, status: 'skipped', chars: 0 };
            if (report.surfaceLost) {
                logger.warn(`Skipping tab ${kind}: extension iframe is gone`);
                report.tabs.push(skipped);
                continue;
            }
            const { outcome, text } = await this.withRecovery(
                handle,
                report,
                `Tab ${kind}`,
                () => this.processTab(handle, report, index, kind, generate),
                { outcome: skipped, text: '' }
            );

            report.tabs.push(outcome);
            if (text) found[kind] = text;
            logger.info(`Completed tab ${kind}: ${outcome.status.toUpperCase()}`);
        }

        return found;
    }

    private async processTab(
        handle: DriverHandle,
        report: EngineReport,
        index: number,
        kind: SectionKind,
        generate: boolean
    ): Promise<{ outcome: TabOutcome; text: string }> {
        const { timings } = this.options;
        this.rethrowIfContextLost(handle);

        // Re-query every time: earlier clicks may have re-rendered the tab strip
        const tabs = handle.scope.locator(this.options.selectors.tabs);
        if (index >= await tabs.count()) {
            getLogger().warn(`Tab ${index} for ${kind} not found, skipping`);
            return { outcome: { kind, index, status: 'skipped', chars: 0 }, text: '' };
        }

        const tab = tabs.nth(index);
        // Script scroll: no actionability wait on tabs without a layout box
        await tab.evaluate(element => element.scrollIntoView({ block: 'center' }));
        await sleep(timings.scroll);
        await tab.dispatchEvent('click');
        await sleep(timings.tabSettle);

        if (generate) {
            this.enter(report, 'PerTabGenerate');
            await this.clickFirstVisible(handle, this.options.selectors.triggers, `'Summarize Video' in ${kind} tab`);
            await sleep(timings.tabContent);
        }

        this.enter(report, 'PerTabExtract');
        const extracted = await this.extractContent(handle, kind);
        if (!extracted) {
            return { outcome: { kind, index, status: 'empty', chars: 0 }, text: '' };
        }
        return {
            outcome: { kind, index, status: 'extracted', source: extracted.source, chars: extracted.text.length },
            text: extracted.text,
        };
    }

    private async countTabs(handle: DriverHandle, report: EngineReport): Promise<number> {
        return this.withRecovery(handle, report, 'Finding tabs', async () => {
            this.rethrowIfContextLost(handle);
            return handle.scope.locator(this.options.selectors.tabs).count();
        }, 0);
    }

    /**
     * Run one step; on context loss recover the iframe and run it once more.
     * Any other failure yields the fallback. A failed recovery marks the
     * report `surfaceLost`.
     */
    private async withRecovery<T>(
        handle: DriverHandle,
        report: EngineReport,
        label: string,
        step: () => Promise<T>,
        fallback: T
    ): Promise<T> {
        const logger = getLogger();
        try {
            return await step();
        } catch (e) {
            if (!(e instanceof ContextLostError) && !this.options.surface.isContextLost(handle)) {
                logger.error(`${label} failed`, { error: toErrorMessage(e) });
                return fallback;
            }
            logger.warn(`${label}: lost iframe context, recovering`);
            if (!await this.options.surface.recover(handle)) {
                report.surfaceLost = true;
                return fallback;
            }
            try {
                return await step();
            } catch (retryError) {
                logger.error(`${label} failed after context recovery`, { error: toErrorMessage(retryError) });
                return fallback;
            }
        }
    }

    /**
     * Fill still-empty sections by segmenting the whole iframe text on known headers.
     */
    private async directExtraction(handle: DriverHandle, report: EngineReport): Promise<PartialSections> {
        const logger = getLogger();
        const missing = report.missingTabs;
        logger.info('Trying direct extraction for missing sections', { missing });

        if (this.options.surface.isContextLost(handle)) {
            logger.warn('No longer in iframe context, attempting to recover...');
            if (!await this.options.surface.recover(handle)) {
                report.surfaceLost = true;
                logger.error('Failed to recover iframe context, skipping direct extraction');
                return {};
            }
        }

        let allContent: string;
        try {
            allContent = await handle.scope.locator('body').innerText();
        } catch (e) {
            logger.error('Error extracting body text', { error: toErrorMessage(e) });
            return {};
        }

        if (allContent.trim().length < this.options.minContentLength) {
            logger.warn('Body contains insufficient content for direct extraction');
            return {};
        }

        const segmented = segmentSections(allContent, missing, this.options.sectionHeaders, this.options.minContentLength);
        for (const kind of Object.keys(segmented)) {
            logger.info(`Extracted ${kind} through direct extraction`);
        }
        return segmented;
    }

    private rethrowIfContextLost(handle: DriverHandle): void {
        if (this.options.surface.isContextLost(handle)) {
            throw new ContextLostError();
        }
    }

    private enter(report: EngineReport, phase: EnginePhase): void {
        report.phases.push(phase);
        getLogger().debug(`Extraction phase: ${phase}`);
    }
}
