import { Command } from 'commander';
import { CLIUtils, toErrorMessage } from '@digest/shared';
import { createScraper, createSessionManager, resolveSelectors } from '../app';
import { resolveConfig } from '../cli-utils';
import type { SessionManager } from '../driver/session-manager';
import { ResultStore } from '../store';

interface ExtractOptions {
    save?: boolean;
}

export const extractCommand = new Command('extract')
    .description('Extract the summary of a single video and print it as JSON')
    .argument('<url>', 'Video URL')
    .option('--save', 'Also store the sections in the results file', false)
    .action(async (url: string, options: ExtractOptions) => {
        let sessions: SessionManager | null = null;
        try {
            const config = resolveConfig();
            const { scraper } = createScraper(config, resolveSelectors(config));
            sessions = createSessionManager(config);

            const handle = await sessions.acquire(config.browser);
            const result = await scraper.scrape(handle, url);
            console.log(JSON.stringify(result, null, 2));

            if (options.save) {
                const store = ResultStore.load(config.paths.outputFile);
                store.set(url, result.sections);
                if (store.save()) {
                    CLIUtils.success(`Saved to ${config.paths.outputFile}`);
                }
            }
            if (result.status === 'Error') {
                process.exitCode = 1;
            }
        } catch (e) {
            CLIUtils.error(toErrorMessage(e));
            process.exitCode = 1;
        } finally {
            await sessions?.release();
        }
    });
