import { Command } from 'commander';
import { CLIUtils, toErrorMessage } from '@digest/shared';
import { createOrchestrator } from '../app';
import { abortOnSignals, parseInteger, resolveConfig } from '../cli-utils';
import { loadUrls, ResultStore } from '../store';

interface RunOptions {
    input?: string;
    output?: string;
    keepAlive: boolean;
    maxRetries?: number;
}

export const runCommand = new Command('run')
    .description('Extract summaries for every URL in the input file')
    .option('-i, --input <file>', 'File with one video URL per line')
    .option('-o, --output <file>', 'JSON file results are written to')
    .option('--no-keep-alive', 'Close the browser as soon as the list is done')
    .option('--max-retries <n>', 'Retries per URL, each with a fresh browser', parseInteger)
    .action(async (options: RunOptions) => {
        try {
            const config = resolveConfig(c => ({
                ...c,
                keepAlive: c.keepAlive && options.keepAlive,
                paths: {
                    ...c.paths,
                    inputFile: options.input ?? c.paths.inputFile,
                    outputFile: options.output ?? c.paths.outputFile,
                },
                extraction: {
                    ...c.extraction,
                    maxRetries: options.maxRetries ?? c.extraction.maxRetries,
                },
            }));

            const urls = loadUrls(config.paths.inputFile);
            if (urls.length === 0) {
                CLIUtils.warn(`No URLs found. Add video URLs to ${config.paths.inputFile}, one per line.`);
                return;
            }

            const store = ResultStore.load(config.paths.outputFile);
            const { signal, dispose } = abortOnSignals();
            try {
                const summary = await createOrchestrator(config, { store, signal }).run(urls);
                CLIUtils.printTable(
                    ['Processed', 'Skipped', 'Succeeded', 'Failed'],
                    [[summary.processed, summary.skipped, summary.succeeded, summary.failed]]
                );
                CLIUtils.success(`Results saved to ${config.paths.outputFile}`);
                if (summary.failed > 0) {
                    process.exitCode = 1;
                }
            } finally {
                dispose();
            }
        } catch (e) {
            CLIUtils.error(toErrorMessage(e));
            process.exitCode = 1;
        }
    });
