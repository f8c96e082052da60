import { Command } from 'commander';
import { CLIUtils, toErrorMessage } from '@digest/shared';
import { resolveConfig } from '../cli-utils';
import { countFilled } from '../extraction/result';
import { loadUrls, ResultStore } from '../store';
import { SECTION_KINDS } from '../types';

export const statusCommand = new Command('status')
    .description('Show which URLs have stored results')
    .option('-o, --output <file>', 'Results file to inspect')
    .action((options: { output?: string }) => {
        try {
            const config = resolveConfig();
            const outputFile = options.output ?? config.paths.outputFile;
            const store = ResultStore.load(outputFile);

            CLIUtils.printTable(
                ['URL', 'Sections', ...SECTION_KINDS],
                store.entries().map(([url, sections]) => [
                    url,
                    `${countFilled(sections)}/${SECTION_KINDS.length}`,
                    ...SECTION_KINDS.map(kind => sections[kind].length),
                ])
            );

            const pending = loadUrls(config.paths.inputFile).filter(url => !store.has(url));
            CLIUtils.info(`${store.size} stored, ${pending.length} pending in ${config.paths.inputFile}`);
        } catch (e) {
            CLIUtils.error(toErrorMessage(e));
            process.exitCode = 1;
        }
    });
