import * as fs from 'fs';
import { Command } from 'commander';
import { CLIUtils, toErrorMessage } from '@digest/shared';
import { resolveConfig } from '../cli-utils';
import { createInputFile } from '../store';

export const initCommand = new Command('init')
    .description('Create the input file with a placeholder header')
    .action(() => {
        try {
            const { paths } = resolveConfig();
            if (fs.existsSync(paths.inputFile)) {
                CLIUtils.info(`${paths.inputFile} already exists`);
                return;
            }
            if (createInputFile(paths.inputFile)) {
                CLIUtils.success(`Created ${paths.inputFile}`);
            } else {
                process.exitCode = 1;
            }
        } catch (e) {
            CLIUtils.error(toErrorMessage(e));
            process.exitCode = 1;
        }
    });
