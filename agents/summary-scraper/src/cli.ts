#!/usr/bin/env node
import { CLIUtils, toErrorMessage } from '@digest/shared';
import { cliContext } from './cli-context';
import { APP_NAME } from './config';
import { extractCommand } from './commands/extract';
import { initCommand } from './commands/init';
import { runCommand } from './commands/run';
import { statusCommand } from './commands/status';

const program = CLIUtils.createProgram(APP_NAME, 'Collect AI video summaries from the browser extension', '1.0.0');

program
    .option('--config-profile <name>', 'Configuration profile (config.<name>.yaml)')
    .option('-v, --verbose', 'Enable verbose output', false)
    .option('--headless', 'Run the browser headless')
    .hook('preAction', (thisCommand) => {
        const opts = thisCommand.opts<{ configProfile?: string; verbose: boolean; headless?: boolean }>();
        cliContext.set({
            configProfile: opts.configProfile,
            verbose: opts.verbose,
            headless: opts.headless,
        });
    });

program.addCommand(runCommand, { isDefault: true });
program.addCommand(extractCommand);
program.addCommand(statusCommand);
program.addCommand(initCommand);

program.parseAsync(process.argv).catch((e: unknown) => {
    CLIUtils.error(toErrorMessage(e));
    process.exit(1);
});
