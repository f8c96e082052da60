import * as fs from 'fs';
import { execSync } from 'child_process';
import { chromium } from 'playwright';
import { getLogger, toErrorMessage } from '@digest/shared';
import type { BrowserProfile } from '../config';
import { ProvisionError } from '../errors';
import { DriverHandle } from './handle';

export interface DriverProvisioner {
    obtainDriver(profile: BrowserProfile): Promise<DriverHandle>;
}

/**
 * Launches a persistent Chromium context from the configured profile, so the
 * extension installed in that profile (or loaded from `extensionPath`) is active.
 */
export class PlaywrightProvisioner implements DriverProvisioner {
    async obtainDriver(profile: BrowserProfile): Promise<DriverHandle> {
        const logger = getLogger();
        if (!fs.existsSync(profile.userDataDir)) {
            fs.mkdirSync(profile.userDataDir, { recursive: true });
        }

        const args = [
            '--start-maximized',
            '--no-first-run',
            '--no-default-browser-check',
        ];
        if (profile.extensionPath) {
            args.push(
                `--disable-extensions-except=${profile.extensionPath}`,
                `--load-extension=${profile.extensionPath}`
            );
        }

        logger.info('Launching browser', {
            userDataDir: profile.userDataDir,
            channel: profile.executablePath ? undefined : profile.channel,
            headless: profile.headless,
        });

        try {
            const context = await chromium.launchPersistentContext(profile.userDataDir, {
                headless: profile.headless,
                channel: profile.executablePath ? undefined : profile.channel,
                executablePath: profile.executablePath,
                args,
                // Playwright disables extensions by default
                ignoreDefaultArgs: ['--disable-extensions', '--enable-automation'],
                viewport: null,
            });
            const page = context.pages()[0] || await context.newPage();
            logger.info('Browser ready');
            return new DriverHandle(context, page);
        } catch (e) {
            throw new ProvisionError(`Failed to initialize browser: ${toErrorMessage(e)}`);
        }
    }
}

/**
 * Terminates running instances of the host browser so the profile directory is
 * not locked. Destructive on purpose: it also closes the user's own windows.
 */
export function closeExistingBrowsers(processName: string, platform: NodeJS.Platform = process.platform): void {
    const logger = getLogger();
    const command = platform === 'win32'
        ? `taskkill /f /im ${processName}.exe`
        : `pkill -f ${processName}`;
    try {
        execSync(command, { stdio: 'ignore' });
        logger.info('Closed existing browser instances', { processName });
    } catch (e) {
        // pkill/taskkill exit non-zero when nothing matched
        logger.debug('No browser instances closed', { processName, error: toErrorMessage(e) });
    }
}
