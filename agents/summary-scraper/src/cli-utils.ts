import { initLogger, ValidationError } from '@digest/shared';
import { cliContext } from './cli-context';
import { APP_NAME, loadConfig, ScraperConfig } from './config';

/**
 * Configuration with the global CLI flags applied on top. Also initializes the logger.
 */
export function resolveConfig(overrides: (config: ScraperConfig) => ScraperConfig = c => c): ScraperConfig {
    const { configProfile, verbose, headless } = cliContext.get();
    initLogger({
        service: APP_NAME,
        level: verbose ? 'debug' : process.env.LOG_LEVEL || 'info',
        environment: process.env.NODE_ENV === 'production' ? 'production' : 'development',
    });

    const config = loadConfig(configProfile);
    const withFlags: ScraperConfig = headless === undefined
        ? config
        : { ...config, browser: { ...config.browser, headless } };
    return overrides(withFlags);
}

/**
 * AbortSignal fired by the first SIGINT/SIGTERM. A second signal exits immediately.
 */
export function abortOnSignals(): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    const onSignal = (name: NodeJS.Signals) => {
        if (controller.signal.aborted) {
            process.exit(130);
        }
        console.log(`\n${name} received, finishing up...`);
        controller.abort();
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
    return {
        signal: controller.signal,
        dispose: () => {
            process.off('SIGINT', onSignal);
            process.off('SIGTERM', onSignal);
        },
    };
}

export function parseInteger(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (Number.isNaN(parsed) || parsed < 0) {
        throw new ValidationError(`Expected a non-negative integer, got "${value}"`, { value });
    }
    return parsed;
}
