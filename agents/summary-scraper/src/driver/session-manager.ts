import { getLogger, toErrorMessage } from '@digest/shared';
import type { BrowserProfile } from '../config';
import { ProvisionError } from '../errors';
import { sleep } from '../utils';
import type { DriverHandle } from './handle';
import { closeExistingBrowsers, DriverProvisioner } from './provisioner';

export interface SessionManagerOptions {
    /** Wait after terminating existing browser processes */
    shutdownDelayMs?: number;
    killBrowsers?: (processName: string) => void;
}

/**
 * Owns the single browser session of a run: reuse while it answers,
 * recreate when it does not or when asked to.
 */
export class SessionManager {
    private handle: DriverHandle | null = null;
    private readonly shutdownDelayMs: number;
    private readonly killBrowsers: (processName: string) => void;

    constructor(private readonly provisioner: DriverProvisioner, options: SessionManagerOptions = {}) {
        this.shutdownDelayMs = options.shutdownDelayMs ?? 2000;
        this.killBrowsers = options.killBrowsers ?? ((name) => closeExistingBrowsers(name));
    }

    get current(): DriverHandle | null {
        return this.handle;
    }

    async acquire(profile: BrowserProfile, forceFresh: boolean = false): Promise<DriverHandle> {
        const logger = getLogger();

        if (this.handle && !forceFresh) {
            if (await this.handle.isResponsive()) {
                logger.debug('Reusing browser session', { id: this.handle.id });
                return this.handle;
            }
            logger.warn('Browser is not responsive, creating a new instance', { id: this.handle.id });
        }

        if (this.handle) {
            await this.release(this.handle);
        }

        if (profile.closeExisting) {
            this.killBrowsers(profile.processName);
            await sleep(this.shutdownDelayMs);
        }

        try {
            this.handle = await this.provisioner.obtainDriver(profile);
        } catch (e) {
            throw e instanceof ProvisionError ? e : new ProvisionError(toErrorMessage(e));
        }
        logger.info('Started new browser session', { id: this.handle.id, forceFresh });
        return this.handle;
    }

    /**
     * Best-effort teardown. Never throws.
     */
    async release(handle: DriverHandle | null = this.handle): Promise<void> {
        if (!handle) return;
        try {
            await handle.close();
            getLogger().info('Closed browser session', { id: handle.id });
        } catch (e) {
            getLogger().warn('Error closing browser', { id: handle.id, error: toErrorMessage(e) });
        } finally {
            if (this.handle === handle) {
                this.handle = null;
            }
        }
    }

    async isResponsive(handle: DriverHandle | null = this.handle): Promise<boolean> {
        return handle ? handle.isResponsive() : false;
    }
}
