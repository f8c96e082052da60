import { describe, it, expect, vi } from 'vitest';
import { configSchema } from '../src/config';
import { SessionManager } from '../src/driver/session-manager';
import { ProvisionError } from '../src/errors';
import { FakeProvisioner } from './fixtures/fake-provisioner';

const profile = configSchema.parse({ browser: { closeExisting: false } }).browser;

describe('SessionManager', () => {
    it('reuses a responsive session', async () => {
        const provisioner = new FakeProvisioner();
        const sessions = new SessionManager(provisioner, { shutdownDelayMs: 0 });

        const first = await sessions.acquire(profile);
        const second = await sessions.acquire(profile);

        expect(second).toBe(first);
        expect(provisioner.handles).toHaveLength(1);
        expect(sessions.current).toBe(first);
    });

    it('replaces the session when forced', async () => {
        const provisioner = new FakeProvisioner();
        const sessions = new SessionManager(provisioner, { shutdownDelayMs: 0 });

        const first = await sessions.acquire(profile);
        const second = await sessions.acquire(profile, true);

        expect(second).not.toBe(first);
        expect(provisioner.contexts[0].close).toHaveBeenCalledTimes(1);
        expect(sessions.current).toBe(second);
    });

    it('replaces a session whose page was closed', async () => {
        const provisioner = new FakeProvisioner();
        const sessions = new SessionManager(provisioner, { shutdownDelayMs: 0 });

        const first = await sessions.acquire(profile);
        await provisioner.pages[0].close();

        expect(await sessions.isResponsive()).toBe(false);
        expect(await sessions.acquire(profile)).not.toBe(first);
    });

    it('terminates running browsers before launching when configured', async () => {
        const killBrowsers = vi.fn();
        const sessions = new SessionManager(new FakeProvisioner(), { shutdownDelayMs: 0, killBrowsers });

        await sessions.acquire({ ...profile, closeExisting: true, processName: 'chromium' });

        expect(killBrowsers).toHaveBeenCalledWith('chromium');
    });

    it('wraps launch failures in ProvisionError', async () => {
        const provisioner = new FakeProvisioner();
        provisioner.failure = new Error('profile locked');
        const sessions = new SessionManager(provisioner, { shutdownDelayMs: 0 });

        await expect(sessions.acquire(profile)).rejects.toThrow(ProvisionError);
        await expect(sessions.acquire(profile)).rejects.toThrow('profile locked');
    });

    it('release never throws and forgets the session', async () => {
        const provisioner = new FakeProvisioner();
        const sessions = new SessionManager(provisioner, { shutdownDelayMs: 0 });
        await sessions.acquire(profile);
        provisioner.contexts[0].close.mockRejectedValue(new Error('already closed'));

        await expect(sessions.release()).resolves.toBeUndefined();
        expect(sessions.current).toBeNull();
        await expect(sessions.release()).resolves.toBeUndefined();
    });
});
