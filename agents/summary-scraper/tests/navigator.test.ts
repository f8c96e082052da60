import { describe, it, expect } from 'vitest';
import { NavigationError } from '../src/errors';
import { normalizeVideoUrl, PageNavigator } from '../src/navigator';
import { defaultSelectors } from '../src/selectors';
import { createMockHandle, MockFrame, mountExtension } from './fixtures/mock-page-factory';

const PLAYER = defaultSelectors.page.player;
const BANNER = defaultSelectors.page.errorBanner;

function createNavigator(attempts: number = 3) {
    return new PageNavigator({
        selectors: defaultSelectors,
        timings: { load: 0, refresh: 0, extension: 0 },
        attempts,
    });
}

describe('normalizeVideoUrl', () => {
    it('adds t=0 to a URL with a query', () => {
        expect(normalizeVideoUrl('https://www.youtube.com/watch?v=abc')).toBe('https://www.youtube.com/watch?v=abc&t=0');
    });

    it('adds t=0 to a URL without a query', () => {
        expect(normalizeVideoUrl('https://youtu.be/abc')).toBe('https://youtu.be/abc?t=0');
    });

    it('rewrites an existing start time', () => {
        expect(normalizeVideoUrl('https://www.youtube.com/watch?v=abc&t=95s')).toBe('https://www.youtube.com/watch?v=abc&t=0');
        expect(normalizeVideoUrl('https://youtu.be/abc?t=12&si=x')).toBe('https://youtu.be/abc?t=0&si=x');
    });

    it('does not mistake other parameters ending in t for a start time', () => {
        expect(normalizeVideoUrl('https://www.youtube.com/watch?v=abc&list=PL1')).toBe('https://www.youtube.com/watch?v=abc&list=PL1&t=0');
    });

    it('keeps the fragment last', () => {
        expect(normalizeVideoUrl('https://www.youtube.com/watch?v=abc#chapter')).toBe('https://www.youtube.com/watch?v=abc&t=0#chapter');
    });
});

describe('PageNavigator', () => {
    it('is ready on the first attempt when the player is present', async () => {
        const { handle, page } = createMockHandle();
        page.main.set(PLAYER, [{}]);

        const outcome = await createNavigator().load(handle, 'https://www.youtube.com/watch?v=abc');

        expect(outcome).toEqual({ ready: true, url: 'https://www.youtube.com/watch?v=abc&t=0', attempts: 1 });
        expect(page.goto).toHaveBeenCalledWith('https://www.youtube.com/watch?v=abc&t=0', { waitUntil: 'domcontentloaded' });
        expect(page.reload).not.toHaveBeenCalled();
        expect(page.evaluate).toHaveBeenCalledTimes(1);
    });

    it('refreshes while the host shows its error banner', async () => {
        const { handle, page } = createMockHandle();
        page.main.set(PLAYER, [{}]);
        page.main.set(BANNER, [{ text: 'Something went wrong' }]);
        page.reload.mockImplementation(async () => {
            page.main.set(BANNER, []);
            return null;
        });

        const outcome = await createNavigator().load(handle, 'https://youtu.be/abc');

        expect(outcome).toEqual({ ready: true, url: 'https://youtu.be/abc?t=0', attempts: 2 });
        expect(page.reload).toHaveBeenCalledTimes(1);
    });

    it('continues without a player after the last attempt', async () => {
        const { handle, page } = createMockHandle();

        const outcome = await createNavigator(3).load(handle, 'https://youtu.be/abc');

        expect(outcome).toEqual({ ready: false, url: 'https://youtu.be/abc?t=0', attempts: 3 });
        expect(page.reload).toHaveBeenCalledTimes(2);
    });

    it('still reports ready when resetting playback fails', async () => {
        const { handle, page } = createMockHandle();
        page.main.set(PLAYER, [{}]);
        page.evaluate.mockRejectedValue(new Error('No video element'));

        const outcome = await createNavigator().load(handle, 'https://youtu.be/abc');

        expect(outcome.ready).toBe(true);
    });

    it('throws NavigationError when the page cannot be opened', async () => {
        const { handle, page } = createMockHandle();
        page.goto.mockRejectedValue(new Error('net::ERR_NAME_NOT_RESOLVED'));

        await expect(createNavigator().load(handle, 'https://youtu.be/abc')).rejects.toBeInstanceOf(NavigationError);
    });

    describe('waitForSurface', () => {
        it('resolves once an iframe is attached', async () => {
            const { handle, page } = createMockHandle();
            mountExtension(page, new MockFrame('extension'));

            expect(await createNavigator().waitForSurface(handle)).toBe(true);
            expect(page.reload).not.toHaveBeenCalled();
        });

        it('reloads once when the extension never appears', async () => {
            const { handle, page } = createMockHandle();
            page.reload.mockImplementation(async () => {
                mountExtension(page, new MockFrame('extension'));
                return null;
            });

            expect(await createNavigator().waitForSurface(handle)).toBe(true);
            expect(page.reload).toHaveBeenCalledTimes(1);
        });

        it('gives up after the reload', async () => {
            const { handle, page } = createMockHandle();

            expect(await createNavigator().waitForSurface(handle)).toBe(false);
            expect(page.reload).toHaveBeenCalledTimes(1);
        });
    });
});
