export function sleep(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Like sleep, but resolves early when the signal aborts.
 */
export function sleepUntilAborted(ms: number, signal?: AbortSignal): Promise<void> {
    if (!signal) return sleep(ms);
    if (signal.aborted) return Promise.resolve();
    return new Promise(resolve => {
        const timer = setTimeout(done, ms);
        function done() {
            clearTimeout(timer);
            signal?.removeEventListener('abort', done);
            resolve();
        }
        signal.addEventListener('abort', done, { once: true });
    });
}

/**
 * Extract the video id from a watch, short-link or embed URL.
 * Falls back to a time-based name so debug artifacts always get a prefix.
 */
export function extractVideoId(videoUrl: string, now: () => number = Date.now): string {
    if (URL.canParse(videoUrl)) {
        const parsed = new URL(videoUrl);
        if (parsed.hostname === 'youtu.be') {
            const id = parsed.pathname.replace(/^\/+|\/+$/g, '');
            if (id) return id;
        }
        const fromQuery = parsed.searchParams.get('v');
        if (fromQuery) return fromQuery;
        if (parsed.pathname.includes('/embed/')) {
            const id = parsed.pathname.split('/embed/')[1].split('/')[0];
            if (id) return id;
        }
    }
    return `video_${Math.floor(now() / 1000)}`;
}

/**
 * Re-run `check` until it returns true or `timeoutMs` elapses. Always checks at least once.
 */
export async function pollUntil(
    check: () => Promise<boolean>,
    timeoutMs: number,
    intervalMs: number = 250
): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
        if (await check()) return true;
        const remaining = deadline - Date.now();
        if (remaining <= 0) return false;
        await sleep(Math.min(intervalMs, remaining));
    }
}
