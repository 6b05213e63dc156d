export const CONFIG = {
    // CDX index: one row per capture, filtered and collapsed server side
    CDX_API_URL: 'https://web.archive.org/cdx/search/cdx',
    // Replay endpoint; snapshots are addressed as <timestamp>if_/<original>
    WAYBACK_WEB_URL: 'https://web.archive.org/web',
    // The archive starts refusing clients well before 60/min
    REQUESTS_PER_MINUTE: 40,
    RATE_WINDOW_MS: 60_000,
    // Worker pool size for the per-URL fan-out
    CONCURRENCY: 10,
    // Records held for a slow consumer before workers wait
    OUTPUT_BUFFER: 100,
    REQUEST_TIMEOUT_MS: 30_000,
    USER_AGENT: 'Mozilla/5.0 (compatible; wayback-harvester/1.0)',
    // Served with a 200 when the archive cannot replay a capture
    CAPTURE_UNAVAILABLE_FINGERPRINT: "This page can't be displayed. Please use the correct URL address to access",
};
