import axios, { type AxiosInstance } from 'axios';
import { CONFIG } from './config';
import { ArchiveError, toArchiveError } from './errors';
import { RateLimiter } from './rate-limiter';
import type { RequestContext, Snapshot } from './types';

export interface ContentFetcherOptions {
    http?: AxiosInstance;
    limiter?: RateLimiter;
}

export function replayUrl(snapshot: Snapshot): string {
    // if_ replays the raw capture without the archive's toolbar frame
    return `${CONFIG.WAYBACK_WEB_URL}/${snapshot.timestamp}if_/${snapshot.original}`;
}

/**
 * Retrieves the archived body of one snapshot.
 *
 * Unlike the CDX queries this throws: an empty body resolves to '' while an
 * unavailable capture rejects with CAPTURE_UNAVAILABLE, so callers can tell
 * the two apart.
 */
export class ContentFetcher {
    private readonly http: AxiosInstance;
    private readonly limiter: RateLimiter;

    constructor(options: ContentFetcherOptions = {}) {
        this.http = options.http ?? axios.create();
        this.limiter = options.limiter ?? new RateLimiter();
    }

    async fetch(snapshot: Snapshot, context: RequestContext = {}): Promise<string> {
        const url = replayUrl(snapshot);

        let content: string;
        try {
            await this.limiter.acquire(context.signal);
            const response = await this.http.get<string>(url, {
                responseType: 'text',
                signal: context.signal,
            });
            content = typeof response.data === 'string' ? response.data : '';
        } catch (error) {
            throw toArchiveError(error, url);
        }

        if (content === '') return content;

        if (content.includes(CONFIG.CAPTURE_UNAVAILABLE_FINGERPRINT)) {
            throw new ArchiveError('CAPTURE_UNAVAILABLE', 'Archive could not replay this capture', url);
        }

        return content;
    }
}
