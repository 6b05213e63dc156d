import axios, { type AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import { z } from 'zod';
import { CONFIG } from './config';
import { isAbortError, toArchiveError } from './errors';
import { logger as rootLogger } from './logger';
import { RateLimiter } from './rate-limiter';
import { normalizeDomain } from './scope';
import type { FailureStage, RequestContext, ScopeSpec, Snapshot } from './types';

// output=json with fl=timestamp,original returns string pairs
const snapshotRowsSchema = z.array(z.tuple([z.string(), z.string()]));

export interface CdxClientOptions {
    http?: AxiosInstance;
    limiter?: RateLimiter;
    logger?: Logger;
}

/**
 * Queries the archive's CDX index. Every call is rate limited and fail-soft:
 * failures are reported to the context's diagnostics sink and an empty list
 * is returned.
 */
export class CdxClient {
    private baseUrl = CONFIG.CDX_API_URL;
    private readonly http: AxiosInstance;
    private readonly limiter: RateLimiter;
    private readonly log: Logger;

    constructor(options: CdxClientOptions = {}) {
        this.http = options.http ?? axios.create();
        this.limiter = options.limiter ?? new RateLimiter();
        this.log = (options.logger ?? rootLogger).child({ module: 'cdx' });
    }

    /**
     * Every URL the archive knows for the scope, one per URL key.
     */
    async fetchUrls(scope: ScopeSpec, context: RequestContext = {}): Promise<string[]> {
        const domain = normalizeDomain(scope.rootDomain);
        const target = scope.includeSubdomains ? `*.${domain}` : domain;

        const params = {
            url: `${target}/*`,
            output: 'txt',
            fl: 'original',
            collapse: 'urlkey',
        };

        try {
            await this.limiter.acquire(context.signal);
            const response = await this.http.get<string>(this.baseUrl, {
                params,
                responseType: 'text',
                signal: context.signal,
            });

            const body = typeof response.data === 'string' ? response.data : '';
            const urls = body
                .split('\n')
                .map(line => line.replace(/\r$/, ''))
                .filter(line => line.trim() !== '');

            this.log.debug({ target, count: urls.length }, 'Index query complete');
            return urls;
        } catch (error) {
            this.fail('index', error, `${target}/*`, context);
            return [];
        }
    }

    /**
     * Distinct content versions of one URL. The first JSON row is dropped, so
     * fewer than two rows means there is nothing to expand.
     */
    async fetchSnapshots(url: string, context: RequestContext = {}): Promise<Snapshot[]> {
        const params = {
            url,
            output: 'json',
            fl: 'timestamp,original',
            collapse: 'digest',
        };

        try {
            await this.limiter.acquire(context.signal);
            const response = await this.http.get<string>(this.baseUrl, {
                params,
                responseType: 'text',
                signal: context.signal,
            });

            const body = typeof response.data === 'string' ? response.data.trim() : '';
            if (body === '') return [];

            const rows = snapshotRowsSchema.parse(JSON.parse(body));
            if (rows.length < 2) return [];

            return rows.slice(1).map(([timestamp, original]) => ({ timestamp, original }));
        } catch (error) {
            this.fail('snapshots', error, url, context);
            return [];
        }
    }

    private fail(stage: FailureStage, error: unknown, url: string, context: RequestContext): void {
        if (isAbortError(error) || axios.isCancel(error)) return;

        const archiveError = toArchiveError(error, url);
        this.log.debug({ stage, url, code: archiveError.code }, archiveError.message);
        context.diagnostics?.report({
            stage,
            code: archiveError.code,
            url,
            message: archiveError.message,
        });
    }
}
