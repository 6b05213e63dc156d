import axios, { type AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import { CdxClient } from './cdx';
import { UrlClassifier } from './classifier';
import { CONFIG } from './config';
import { ContentFetcher } from './content';
import { RobotsExpander, SnapshotExpander, SourceExpander } from './expander';
import { logger as rootLogger } from './logger';
import { AsyncQueue } from './queue';
import { RateLimiter } from './rate-limiter';
import { isInScope, normalizeDomain } from './scope';
import type { DiagnosticsSink, HarvestConfig, RequestContext, ScopeSpec, UrlRecord } from './types';

export interface HarvestOptions extends HarvestConfig {
    domain: string;
    /** Worker pool size (default: 10) */
    concurrency?: number;
    /** Aborting ends the run and closes the record stream */
    signal?: AbortSignal;
    diagnostics?: DiagnosticsSink;
}

export interface WaybackHarvesterOptions {
    /** HTTP client for every archive request; built from CONFIG when omitted */
    http?: AxiosInstance;
    limiter?: RateLimiter;
    /** Ignored when a limiter is given */
    requestsPerMinute?: number;
    timeoutMs?: number;
    /** Records buffered ahead of the consumer (default: 100) */
    outputBuffer?: number;
    logger?: Logger;
}

interface RunState {
    scope: ScopeSpec;
    options: HarvestOptions;
    context: RequestContext;
    output: AsyncQueue<UrlRecord>;
    robots: RobotsExpander;
    source: SourceExpander;
}

/**
 * Streams every URL the Wayback Machine holds for a domain, optionally
 * mining archived robots.txt files and page sources for more.
 *
 * One limiter paces every request made by this instance, across runs.
 */
export class WaybackHarvester {
    readonly name = 'wayback';

    private readonly limiter: RateLimiter;
    private readonly cdx: CdxClient;
    private readonly content: ContentFetcher;
    private readonly outputBuffer: number;
    private readonly log: Logger;

    constructor(options: WaybackHarvesterOptions = {}) {
        const http = options.http ?? axios.create({
            timeout: options.timeoutMs ?? CONFIG.REQUEST_TIMEOUT_MS,
            headers: { 'User-Agent': CONFIG.USER_AGENT },
        });
        const logger = options.logger ?? rootLogger;

        this.limiter = options.limiter ?? new RateLimiter({ requestsPerMinute: options.requestsPerMinute });
        this.cdx = new CdxClient({ http, limiter: this.limiter, logger });
        this.content = new ContentFetcher({ http, limiter: this.limiter });
        this.outputBuffer = options.outputBuffer ?? CONFIG.OUTPUT_BUFFER;
        this.log = logger.child({ module: 'harvester' });
    }

    /**
     * Runs one harvest. Records arrive in completion order, not archive
     * order. Breaking out of the iteration cancels the rest of the run.
     */
    async *harvest(options: HarvestOptions): AsyncGenerator<UrlRecord, void, undefined> {
        const concurrency = options.concurrency ?? CONFIG.CONCURRENCY;
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
        }

        const scope: ScopeSpec = {
            rootDomain: normalizeDomain(options.domain),
            includeSubdomains: options.includeSubdomains,
        };

        const controller = new AbortController();
        const context: RequestContext = { signal: controller.signal, diagnostics: options.diagnostics };
        const work = new AsyncQueue<string>(concurrency);
        const output = new AsyncQueue<UrlRecord>(this.outputBuffer);
        const expanderDeps = { cdx: this.cdx, content: this.content, logger: this.log };
        const state: RunState = {
            scope,
            options,
            context,
            output,
            robots: new RobotsExpander(expanderDeps),
            source: new SourceExpander(expanderDeps, scope),
        };

        // Cancellation drops whatever is queued on either side
        controller.signal.addEventListener('abort', () => {
            work.close({ discard: true });
            output.close({ discard: true });
        }, { once: true });

        const forwardAbort = () => controller.abort();
        if (options.signal?.aborted) {
            controller.abort();
        } else {
            options.signal?.addEventListener('abort', forwardAbort, { once: true });
        }

        const produce = async () => {
            try {
                const urls = await this.cdx.fetchUrls(scope, context);
                this.log.info({ domain: scope.rootDomain, count: urls.length }, 'Archive index loaded');
                for (const url of urls) {
                    if (!(await work.push(url))) break;
                }
            } finally {
                work.close();
            }
        };

        const consume = async () => {
            for await (const url of work) {
                await this.dispatch(url, state);
            }
        };

        // Archive failures never reach here; anything that does ends the run
        // and is rethrown to the consumer once every task has settled
        const outcome: { error?: unknown } = {};
        const fail = (error: unknown) => {
            if (!('error' in outcome)) outcome.error = error;
            controller.abort();
        };
        const tasks = [produce(), ...Array.from({ length: concurrency }, consume)];
        const pipeline = Promise.all(tasks.map(task => task.catch(fail))).finally(() => output.close());

        const startedAt = Date.now();
        let emitted = 0;

        try {
            for await (const record of output) {
                emitted++;
                yield record;
            }
            if ('error' in outcome) throw outcome.error;
        } finally {
            const cancelled = controller.signal.aborted || !output.isClosed;
            controller.abort();
            options.signal?.removeEventListener('abort', forwardAbort);
            await pipeline;

            this.log.info(
                { domain: scope.rootDomain, records: emitted, elapsedMs: Date.now() - startedAt, cancelled },
                'Harvest finished',
            );
        }
    }

    private async dispatch(url: string, state: RunState): Promise<void> {
        const { scope, options, context, output } = state;

        if (!isInScope(url, scope)) return;
        if (!(await output.push({ source: this.name, value: url }))) return;

        if (!options.parseRobots && !options.parseSource) return;
        if (UrlClassifier.isMedia(url)) return;

        const isRobots = UrlClassifier.isRobots(url);
        let expander: SnapshotExpander | null = null;
        if (options.parseRobots && isRobots) {
            expander = state.robots;
        } else if (options.parseSource && !isRobots) {
            expander = state.source;
        }
        if (!expander) return;

        for await (const found of expander.expand(url, context)) {
            if (!isInScope(found, scope)) continue;
            if (!(await output.push({ source: expander.source, value: found }))) return;
        }
    }
}

export { FailureTally } from './diagnostics';
export type { FailureSummary } from './diagnostics';
export { ArchiveError } from './errors';
export type { ArchiveErrorCode } from './errors';
export { RateLimiter } from './rate-limiter';
export type {
    DiagnosticsSink,
    HarvestConfig,
    HarvestFailure,
    RecordSource,
    ScopeSpec,
    Snapshot,
    UrlRecord,
} from './types';
