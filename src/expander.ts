import type { Logger } from 'pino';
import type { CdxClient } from './cdx';
import type { ContentFetcher } from './content';
import { toArchiveError } from './errors';
import { extractRobotsUrls } from './extractors/robots';
import { extractSourceUrls } from './extractors/source';
import type { RecordSource, RequestContext, ScopeSpec, Snapshot } from './types';

export interface ExpanderDeps {
    cdx: CdxClient;
    content: ContentFetcher;
    logger: Logger;
}

/**
 * Walks the archived versions of one URL and mines each for more URLs.
 *
 * Snapshots are fetched one after another through the shared limiter. A
 * snapshot that fails to load is reported and skipped.
 */
export abstract class SnapshotExpander {
    abstract readonly source: RecordSource;

    protected readonly log: Logger;

    constructor(protected readonly deps: ExpanderDeps) {
        this.log = deps.logger.child({ module: 'expander' });
    }

    protected abstract extract(content: string, snapshot: Snapshot, url: string): string[];

    /**
     * Lazy sequence of candidate URLs. Each call starts a fresh walk; within
     * one walk a candidate is yielded once.
     */
    async *expand(url: string, context: RequestContext = {}): AsyncGenerator<string> {
        const snapshots = await this.deps.cdx.fetchSnapshots(url, context);
        if (snapshots.length === 0) return;

        this.log.debug({ url, snapshots: snapshots.length, source: this.source }, 'Expanding snapshots');

        const seen = new Set<string>();

        for (const snapshot of snapshots) {
            if (context.signal?.aborted) return;

            let content: string;
            try {
                content = await this.deps.content.fetch(snapshot, context);
            } catch (error) {
                const archiveError = toArchiveError(error, snapshot.original);
                if (archiveError.code === 'ABORTED') return;

                this.log.debug({ url, timestamp: snapshot.timestamp, code: archiveError.code }, archiveError.message);
                context.diagnostics?.report({
                    stage: 'content',
                    code: archiveError.code,
                    url: archiveError.url,
                    message: archiveError.message,
                });
                continue;
            }

            if (!content) continue;

            for (const candidate of this.extract(content, snapshot, url)) {
                if (seen.has(candidate)) continue;
                seen.add(candidate);
                yield candidate;
            }
        }
    }
}

export class RobotsExpander extends SnapshotExpander {
    readonly source = 'wayback:robots';

    protected extract(content: string, _snapshot: Snapshot, url: string): string[] {
        return extractRobotsUrls(content, url);
    }
}

export class SourceExpander extends SnapshotExpander {
    readonly source = 'wayback:source';

    constructor(deps: ExpanderDeps, private readonly scope: ScopeSpec) {
        super(deps);
    }

    protected extract(content: string, snapshot: Snapshot): string[] {
        return extractSourceUrls(content, snapshot.original, this.scope.rootDomain);
    }
}
