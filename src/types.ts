import type { ArchiveErrorCode } from './errors';

export type RecordSource = 'wayback' | 'wayback:robots' | 'wayback:source';

export interface UrlRecord {
    readonly source: RecordSource;
    readonly value: string;
}

// One capture as listed by the CDX snapshot query
export interface Snapshot {
    timestamp: string;
    original: string;
}

export interface ScopeSpec {
    rootDomain: string;
    includeSubdomains: boolean;
}

export interface HarvestConfig {
    includeSubdomains: boolean;
    parseRobots: boolean;
    parseSource: boolean;
}

export type FailureStage = 'index' | 'snapshots' | 'content';

export interface HarvestFailure {
    stage: FailureStage;
    code: ArchiveErrorCode;
    url: string;
    message: string;
}

/**
 * Receives every fail-soft failure of a run. Reporting never changes which
 * records are emitted.
 */
export interface DiagnosticsSink {
    report(failure: HarvestFailure): void;
}

/**
 * Per-call context threaded through every archive request.
 */
export interface RequestContext {
    signal?: AbortSignal;
    diagnostics?: DiagnosticsSink;
}
