import type { ArchiveErrorCode } from './errors';
import type { DiagnosticsSink, FailureStage, HarvestFailure } from './types';

export interface FailureSummary {
    total: number;
    byStage: Partial<Record<FailureStage, number>>;
    byCode: Partial<Record<ArchiveErrorCode, number>>;
}

/**
 * Counts failures by stage and code, keeping the most recent few for
 * inspection. Optionally forwards each failure to another sink.
 */
export class FailureTally implements DiagnosticsSink {
    private total = 0;
    private readonly byStage: Partial<Record<FailureStage, number>> = {};
    private readonly byCode: Partial<Record<ArchiveErrorCode, number>> = {};
    private readonly recent: HarvestFailure[] = [];

    constructor(private readonly options: { keepRecent?: number; forward?: DiagnosticsSink } = {}) {}

    report(failure: HarvestFailure): void {
        this.total++;
        this.byStage[failure.stage] = (this.byStage[failure.stage] ?? 0) + 1;
        this.byCode[failure.code] = (this.byCode[failure.code] ?? 0) + 1;

        const keep = this.options.keepRecent ?? 20;
        if (keep > 0) {
            this.recent.push(failure);
            if (this.recent.length > keep) this.recent.shift();
        }

        this.options.forward?.report(failure);
    }

    summary(): FailureSummary {
        return {
            total: this.total,
            byStage: { ...this.byStage },
            byCode: { ...this.byCode },
        };
    }

    recentFailures(): HarvestFailure[] {
        return [...this.recent];
    }
}
