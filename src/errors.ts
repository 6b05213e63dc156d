import axios from 'axios';
import { ZodError } from 'zod';

export type ArchiveErrorCode = 'TRANSPORT' | 'MALFORMED_RESPONSE' | 'CAPTURE_UNAVAILABLE' | 'ABORTED';

export class ArchiveError extends Error {
    code: ArchiveErrorCode;
    url: string;
    status?: number;

    constructor(code: ArchiveErrorCode, message: string, url: string, status?: number) {
        super(message);
        this.name = 'ArchiveError';
        this.code = code;
        this.url = url;
        this.status = status;
    }
}

export function isAbortError(error: unknown): boolean {
    return error instanceof ArchiveError && error.code === 'ABORTED';
}

/**
 * Maps whatever a fetch or parse step threw onto the archive error taxonomy.
 */
export function toArchiveError(error: unknown, url: string): ArchiveError {
    if (error instanceof ArchiveError) return error;

    if (axios.isCancel(error)) {
        return new ArchiveError('ABORTED', 'Request aborted', url);
    }

    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const message = status ? `HTTP ${status}` : error.message;
        return new ArchiveError('TRANSPORT', message, url, status);
    }

    if (error instanceof ZodError) {
        const issue = error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        return new ArchiveError('MALFORMED_RESPONSE', `Unexpected response shape${where}`, url);
    }

    if (error instanceof SyntaxError) {
        return new ArchiveError('MALFORMED_RESPONSE', error.message, url);
    }

    const message = error instanceof Error ? error.message : String(error);
    return new ArchiveError('TRANSPORT', message, url);
}
