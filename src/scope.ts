import type { ScopeSpec } from './types';

const SCHEME_REGEX = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Parses an archived URL. CDX rows occasionally drop the scheme, so a bare
 * `host/path` is read as http.
 */
export function parseUrl(value: string): URL | null {
    const trimmed = value.trim();
    if (!trimmed) return null;

    const candidate = SCHEME_REGEX.test(trimmed) ? trimmed : `http://${trimmed.replace(/^\/\//, '')}`;
    try {
        return new URL(candidate);
    } catch {
        return null;
    }
}

export function normalizeDomain(domain: string): string {
    return domain.trim().toLowerCase().replace(/^\*\./, '').replace(/\.$/, '');
}

export function isInScope(url: string, scope: ScopeSpec): boolean {
    const parsed = parseUrl(url);
    if (!parsed) return false;

    const host = parsed.hostname.replace(/\.$/, '');
    const root = normalizeDomain(scope.rootDomain);
    if (!host || !root) return false;

    if (host === root) return true;
    return scope.includeSubdomains && host.endsWith(`.${root}`);
}
