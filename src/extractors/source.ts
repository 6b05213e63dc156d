import { normalizeDomain, parseUrl } from '../scope';

// Quoted root-relative paths: "/path" but not protocol-relative "//host"
const RELATIVE_PATH_REGEX = /["'](\/(?!\/)[^\s"'<>`\\]*)["']/g;
const TRAILING_PUNCTUATION_REGEX = /[.,;:!]+$/;

function escapeRegex(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function absoluteUrlRegex(domain: string): RegExp {
    const host = `(?:[a-z0-9-]+\\.)*${escapeRegex(domain)}(?![a-z0-9-]|\\.[a-z0-9])`;
    return new RegExp(`(?:https?:)?//${host}(?::\\d+)?(?:[/?#][^\\s"'<>\`\\\\(){}\\[\\]]*)?`, 'gi');
}

/**
 * Pattern-based scan of archived page content for URLs on the root domain
 * or its subdomains. This is not an HTML parser: anything URL-shaped in
 * markup, scripts, styles or text counts.
 */
export function extractSourceUrls(content: string, pageUrl: string, rootDomain: string): string[] {
    const domain = normalizeDomain(rootDomain);
    if (!domain) return [];

    // Scheme-less archive rows are read as http, same as the scope check
    const base = parseUrl(pageUrl) ?? undefined;
    const found = new Set<string>();

    const add = (candidate: string) => {
        const cleaned = candidate.replace(TRAILING_PUNCTUATION_REGEX, '');
        if (!cleaned) return;
        try {
            found.add(new URL(cleaned, base).toString());
        } catch {
            // Unresolvable against this page
        }
    };

    for (const match of content.matchAll(absoluteUrlRegex(domain))) {
        add(match[0]);
    }

    for (const match of content.matchAll(RELATIVE_PATH_REGEX)) {
        add(match[1]);
    }

    return [...found];
}
