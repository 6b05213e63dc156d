import { parseUrl } from '../scope';

const DIRECTIVE_REGEX = /^(sitemap|allow|disallow)\s*:\s*(\S+)/i;

/**
 * Pulls URLs out of robots.txt directives. Allow/Disallow paths lose
 * everything from the first wildcard on, plus a trailing `$` anchor, and
 * are resolved against the robots file's origin.
 */
export function extractRobotsUrls(content: string, robotsUrl: string): string[] {
    const base = parseUrl(robotsUrl);
    if (!base) return [];

    const found = new Set<string>();

    for (const rawLine of content.split('\n')) {
        const commentIndex = rawLine.indexOf('#');
        const line = (commentIndex === -1 ? rawLine : rawLine.slice(0, commentIndex)).trim();
        if (!line) continue;

        const match = DIRECTIVE_REGEX.exec(line);
        if (!match) continue;

        const directive = match[1].toLowerCase();
        let value = match[2];

        if (directive !== 'sitemap') {
            const wildcard = value.indexOf('*');
            if (wildcard !== -1) value = value.slice(0, wildcard);
            value = value.replace(/\$$/, '');
        }
        if (!value) continue;

        try {
            found.add(new URL(value, `${base.origin}/`).toString());
        } catch {
            continue;
        }
    }

    return [...found];
}
