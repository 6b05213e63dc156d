import mediaExtensions from './data/media-extensions.json';
import { parseUrl } from './scope';

export type UrlKind = 'robots' | 'media' | 'page';

const MEDIA_URL_REGEX = new RegExp(`\\.(?:${mediaExtensions.join('|')})(?:\\?|#|$)`, 'i');

export class UrlClassifier {
    static classify(url: string): UrlKind {
        // Checked first so a robots URL never counts as a page
        if (UrlClassifier.isRobots(url)) return 'robots';
        if (UrlClassifier.isMedia(url)) return 'media';
        return 'page';
    }

    // Binary content carries no embedded URLs worth mining
    static isMedia(url: string): boolean {
        return MEDIA_URL_REGEX.test(url);
    }

    static isRobots(url: string): boolean {
        const parsed = parseUrl(url);
        if (!parsed) return false;
        if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return false;
        return parsed.pathname === '/robots.txt' && parsed.search === '' && parsed.hash === '';
    }
}
