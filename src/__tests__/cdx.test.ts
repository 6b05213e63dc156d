import { describe, expect, it } from 'vitest';
import { CdxClient } from '../cdx';
import { FailureTally } from '../diagnostics';
import { createFakeArchive, fastLimiter, silentLogger, snapshotRows } from './helpers/fake-archive';

function clientFor(archive: ReturnType<typeof createFakeArchive>): CdxClient {
    return new CdxClient({ http: archive.http, limiter: fastLimiter(), logger: silentLogger });
}

describe('CdxClient', () => {
    describe('fetchUrls', () => {
        it('should return index lines in archive order without blanks', async () => {
            const archive = createFakeArchive({
                index: { 'example.com/*': 'http://example.com/a\r\nhttp://sub.example.com/b\n\n   \nhttp://example.com/c\n' },
            });

            const urls = await clientFor(archive).fetchUrls({ rootDomain: 'example.com', includeSubdomains: false });

            expect(urls).toEqual(['http://example.com/a', 'http://sub.example.com/b', 'http://example.com/c']);
            expect(archive.requests).toEqual(['index:example.com/*']);
        });

        it('should query the wildcard form when subdomains are included', async () => {
            const archive = createFakeArchive({ index: { '*.example.com/*': 'http://sub.example.com/b\n' } });

            const urls = await clientFor(archive).fetchUrls({ rootDomain: 'Example.com', includeSubdomains: true });

            expect(urls).toEqual(['http://sub.example.com/b']);
            expect(archive.requests).toEqual(['index:*.example.com/*']);
        });

        it('should return an empty list and report the failure when the request fails', async () => {
            const archive = createFakeArchive({ index: { 'example.com/*': new Error('socket hang up') } });
            const tally = new FailureTally();

            const urls = await clientFor(archive).fetchUrls(
                { rootDomain: 'example.com', includeSubdomains: false },
                { diagnostics: tally },
            );

            expect(urls).toEqual([]);
            expect(tally.recentFailures()).toEqual([
                { stage: 'index', code: 'TRANSPORT', url: 'example.com/*', message: 'socket hang up' },
            ]);
        });

        it('should report HTTP errors with their status', async () => {
            const archive = createFakeArchive({});
            const tally = new FailureTally();

            const urls = await clientFor(archive).fetchUrls(
                { rootDomain: 'example.com', includeSubdomains: false },
                { diagnostics: tally },
            );

            expect(urls).toEqual([]);
            expect(tally.recentFailures()[0]).toMatchObject({ stage: 'index', code: 'TRANSPORT', message: 'HTTP 404' });
        });

        it('should not report a cancelled query as a failure', async () => {
            const archive = createFakeArchive({ index: { 'example.com/*': 'http://example.com/a\n' } });
            const tally = new FailureTally();
            const controller = new AbortController();
            controller.abort();

            const urls = await clientFor(archive).fetchUrls(
                { rootDomain: 'example.com', includeSubdomains: false },
                { signal: controller.signal, diagnostics: tally },
            );

            expect(urls).toEqual([]);
            expect(tally.summary().total).toBe(0);
            expect(archive.requests).toEqual([]);
        });
    });

    describe('fetchSnapshots', () => {
        const url = 'http://example.com/page';

        it('should drop the first row and return the rest', async () => {
            const archive = createFakeArchive({
                snapshots: {
                    [url]: snapshotRows(['20190101000000', url], ['20200101000000', 'http://example.com:80/page']),
                },
            });

            const snapshots = await clientFor(archive).fetchSnapshots(url);

            expect(snapshots).toEqual([
                { timestamp: '20190101000000', original: url },
                { timestamp: '20200101000000', original: 'http://example.com:80/page' },
            ]);
            expect(archive.requests).toEqual([`snapshots:${url}`]);
        });

        it('should return nothing for zero or one rows', async () => {
            const archive = createFakeArchive({
                snapshots: {
                    'http://example.com/none': '[]',
                    'http://example.com/one': JSON.stringify([['20200101000000', 'http://example.com/one']]),
                },
            });
            const client = clientFor(archive);

            expect(await client.fetchSnapshots('http://example.com/none')).toEqual([]);
            expect(await client.fetchSnapshots('http://example.com/one')).toEqual([]);
        });

        it('should treat an empty body as no history without reporting it', async () => {
            const archive = createFakeArchive({ snapshots: { [url]: '' } });
            const tally = new FailureTally();

            expect(await clientFor(archive).fetchSnapshots(url, { diagnostics: tally })).toEqual([]);
            expect(tally.summary().total).toBe(0);
        });

        it('should report malformed bodies and return nothing', async () => {
            const archive = createFakeArchive({
                snapshots: {
                    'http://example.com/html': '<html>rate limited</html>',
                    'http://example.com/shape': JSON.stringify([['a', 'b'], ['c']]),
                },
            });
            const tally = new FailureTally();
            const client = clientFor(archive);

            expect(await client.fetchSnapshots('http://example.com/html', { diagnostics: tally })).toEqual([]);
            expect(await client.fetchSnapshots('http://example.com/shape', { diagnostics: tally })).toEqual([]);
            expect(tally.summary()).toEqual({
                total: 2,
                byStage: { snapshots: 2 },
                byCode: { MALFORMED_RESPONSE: 2 },
            });
        });
    });
});
