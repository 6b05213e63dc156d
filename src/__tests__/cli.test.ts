import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { buildProgram, type CliOptions, fileWriter, formatRecord, type RecordWriter, runHarvest } from '../cli';
import { WaybackHarvester } from '../harvester';
import { createFakeArchive, type FakeArchiveData, fastLimiter, silentLogger } from './helpers/fake-archive';

function memoryWriter() {
    const lines: string[] = [];
    let closed = false;
    const writer: RecordWriter = {
        write: async line => {
            lines.push(line);
        },
        close: async () => {
            closed = true;
        },
    };
    return { writer, lines, isClosed: () => closed };
}

function options(overrides: Partial<CliOptions> = {}): CliOptions {
    return {
        domain: 'example.com',
        includeSubdomains: false,
        parseRobots: false,
        parseSource: false,
        concurrency: 2,
        rpm: 40,
        unique: false,
        json: false,
        pretty: false,
        ...overrides,
    };
}

function harvesterFor(data: FakeArchiveData): WaybackHarvester {
    const archive = createFakeArchive(data);
    return new WaybackHarvester({ http: archive.http, limiter: fastLimiter(), logger: silentLogger });
}

describe('buildProgram', () => {
    const parse = (...args: string[]) =>
        buildProgram()
            .exitOverride()
            .configureOutput({ writeErr: () => undefined, writeOut: () => undefined })
            .parse(['node', 'wayback-harvester', ...args])
            .opts<CliOptions>();

    it('should apply defaults', () => {
        expect(parse('-d', 'example.com')).toEqual({
            domain: 'example.com',
            includeSubdomains: false,
            parseRobots: false,
            parseSource: false,
            concurrency: 10,
            rpm: 40,
            unique: false,
            json: false,
            pretty: false,
        });
    });

    it('should parse flags and numbers', () => {
        const parsed = parse('-d', 'example.com', '--include-subdomains', '--parse-robots', '-c', '4', '--limit', '100', '-o', 'out.txt');

        expect(parsed).toMatchObject({
            includeSubdomains: true,
            parseRobots: true,
            parseSource: false,
            concurrency: 4,
            limit: 100,
            output: 'out.txt',
        });
    });

    it('should reject a non-positive concurrency', () => {
        expect(() => parse('-d', 'example.com', '-c', '0')).toThrow();
    });

    it('should require a domain', () => {
        expect(() => parse('--parse-source')).toThrow();
    });
});

describe('formatRecord', () => {
    const record = { source: 'wayback:robots', value: 'http://example.com/sitemap.xml' } as const;

    it('should print the bare URL by default', () => {
        expect(formatRecord(record, false)).toBe('http://example.com/sitemap.xml');
    });

    it('should print a JSON line when asked', () => {
        expect(formatRecord(record, true)).toBe('{"source":"wayback:robots","value":"http://example.com/sitemap.xml"}');
    });
});

describe('runHarvest', () => {
    it('should write every record and close the writer', async () => {
        const harvester = harvesterFor({ index: { 'example.com/*': 'http://example.com/a\n' } });
        const { writer, lines, isClosed } = memoryWriter();

        const written = await runHarvest(options({ json: true }), { harvester, writer, logger: silentLogger });

        expect(written).toBe(1);
        expect(lines).toEqual(['{"source":"wayback","value":"http://example.com/a"}']);
        expect(isClosed()).toBe(true);
    });

    it('should drop repeated values when unique is set', async () => {
        const body = 'http://example.com/a\nhttp://example.com/a\nhttp://example.com/b\n';
        const { writer, lines } = memoryWriter();

        const written = await runHarvest(options({ unique: true }), {
            harvester: harvesterFor({ index: { 'example.com/*': body } }),
            writer,
            logger: silentLogger,
        });

        expect(written).toBe(2);
        expect([...lines].sort()).toEqual(['http://example.com/a', 'http://example.com/b']);
    });

    it('should keep repeated values by default', async () => {
        const body = 'http://example.com/a\nhttp://example.com/a\n';
        const { writer, lines } = memoryWriter();

        await runHarvest(options(), {
            harvester: harvesterFor({ index: { 'example.com/*': body } }),
            writer,
            logger: silentLogger,
        });

        expect(lines).toEqual(['http://example.com/a', 'http://example.com/a']);
    });

    it('should stop once the limit is reached', async () => {
        const body = Array.from({ length: 20 }, (_, i) => `http://example.com/${i}`).join('\n');
        const { writer, lines, isClosed } = memoryWriter();

        const written = await runHarvest(options({ limit: 3 }), {
            harvester: harvesterFor({ index: { 'example.com/*': body } }),
            writer,
            logger: silentLogger,
        });

        expect(written).toBe(3);
        expect(lines).toHaveLength(3);
        expect(isClosed()).toBe(true);
    });
});

describe('fileWriter', () => {
    let dir: string | undefined;

    afterEach(async () => {
        if (dir) await fs.remove(dir);
        dir = undefined;
    });

    it('should create missing directories and write one line per record', async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'wayback-harvester-'));
        const target = path.join(dir, 'nested', 'urls.txt');

        const writer = await fileWriter(target);
        await writer.write('http://example.com/a');
        await writer.write('http://example.com/b');
        await writer.close();

        expect(await fs.readFile(target, 'utf-8')).toBe('http://example.com/a\nhttp://example.com/b\n');
    });

    it('should reject when the output path is a directory', async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'wayback-harvester-'));

        await expect(fileWriter(dir)).rejects.toMatchObject({ code: 'EISDIR' });
    });
});
