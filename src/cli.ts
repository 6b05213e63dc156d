import { Command, InvalidArgumentError } from 'commander';
import fs from 'fs-extra';
import path from 'path';
import type { Logger } from 'pino';
import { CONFIG } from './config';
import { FailureTally } from './diagnostics';
import { WaybackHarvester } from './harvester';
import type { UrlRecord } from './types';

export type CliOptions = {
    domain: string;
    includeSubdomains: boolean;
    parseRobots: boolean;
    parseSource: boolean;
    concurrency: number;
    rpm: number;
    limit?: number;
    unique: boolean;
    json: boolean;
    output?: string;
    pretty: boolean;
};

export interface RecordWriter {
    write(line: string): Promise<void>;
    close(): Promise<void>;
}

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('must be a positive integer');
    }
    return parsed;
}

export function buildProgram(): Command {
    return new Command()
        .name('wayback-harvester')
        .description('Harvest URLs recorded by the Wayback Machine for a domain')
        .version('1.0.0')
        .requiredOption('-d, --domain <domain>', 'target domain, e.g. example.com')
        .option('--include-subdomains', 'include subdomains of the target domain', false)
        .option('--parse-robots', 'mine archived robots.txt files for more URLs', false)
        .option('--parse-source', 'mine archived page sources for more URLs', false)
        .option('-c, --concurrency <number>', 'URLs processed at once', parsePositiveInt, CONFIG.CONCURRENCY)
        .option('--rpm <number>', 'archive requests allowed per minute', parsePositiveInt, CONFIG.REQUESTS_PER_MINUTE)
        .option('-l, --limit <number>', 'stop after this many records', parsePositiveInt)
        .option('-u, --unique', 'drop duplicate URLs within this run', false)
        .option('--json', 'print JSON lines with source and value', false)
        .option('-o, --output <path>', 'write records to a file instead of stdout')
        .option('--pretty', 'pretty-print logs', false);
}

export function formatRecord(record: UrlRecord, json: boolean): string {
    return json ? JSON.stringify({ source: record.source, value: record.value }) : record.value;
}

export function stdoutWriter(): RecordWriter {
    return {
        write: line => writeLine(process.stdout, line),
        close: async () => undefined,
    };
}

export async function fileWriter(filePath: string): Promise<RecordWriter> {
    await fs.ensureDir(path.dirname(path.resolve(filePath)));
    const stream = fs.createWriteStream(filePath);

    // First stream error; later writes and close reject with it
    let failure: Error | undefined;
    stream.on('error', error => {
        if (!failure) failure = error;
    });

    await new Promise<void>((resolve, reject) => {
        const onReady = () => {
            stream.off('error', onError);
            resolve();
        };
        const onError = (error: Error) => {
            stream.off('ready', onReady);
            reject(error);
        };
        stream.once('ready', onReady);
        stream.once('error', onError);
    });

    return {
        write: line => (failure ? Promise.reject(failure) : writeLine(stream, line)),
        close: () => new Promise<void>((resolve, reject) => {
            if (failure) {
                reject(failure);
                return;
            }
            stream.end(() => {
                if (failure) reject(failure);
                else resolve();
            });
        }),
    };
}

function writeLine(stream: NodeJS.WritableStream, line: string): Promise<void> {
    if (stream.write(`${line}\n`)) return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
        const onDrain = () => {
            stream.off('error', onError);
            resolve();
        };
        const onError = (error: Error) => {
            stream.off('drain', onDrain);
            reject(error);
        };
        stream.once('drain', onDrain);
        stream.once('error', onError);
    });
}

/**
 * Drives one harvest and writes each record. Returns how many records were
 * written.
 */
export async function runHarvest(
    options: CliOptions,
    deps: { harvester: WaybackHarvester; writer: RecordWriter; logger: Logger; signal?: AbortSignal },
): Promise<number> {
    const { harvester, writer, logger } = deps;
    const tally = new FailureTally();
    const seen = new Set<string>();
    let written = 0;

    logger.info(
        {
            domain: options.domain,
            includeSubdomains: options.includeSubdomains,
            parseRobots: options.parseRobots,
            parseSource: options.parseSource,
        },
        'Starting Wayback harvest',
    );

    try {
        const records = harvester.harvest({
            domain: options.domain,
            includeSubdomains: options.includeSubdomains,
            parseRobots: options.parseRobots,
            parseSource: options.parseSource,
            concurrency: options.concurrency,
            signal: deps.signal,
            diagnostics: tally,
        });

        for await (const record of records) {
            if (options.unique) {
                if (seen.has(record.value)) continue;
                seen.add(record.value);
            }

            await writer.write(formatRecord(record, options.json));
            written++;

            if (options.limit && written >= options.limit) {
                logger.info(`Reached limit of ${options.limit} records, stopping`);
                break;
            }
        }
    } finally {
        await writer.close();
    }

    const failures = tally.summary();
    if (failures.total > 0) {
        logger.warn(failures, `${failures.total} archive requests failed; results may be incomplete`);
    }
    logger.info({ written }, 'Harvest complete');

    return written;
}
