#!/usr/bin/env node
import { buildProgram, type CliOptions, fileWriter, runHarvest, stdoutWriter } from './cli';
import { WaybackHarvester } from './harvester';
import { createLogger } from './logger';

const program = buildProgram().parse(process.argv);
const options = program.opts<CliOptions>();

const logger = createLogger({ pretty: options.pretty || process.stderr.isTTY });

async function main() {
    const controller = new AbortController();
    process.once('SIGINT', () => {
        logger.warn('Interrupted, cancelling harvest');
        controller.abort();
    });

    const harvester = new WaybackHarvester({ requestsPerMinute: options.rpm, logger });
    const writer = options.output ? await fileWriter(options.output) : stdoutWriter();

    await runHarvest(options, { harvester, writer, logger, signal: controller.signal });
}

main().catch(err => {
    logger.error(err, 'Unhandled exception in main loop');
    process.exit(1);
});
