import * as fs from 'fs';
import * as path from 'path';
import * as readline from 'readline';
import { FileHandle } from 'fs/promises';
import { ioError, SymbolizerError } from '../errors';
import { FileStats, ProcessorConfig, TraceLine } from '../models/types';
import { hasAddressLiteral, parseAddress } from '../parsers/addressParser';
import { SymbolCache } from '../resolvers/symbolCache';
import { formatAddress, numberToHuman } from '../util/format';
import { Logger } from '../util/logger';
import { TraceSink } from './sinks';

/**
 * Lazy, forward-only line sequence over an open trace. Breaking out of the
 * consuming loop stops reading; the handle itself is closed by the caller.
 */
async function* readTraceLines(handle: FileHandle, input: string): AsyncGenerator<TraceLine> {
    const stream = handle.createReadStream({ encoding: 'utf8', autoClose: false });
    const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
    let index = 0;
    try {
        for await (const text of lines) {
            yield { index: index++, text };
        }
    } catch (error) {
        throw ioError(`Could not read input ${input}`, error);
    } finally {
        lines.close();
        stream.destroy();
    }
}

/**
 * Symbolize one trace into `openSink()`'s destination.
 *
 * The sink is only opened once the input is open. Resolution failures are
 * logged and counted; an input or output failure throws a SymbolizerError with
 * the IO_ERROR code.
 */
export async function processTraceFile(
    cache: SymbolCache,
    input: string,
    openSink: () => TraceSink,
    config: ProcessorConfig,
    logger: Logger,
): Promise<FileStats> {
    let handle: FileHandle;
    try {
        handle = await fs.promises.open(input, 'r');
    } catch (error) {
        throw ioError(`Could not open input ${input}`, error);
    }

    try {
        let sink: TraceSink;
        try {
            sink = openSink();
        } catch (error) {
            throw error instanceof SymbolizerError ? error : ioError('Could not open output', error);
        }

        try {
            return await symbolizeLines(cache, readTraceLines(handle, input), sink, path.basename(input), config, logger);
        } finally {
            sink.close();
        }
    } finally {
        await handle.close();
    }
}

async function symbolizeLines(
    cache: SymbolCache,
    lines: AsyncIterable<TraceLine>,
    sink: TraceSink,
    fileName: string,
    config: ProcessorConfig,
    logger: Logger,
): Promise<FileStats> {
    const stats: FileStats = { linesSymbolized: 0, linesFailed: 0, linesMalformed: 0, hitMax: false };

    for await (const { index, text } of lines) {
        if (config.max > 0 && stats.linesSymbolized >= config.max) {
            logger.info(`Hit the maximum number of symbolized lines ${numberToHuman(config.max)}, exiting`);
            stats.hitMax = true;
            break;
        }

        if (index < config.skip) {
            continue;
        }

        if (!hasAddressLiteral(text)) {
            stats.linesMalformed++;
        }

        const address = parseAddress(text);
        const outcome = cache.resolve(address, config.style);
        const marker = config.includeLineNumbers ? `l${index}: ` : '';

        if (!outcome.ok) {
            logger.warn(
                `${fileName}:${index}: Symbolization of ${formatAddress(address)} failed ('${text}'): ${outcome.reason}, skipping`
            );
            stats.linesFailed++;
            if (config.failurePlaceholder !== undefined) {
                sink.write(`${marker}${config.failurePlaceholder}\n`);
            }
            continue;
        }

        sink.write(`${marker}${outcome.symbol}\n`);
        stats.linesSymbolized++;
    }

    return stats;
}
