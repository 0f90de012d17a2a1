#!/usr/bin/env node
import * as fs from 'fs';
import { configurationError, SYMBOLIZER_ERROR_CODES, SymbolizerError } from './errors';
import { parseSymbolizerArgs, USAGE } from './parsers/argsParser';
import { MapSymbolResolver } from './resolvers/mapSymbolResolver';
import { SymbolCache } from './resolvers/symbolCache';
import { BatchDependencies, formatRunSummary, runBatch } from './symbolizer/batchRunner';
import { consoleLogger, Logger } from './util/logger';

export async function main(
    argv: string[],
    logger: Logger = consoleLogger,
    deps: Omit<BatchDependencies, 'logger'> = {},
): Promise<number> {
    try {
        const args = parseSymbolizerArgs(argv);
        if (args.help) {
            logger.info(USAGE);
            return 0;
        }

        if (!fs.existsSync(args.input)) {
            throw configurationError(`The input ${args.input} does not exist`);
        }
        if (!fs.statSync(args.crashDump, { throwIfNoEntry: false })?.isFile()) {
            throw configurationError(`The crash-dump ${args.crashDump} is not an existing file`);
        }

        const cache = new SymbolCache(MapSymbolResolver.load(args.crashDump, logger));
        const result = await runBatch(cache, {
            input: args.input,
            output: args.output,
            skip: args.skip,
            max: args.max,
            style: args.style,
            includeLineNumbers: args.lineNumbers,
            failurePlaceholder: args.failurePlaceholder,
            overwrite: args.overwrite,
            onExisting: args.onExisting,
        }, { ...deps, logger });

        logger.info(formatRunSummary(result));
        logger.info(`${cache.size} unique addresses cached`);
        return result.status === 'completed' ? 0 : 1;
    } catch (error) {
        if (error instanceof SymbolizerError) {
            logger.error(error.message);
            if (error.errorCode === SYMBOLIZER_ERROR_CODES.CONFIGURATION_ERROR) {
                logger.error('Run with --help for usage.');
            }
            return 1;
        }
        throw error;
    }
}

if (require.main === module) {
    main(process.argv.slice(2)).then(
        (code) => { process.exitCode = code; },
        (error: unknown) => {
            console.error(error);
            process.exitCode = 1;
        },
    );
}
