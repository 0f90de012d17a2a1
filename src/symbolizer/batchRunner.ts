import * as fs from 'fs';
import * as path from 'path';
import { performance } from 'perf_hooks';
import { configurationError, describeError, isIoError } from '../errors';
import { BatchOptions, FileJob, FileStats, RunStats } from '../models/types';
import { SymbolCache } from '../resolvers/symbolCache';
import { numberToHuman, secondsToHuman } from '../util/format';
import { Logger } from '../util/logger';
import { ConsoleSink, FileSink, TraceSink } from './sinks';
import { processTraceFile } from './traceFileProcessor';

export const GENERATED_SUFFIX = '.symbolized';

export interface JobPlan {
    jobs: FileJob[];
    excluded: string[];       // earlier outputs found in the input directory
    ignored: string[];        // directory entries that are not (links to) regular files
}

export interface BatchResult {
    stats: RunStats;
    status: 'completed' | 'aborted';
    elapsedSeconds: number;
}

export interface BatchDependencies {
    logger: Logger;
    consoleSink?: TraceSink;
    now?: () => number;       // milliseconds
}

function statOrUndefined(target: string): fs.Stats | undefined {
    try {
        return fs.statSync(target);
    } catch {
        return undefined;
    }
}

function isSameFile(a: string, b: string): boolean {
    if (path.resolve(a) === path.resolve(b)) { return true; }
    const statA = statOrUndefined(a);
    const statB = statOrUndefined(b);
    return statA !== undefined && statB !== undefined && statA.dev === statB.dev && statA.ino === statB.ino;
}

function checkJob(job: FileJob): FileJob {
    if (job.output !== undefined && isSameFile(job.input, job.output)) {
        throw configurationError(`The output ${job.output} is the input trace itself`);
    }
    return job;
}

/**
 * Work out every job and its output path before anything is symbolized.
 * Throws a configuration error for combinations that cannot be honoured.
 */
export function planJobs(input: string, output: string | undefined): JobPlan {
    const inputStat = statOrUndefined(input);
    if (!inputStat) {
        throw configurationError(`The input ${input} does not exist`);
    }

    const outputPath = output === undefined || output === '' ? undefined : output;
    const outputIsDirectory = outputPath !== undefined && (statOrUndefined(outputPath)?.isDirectory() ?? false);

    const deriveOutput = (inputPath: string): string | undefined => {
        if (outputPath === undefined) { return undefined; }
        if (outputIsDirectory) {
            return path.join(outputPath, path.basename(inputPath) + GENERATED_SUFFIX);
        }
        return outputPath;
    };

    if (!inputStat.isDirectory()) {
        return { jobs: [checkJob({ input, output: deriveOutput(input) })], excluded: [], ignored: [] };
    }

    if (outputPath !== undefined && !outputIsDirectory) {
        throw configurationError(
            `When the input is a directory, the output can only be either empty (for stdout) ` +
            `or an existing directory, got ${outputPath}`
        );
    }

    const entries = fs.readdirSync(input, { withFileTypes: true })
        .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    const jobs: FileJob[] = [];
    const excluded: string[] = [];
    const ignored: string[] = [];
    for (const entry of entries) {
        const inputPath = path.join(input, entry.name);
        // Dirent does not follow links
        const isFile = entry.isFile()
            || (entry.isSymbolicLink() && (statOrUndefined(inputPath)?.isFile() ?? false));
        if (!isFile) {
            ignored.push(inputPath);
            continue;
        }
        if (entry.name.endsWith(GENERATED_SUFFIX)) {
            excluded.push(inputPath);
            continue;
        }
        jobs.push(checkJob({ input: inputPath, output: deriveOutput(inputPath) }));
    }

    return { jobs, excluded, ignored };
}

/**
 * Symbolize every job of the plan, one file after the other.
 *
 * The batch stops at the first file that cannot be read or written, and on an
 * existing output when `onExisting` is 'abort' and overwriting is off.
 */
export async function runBatch(cache: SymbolCache, options: BatchOptions, deps: BatchDependencies): Promise<BatchResult> {
    const { logger } = deps;
    const now = deps.now ?? (() => performance.now());
    const consoleSink = deps.consoleSink ?? new ConsoleSink();

    const plan = planJobs(options.input, options.output);
    const stats: RunStats = {
        linesSymbolized: 0,
        linesFailed: 0,
        linesMalformed: 0,
        filesProcessed: 0,
        filesSkipped: 0,
    };
    let status: BatchResult['status'] = 'completed';

    for (const ignored of plan.ignored) {
        logger.info(`Ignoring ${ignored}, not a regular file..`);
    }
    for (const excluded of plan.excluded) {
        logger.info(`Skipping ${excluded}..`);
    }

    logger.info('Starting to process files..');
    const before = now();

    for (const job of plan.jobs) {
        const output = job.output;
        if (output !== undefined && fs.existsSync(output)) {
            if (!options.overwrite) {
                if (options.onExisting === 'abort') {
                    logger.error(`The output file ${output} already exists, stopping`);
                    status = 'aborted';
                    break;
                }
                logger.info(`The output file ${output} already exists, continuing`);
                stats.filesSkipped++;
                continue;
            }
            logger.info(`The output file ${output} will be overwritten..`);
        }

        const openSink = output === undefined ? () => consoleSink : () => FileSink.open(output);

        let fileStats: FileStats;
        try {
            fileStats = await processTraceFile(cache, job.input, openSink, options, logger);
        } catch (error) {
            if (!isIoError(error)) {
                throw error;
            }
            logger.error(`Symbolizing ${job.input} failed, exiting (${describeError(error)})`);
            status = 'aborted';
            break;
        }

        stats.linesSymbolized += fileStats.linesSymbolized;
        stats.linesFailed += fileStats.linesFailed;
        stats.linesMalformed += fileStats.linesMalformed;
        stats.filesProcessed++;
        const note = fileStats.hitMax ? ', stopped at the maximum number of lines' : '';
        logger.info(`[${stats.filesProcessed} / ${plan.jobs.length}] ${job.input} done${note}`);
    }

    return { stats, status, elapsedSeconds: (now() - before) / 1000 };
}

export function formatRunSummary(result: BatchResult): string {
    const { stats } = result;
    return `Completed symbolization of ${numberToHuman(stats.linesSymbolized)} addresses ` +
        `(${numberToHuman(stats.linesFailed)} failed, ${numberToHuman(stats.linesMalformed)} without an address) ` +
        `in ${secondsToHuman(result.elapsedSeconds)} ` +
        `across ${numberToHuman(stats.filesProcessed)} files (${numberToHuman(stats.filesSkipped)} skipped).`;
}
