import { configurationError } from '../errors';
import { OnExistingPolicy, TraceStyle } from '../models/types';
import { parseCount } from '../util/format';

export const DEFAULT_MAX_LINES = 20_000_000;

export const TRACE_STYLE_NAMES: Readonly<Record<string, TraceStyle>> = Object.freeze({
    modoff: TraceStyle.ModuleOffset,
    fullsym: TraceStyle.FullSymbol,
});

export const ON_EXISTING_POLICIES = ['skip', 'abort'] as const;

export interface SymbolizerArgs {
    input: string;
    crashDump: string;
    output?: string;
    skip: number;
    max: number;
    style: TraceStyle;
    overwrite: boolean;
    lineNumbers: boolean;
    onExisting: OnExistingPolicy;
    failurePlaceholder?: string;
    help: boolean;
}

export const USAGE = [
    'trace-symbolizer - symbolize execution traces against a linker map snapshot',
    '',
    'Usage: trace-symbolizer -i <trace|dir> -c <map> [options]',
    '',
    '  -i, --input <path>            Input trace file or directory',
    '  -c, --crash-dump <path>       Linker map snapshot to resolve addresses against',
    '  -o, --output <path>           Output trace or directory (default: stdout)',
    '  -s, --skip <n>                Skip a number of lines (default: 0)',
    `  -m, --max <n>                 Stop after a number of symbolized lines per file (default: ${DEFAULT_MAX_LINES}, 0: no limit)`,
    '      --style <modoff|fullsym>  Trace style (default: fullsym)',
    '      --overwrite               Overwrite output files that already exist',
    '      --line-numbers            Prefix every output line with its input line number',
    '      --on-existing <skip|abort> What to do with a job whose output exists (default: skip)',
    '      --failed-placeholder <t>  Write <t> for lines that fail to symbolize',
    '  -h, --help                    Show this help',
].join('\n');

const ALIASES: Readonly<Record<string, string>> = Object.freeze({
    '-i': '--input',
    '-c': '--crash-dump',
    '-o': '--output',
    '-s': '--skip',
    '-m': '--max',
    '-h': '--help',
});

const FLAGS = new Set(['--overwrite', '--line-numbers', '--help']);
const VALUED = new Set([
    '--input', '--crash-dump', '--output', '--skip', '--max', '--style', '--on-existing', '--failed-placeholder',
]);

function isOnExistingPolicy(value: string): value is OnExistingPolicy {
    return ON_EXISTING_POLICIES.some(policy => policy === value);
}

function parseCountOption(option: string, raw: string): number {
    const parsed = parseCount(raw);
    if (parsed === undefined || !Number.isSafeInteger(parsed)) {
        throw configurationError(`${option} expects a non-negative integer, got "${raw}"`);
    }
    return parsed;
}

export function parseStyle(raw: string): TraceStyle {
    const style = TRACE_STYLE_NAMES[raw.trim().toLowerCase()];
    if (style === undefined) {
        throw configurationError(
            `Unknown style "${raw}". Available styles: ${Object.keys(TRACE_STYLE_NAMES).join(', ')}`
        );
    }
    return style;
}

export function parseSymbolizerArgs(argv: string[]): SymbolizerArgs {
    const values = new Map<string, string>();
    const flags = new Set<string>();

    for (let i = 0; i < argv.length; i += 1) {
        const token = argv[i];
        if (token === '--') {
            continue;
        }

        const eq = token.startsWith('--') ? token.indexOf('=') : -1;
        const rawName = eq >= 0 ? token.slice(0, eq) : token;
        const name = ALIASES[rawName] ?? rawName;

        if (FLAGS.has(name)) {
            if (eq >= 0) {
                throw configurationError(`${name} does not take a value`);
            }
            flags.add(name);
            continue;
        }

        if (VALUED.has(name)) {
            let value: string | undefined;
            if (eq >= 0) {
                value = token.slice(eq + 1);
            } else {
                value = argv[i + 1];
                i += 1;
            }
            if (value === undefined) {
                throw configurationError(`${name} expects a value`);
            }
            values.set(name, value);
            continue;
        }

        throw configurationError(`Unknown argument "${token}"`);
    }

    const help = flags.has('--help');
    const input = values.get('--input');
    const crashDump = values.get('--crash-dump');
    if (!help && (input === undefined || input.trim() === '')) {
        throw configurationError('--input is required');
    }
    if (!help && (crashDump === undefined || crashDump.trim() === '')) {
        throw configurationError('--crash-dump is required');
    }

    const onExisting = values.get('--on-existing')?.trim().toLowerCase() ?? 'skip';
    if (!isOnExistingPolicy(onExisting)) {
        throw configurationError(
            `Unknown --on-existing policy "${onExisting}". Available policies: ${ON_EXISTING_POLICIES.join(', ')}`
        );
    }

    const skipRaw = values.get('--skip');
    const maxRaw = values.get('--max');
    const styleRaw = values.get('--style');
    const output = values.get('--output');

    return {
        input: input ?? '',
        crashDump: crashDump ?? '',
        output: output === undefined || output === '' ? undefined : output,
        skip: skipRaw === undefined ? 0 : parseCountOption('--skip', skipRaw),
        max: maxRaw === undefined ? DEFAULT_MAX_LINES : parseCountOption('--max', maxRaw),
        style: styleRaw === undefined ? TraceStyle.FullSymbol : parseStyle(styleRaw),
        overwrite: flags.has('--overwrite'),
        lineNumbers: flags.has('--line-numbers'),
        onExisting,
        failurePlaceholder: values.get('--failed-placeholder'),
        help,
    };
}
