export type Address = bigint;

export enum TraceStyle {
    ModuleOffset = 'modoff',
    FullSymbol = 'fullsym',
}

export interface MemoryRegion {
    name: string;
    origin: Address;
    length: bigint;
}

export interface Section {
    name: string;
    address: Address;
    size: bigint;
    symbols: MapSymbol[];
}

export interface MapSymbol {
    name: string;
    address: Address;
    size: bigint;
}

export interface MemoryLayout {
    regions: MemoryRegion[];
    sections: Section[];        // all output sections, in map order
}

export type SymbolizationOutcome =
    | { ok: true; symbol: string }
    | { ok: false; reason: string };

export interface SymbolResolver {
    resolve(address: Address, style: TraceStyle): SymbolizationOutcome;
}

export interface TraceLine {
    index: number;
    text: string;
}

/** A single input trace and where its symbolized lines go; `output` undefined means the console. */
export interface FileJob {
    readonly input: string;
    readonly output?: string;
}

export interface FileStats {
    linesSymbolized: number;
    linesFailed: number;
    linesMalformed: number;   // no address literal at the start of the line
    hitMax: boolean;
}

export interface RunStats {
    linesSymbolized: number;
    linesFailed: number;
    linesMalformed: number;
    filesProcessed: number;
    filesSkipped: number;
}

export interface ProcessorConfig {
    skip: number;
    max: number;              // 0 disables the ceiling
    style: TraceStyle;
    includeLineNumbers: boolean;
    failurePlaceholder?: string;
}

export type OnExistingPolicy = 'skip' | 'abort';

export interface BatchOptions extends ProcessorConfig {
    input: string;
    output?: string;
    overwrite: boolean;
    onExisting: OnExistingPolicy;
}
