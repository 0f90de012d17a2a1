import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Address, SymbolizationOutcome, SymbolResolver, TraceStyle } from '../src/models/types';
import { Logger } from '../src/util/logger';
import { TraceSink } from '../src/symbolizer/sinks';

/** Resolves from a fixed table and records every address it was asked about. */
export class FakeResolver implements SymbolResolver {
    readonly calls: Address[] = [];

    constructor(private readonly table: ReadonlyMap<Address, string>) {}

    resolve(address: Address, style: TraceStyle): SymbolizationOutcome {
        this.calls.push(address);
        const name = this.table.get(address);
        if (name === undefined) {
            return { ok: false, reason: 'not in table' };
        }
        return { ok: true, symbol: style === TraceStyle.ModuleOffset ? `mod!${name}` : name };
    }

    callsFor(address: Address): number {
        return this.calls.filter(a => a === address).length;
    }
}

export class MemoryLogger implements Logger {
    readonly lines: string[] = [];

    info(message: string): void { this.lines.push(`info: ${message}`); }
    warn(message: string): void { this.lines.push(`warn: ${message}`); }
    error(message: string): void { this.lines.push(`error: ${message}`); }
}

export class MemorySink implements TraceSink {
    text = '';
    closed = 0;

    write(text: string): void { this.text += text; }
    close(): void { this.closed++; }
}

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'trace-symbolizer-'));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}
