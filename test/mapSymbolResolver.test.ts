import * as assert from 'assert';
import * as fs from 'fs';
import * as path from 'path';
import { SymbolizerError } from '../src/errors';
import { TraceStyle } from '../src/models/types';
import { parseMap } from '../src/parsers/mapParser';
import { MapSymbolResolver } from '../src/resolvers/mapSymbolResolver';
import { makeTempDir, MemoryLogger, removeDir } from './helpers';

const SAMPLES_DIR = path.join(__dirname, '..', 'samples');

function loadResolver(name: string): MapSymbolResolver {
    return new MapSymbolResolver(parseMap(fs.readFileSync(path.join(SAMPLES_DIR, name), 'utf-8')));
}

describe('MapSymbolResolver — full symbol', () => {
    const resolver = loadResolver('firmware.map');
    const resolve = (address: bigint) => resolver.resolve(address, TraceStyle.FullSymbol);

    it('should resolve the start of a function to offset zero', () => {
        assert.deepStrictEqual(resolve(0x080001c4n), { ok: true, symbol: 'main+0x0' });
    });

    it('should resolve an address inside a function', () => {
        assert.deepStrictEqual(resolve(0x080001d0n), { ok: true, symbol: 'main+0xc' });
    });

    it('should prefer the named symbol over its input section', () => {
        assert.deepStrictEqual(resolve(0x08000190n), { ok: true, symbol: 'Reset_Handler+0x8' });
        assert.deepStrictEqual(resolve(0x08000000n), { ok: true, symbol: 'g_pfnVectors+0x0' });
    });

    it('should resolve into fill after the last symbol of a section', () => {
        assert.deepStrictEqual(resolve(0x08000290n), { ok: true, symbol: 'HAL_Init+0x44' });
    });

    it('should resolve data and bss addresses', () => {
        assert.deepStrictEqual(resolve(0x20000010n), { ok: true, symbol: 'SystemCoreClock+0x10' });
        assert.deepStrictEqual(resolve(0x20000024n), { ok: true, symbol: 'rxBuffer+0x4' });
    });

    it('should fail outside every section', () => {
        assert.deepStrictEqual(resolve(0x30000000n), { ok: false, reason: '0x30000000 is outside every section' });
        // one past the end of .text
        assert.strictEqual(resolve(0x08000388n).ok, false);
    });

    it('should not resolve address zero into non-allocated sections', () => {
        assert.deepStrictEqual(resolve(0n), { ok: false, reason: '0x0 is outside every section' });
    });

    it('should fall back to the section name when no symbol precedes the address', () => {
        const kernel = loadResolver('kernel64.map');
        assert.deepStrictEqual(
            kernel.resolve(0xffffffff82000010n, TraceStyle.FullSymbol),
            { ok: true, symbol: '.rodata+0x10' }
        );
    });

    it('should resolve 64-bit kernel addresses', () => {
        const kernel = loadResolver('kernel64.map');
        assert.deepStrictEqual(
            kernel.resolve(0xffffffff81000810n, TraceStyle.FullSymbol),
            { ok: true, symbol: 'do_syscall_64+0x10' }
        );
        assert.deepStrictEqual(
            kernel.resolve(0xffffffff81000404n, TraceStyle.FullSymbol),
            { ok: true, symbol: 'secondary_startup_64+0x4' }
        );
    });
});

describe('MapSymbolResolver — module offset', () => {
    it('should use the memory region as the module', () => {
        const resolver = loadResolver('firmware.map');
        assert.deepStrictEqual(resolver.resolve(0x080001d0n, TraceStyle.ModuleOffset), { ok: true, symbol: 'FLASH+0x1d0' });
        assert.deepStrictEqual(resolver.resolve(0x20000024n, TraceStyle.ModuleOffset), { ok: true, symbol: 'RAM+0x24' });
    });

    it('should resolve region addresses that no section covers', () => {
        const resolver = loadResolver('firmware.map');
        assert.deepStrictEqual(resolver.resolve(0x2001fff0n, TraceStyle.ModuleOffset), { ok: true, symbol: 'RAM+0x1fff0' });
    });

    it('should fall back to the output section without regions', () => {
        const kernel = loadResolver('kernel64.map');
        assert.deepStrictEqual(
            kernel.resolve(0xffffffff81000810n, TraceStyle.ModuleOffset),
            { ok: true, symbol: '.text+0x810' }
        );
    });

    it('should fail outside every region and section', () => {
        const resolver = loadResolver('firmware.map');
        assert.deepStrictEqual(
            resolver.resolve(0x30000000n, TraceStyle.ModuleOffset),
            { ok: false, reason: '0x30000000 is outside every memory region and section' }
        );
    });
});

describe('MapSymbolResolver.load', () => {
    let dir: string;
    let logger: MemoryLogger;

    beforeEach(() => {
        dir = makeTempDir();
        logger = new MemoryLogger();
    });

    afterEach(() => {
        removeDir(dir);
    });

    it('should load a map snapshot and report what it found', () => {
        const resolver = MapSymbolResolver.load(path.join(SAMPLES_DIR, 'firmware.map'), logger);
        assert.strictEqual(resolver.sectionCount, 4);
        assert.strictEqual(resolver.symbolCount, 14);
        assert.strictEqual(logger.lines[1], 'info: Loaded 14 symbols across 4 sections and 2 memory regions');
    });

    it('should fail to initialize from a missing file', () => {
        assert.throws(
            () => MapSymbolResolver.load(path.join(dir, 'missing.map'), logger),
            (error: unknown) => error instanceof SymbolizerError && error.errorCode === 'INITIALIZATION_ERROR'
        );
    });

    it('should fail to initialize from a file that is not a linker map', () => {
        const notAMap = path.join(dir, 'trace.txt');
        fs.writeFileSync(notAMap, '0x1000\n0x2000\n');
        assert.throws(
            () => MapSymbolResolver.load(notAMap, logger),
            (error: unknown) => error instanceof SymbolizerError && error.message === `${notAMap} is not a GNU ld map file`
        );
    });

    it('should fail to initialize from a map without sections', () => {
        const empty = path.join(dir, 'empty.map');
        fs.writeFileSync(empty, 'Memory Configuration\n\nName Origin Length Attributes\n');
        assert.throws(
            () => MapSymbolResolver.load(empty, logger),
            (error: unknown) => error instanceof SymbolizerError && error.errorCode === 'INITIALIZATION_ERROR'
        );
    });
});
