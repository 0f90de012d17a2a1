import * as fs from 'fs';
import { initializationError } from '../errors';
import {
    Address,
    MapSymbol,
    MemoryLayout,
    MemoryRegion,
    Section,
    SymbolizationOutcome,
    SymbolResolver,
    TraceStyle,
} from '../models/types';
import { isGccMapFile, parseMap } from '../parsers/mapParser';
import { formatAddress, formatSymbol } from '../util/format';
import { Logger } from '../util/logger';
import { extractSymbolName, findFloorIndex } from '../util/symbols';

interface IndexedSection {
    section: Section;
    end: Address;
    symbols: MapSymbol[];     // sorted by address, map order kept for equal addresses
}

// Sections the linker lists at address zero without loading them
const NON_ALLOC_SECTION = /^\.(comment|debug|stab|ARM\.attributes|gnu\.attributes)/;

function contains(start: Address, length: bigint, address: Address): boolean {
    return address >= start && address < start + length;
}

/**
 * Resolves addresses against the layout described by a GNU ld map file.
 *
 * Module+offset uses the MEMORY region holding the address as the module
 * (falling back to the output section when the map declares no region for it).
 * Full symbol uses the closest symbol at or below the address inside the
 * output section that holds it.
 */
export class MapSymbolResolver implements SymbolResolver {
    private readonly regions: MemoryRegion[];
    private readonly sections: IndexedSection[];

    constructor(layout: MemoryLayout) {
        this.regions = layout.regions.filter(r => r.length > 0n);
        this.sections = layout.sections
            .filter(s => s.size > 0n && !NON_ALLOC_SECTION.test(s.name))
            .map(section => ({
                section,
                end: section.address + section.size,
                // Array.prototype.sort is stable
                symbols: section.symbols
                    .slice()
                    .sort((a, b) => (a.address < b.address ? -1 : a.address > b.address ? 1 : 0)),
            }));
    }

    static load(mapPath: string, logger: Logger): MapSymbolResolver {
        logger.info(`Opening the map snapshot ${mapPath}..`);

        let text: string;
        try {
            text = fs.readFileSync(mapPath, 'utf8');
        } catch (error) {
            throw initializationError(`Could not read the map snapshot ${mapPath}`, error);
        }

        if (!isGccMapFile(text)) {
            throw initializationError(`${mapPath} is not a GNU ld map file`);
        }

        const layout = parseMap(text);
        const resolver = new MapSymbolResolver(layout);
        if (resolver.sectionCount === 0) {
            throw initializationError(`${mapPath} does not describe any non-empty section`);
        }

        logger.info(
            `Loaded ${resolver.symbolCount} symbols across ${resolver.sectionCount} sections ` +
            `and ${resolver.regions.length} memory regions`
        );
        return resolver;
    }

    get sectionCount(): number {
        return this.sections.length;
    }

    get symbolCount(): number {
        return this.sections.reduce((total, s) => total + s.symbols.length, 0);
    }

    resolve(address: Address, style: TraceStyle): SymbolizationOutcome {
        return style === TraceStyle.ModuleOffset
            ? this.resolveModuleOffset(address)
            : this.resolveFullSymbol(address);
    }

    private findSection(address: Address): IndexedSection | undefined {
        return this.sections.find(s => address >= s.section.address && address < s.end);
    }

    private resolveModuleOffset(address: Address): SymbolizationOutcome {
        const region = this.regions.find(r => contains(r.origin, r.length, address));
        if (region) {
            return { ok: true, symbol: formatSymbol(region.name, address - region.origin) };
        }

        const indexed = this.findSection(address);
        if (indexed) {
            const { section } = indexed;
            return { ok: true, symbol: formatSymbol(section.name, address - section.address) };
        }

        return { ok: false, reason: `${formatAddress(address)} is outside every memory region and section` };
    }

    private resolveFullSymbol(address: Address): SymbolizationOutcome {
        const indexed = this.findSection(address);
        if (!indexed) {
            return { ok: false, reason: `${formatAddress(address)} is outside every section` };
        }

        const index = findFloorIndex(indexed.symbols, address);
        if (index < 0) {
            const { section } = indexed;
            return { ok: true, symbol: formatSymbol(section.name, address - section.address) };
        }

        const symbol = indexed.symbols[index];
        return { ok: true, symbol: formatSymbol(extractSymbolName(symbol.name), address - symbol.address) };
    }
}
