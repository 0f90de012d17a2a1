import { MemoryRegion, Section, MemoryLayout } from '../models/types';

const enum State {
    SCANNING,
    MEMORY_CONFIG_HEADER,
    MEMORY_CONFIG,
    LINKER_MAP_SECTIONS,
}

export function isGccMapFile(text: string): boolean {
    const lines = text.split('\n', 50);
    return lines.some(l => /^Memory Configuration/i.test(l.trim()));
}

/**
 * Parse the text of a GNU ld map file (`-Map=...`) into its memory regions,
 * output sections and symbols. Addresses are kept as 64-bit values.
 */
export function parseMap(text: string): MemoryLayout {
    const regions: MemoryRegion[] = [];
    const sections: Section[] = [];

    let state: State = State.SCANNING;
    let currentSection: Section | undefined;
    let pendingSymbolName: string | undefined;

    const lines = text.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i];
        const trimmed = line.trim();

        switch (state) {
            case State.SCANNING: {
                if (/^Memory Configuration\s*$/.test(trimmed)) {
                    state = State.MEMORY_CONFIG_HEADER;
                } else if (/^Linker script and memory map\s*$/i.test(trimmed)) {
                    state = State.LINKER_MAP_SECTIONS;
                }
                break;
            }

            case State.MEMORY_CONFIG_HEADER: {
                if (/^Name\s+Origin\s+Length/.test(trimmed)) {
                    state = State.MEMORY_CONFIG;
                }
                break;
            }

            case State.MEMORY_CONFIG: {
                if (!trimmed) {
                    state = State.SCANNING;
                    break;
                }
                if (/^Linker script and memory map/i.test(trimmed)) {
                    state = State.LINKER_MAP_SECTIONS;
                    break;
                }

                // NAME  0xORIGIN  0xLENGTH  attrs
                const memMatch = trimmed.match(
                    /^(\S+)\s+(0x[0-9a-fA-F]+)\s+(0x[0-9a-fA-F]+)/
                );
                if (memMatch) {
                    const name = memMatch[1];
                    // *default* spans the whole address space; it is not a module
                    if (name === '*default*') { break; }
                    regions.push({
                        name,
                        origin: BigInt(memMatch[2]),
                        length: BigInt(memMatch[3]),
                    });
                }
                break;
            }

            case State.LINKER_MAP_SECTIONS: {
                if (/^Cross Reference Table/i.test(trimmed)) {
                    state = State.SCANNING;
                    break;
                }

                // Output section header at column 0:
                // ".text           0x0000000008000188    0x1234 [load address 0x...]"
                const outputSectionMatch = line.match(
                    /^(\.[a-zA-Z_][\w.]*)\s+(0x[0-9a-fA-F]+)\s+(0x[0-9a-fA-F]+)/
                );
                if (outputSectionMatch) {
                    currentSection = {
                        name: outputSectionMatch[1],
                        address: BigInt(outputSectionMatch[2]),
                        size: BigInt(outputSectionMatch[3]),
                        symbols: [],
                    };
                    sections.push(currentSection);
                    pendingSymbolName = undefined;
                    break;
                }

                // Long section names wrap: name alone, address + size on the next line
                const sectionNameOnly = line.match(/^(\.[a-zA-Z_][\w.]*)\s*$/);
                if (sectionNameOnly) {
                    if (i + 1 < lines.length) {
                        const addrSize = lines[i + 1].match(
                            /^\s+(0x[0-9a-fA-F]+)\s+(0x[0-9a-fA-F]+)/
                        );
                        if (addrSize) {
                            currentSection = {
                                name: sectionNameOnly[1],
                                address: BigInt(addrSize[1]),
                                size: BigInt(addrSize[2]),
                                symbols: [],
                            };
                            sections.push(currentSection);
                            pendingSymbolName = undefined;
                            i++;
                        }
                    }
                    break;
                }

                // Input section or symbol line (indented)
                // " .text.func    0x0000000000000100    0x20  file.o"
                if (currentSection && /^\s/.test(line)) {
                    const symbolMatch = trimmed.match(
                        /^(\S+)\s+(0x[0-9a-fA-F]+)\s+(0x[0-9a-fA-F]+)\s+\S/
                    );
                    if (symbolMatch) {
                        const symName = symbolMatch[1];
                        if (/^\*fill\*$/.test(symName)) { break; }

                        currentSection.symbols.push({
                            name: symName,
                            address: BigInt(symbolMatch[2]),
                            size: BigInt(symbolMatch[3]),
                        });
                        pendingSymbolName = undefined;
                        break;
                    }

                    // Symbol name on its own line (long name wraps)
                    const nameOnly = trimmed.match(/^(\S+)\s*$/);
                    if (nameOnly && !nameOnly[1].startsWith('0x')) {
                        pendingSymbolName = nameOnly[1];
                        break;
                    }

                    // Address + size continuation of a wrapped symbol name
                    if (pendingSymbolName) {
                        const contMatch = trimmed.match(
                            /^(0x[0-9a-fA-F]+)\s+(0x[0-9a-fA-F]+)/
                        );
                        if (contMatch) {
                            currentSection.symbols.push({
                                name: pendingSymbolName,
                                address: BigInt(contMatch[1]),
                                size: BigInt(contMatch[2]),
                            });
                            pendingSymbolName = undefined;
                            break;
                        }
                    }

                    // Standalone symbol definition: " 0xADDRESS  symbolname"
                    const standaloneSym = trimmed.match(
                        /^(0x[0-9a-fA-F]+)\s+(\S+)\s*$/
                    );
                    if (standaloneSym) {
                        currentSection.symbols.push({
                            name: standaloneSym[2],
                            address: BigInt(standaloneSym[1]),
                            size: 0n,
                        });
                        pendingSymbolName = undefined;
                    }
                }
                break;
            }
        }
    }

    return { regions, sections };
}
