/**
 * Extract a clean function/variable name from a linker symbol name.
 * Examples:
 *   ".text.app_main"       → "app_main"
 *   ".rodata.str1.1"       → "str1.1"
 *   "main"                 → "main"
 */
export function extractSymbolName(symName: string): string {
    const prefixMatch = symName.match(/^\.(text|rodata|data|bss|literal)\.(.*)/);
    if (prefixMatch) {
        return prefixMatch[2];
    }
    return symName;
}

/**
 * Index of the last element whose address is <= `address`, or -1.
 * `items` must be sorted by address.
 */
export function findFloorIndex<T extends { address: bigint }>(items: readonly T[], address: bigint): number {
    let low = 0;
    let high = items.length;
    while (low < high) {
        const mid = (low + high) >>> 1;
        if (items[mid].address <= address) {
            low = mid + 1;
        } else {
            high = mid;
        }
    }
    return low - 1;
}
