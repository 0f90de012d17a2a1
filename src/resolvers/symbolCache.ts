import { Address, SymbolizationOutcome, SymbolResolver, TraceStyle } from '../models/types';

/**
 * Memoizes successful resolutions for the lifetime of a run. Failures are not
 * stored, so an address that fails is handed to the resolver again on its next
 * occurrence.
 */
export class SymbolCache {
    private readonly entries = new Map<string, string>();

    constructor(private readonly resolver: SymbolResolver) {}

    resolve(address: Address, style: TraceStyle): SymbolizationOutcome {
        const key = `${style}:${address.toString(16)}`;
        const cached = this.entries.get(key);
        if (cached !== undefined) {
            return { ok: true, symbol: cached };
        }

        const outcome = this.resolver.resolve(address, style);
        if (outcome.ok) {
            this.entries.set(key, outcome.symbol);
        }
        return outcome;
    }

    get size(): number {
        return this.entries.size;
    }
}
