import { Address } from '../models/types';

export const MAX_ADDRESS: Address = (1n << 64n) - 1n;

// Optional sign, optional 0x marker (only when a hex digit follows it), hex digits.
const ADDRESS_LITERAL = /^\s*([+-]?)(?:0[xX](?=[0-9a-fA-F]))?([0-9a-fA-F]+)/;

/**
 * Read the hexadecimal address at the start of a trace line.
 *
 * Reading stops at the first character that is not a hex digit. A line without
 * a literal reads as address zero, a negative literal wraps around 2^64 and an
 * oversized one saturates at the largest address.
 */
export function parseAddress(text: string): Address {
    const match = text.match(ADDRESS_LITERAL);
    if (!match) {
        return 0n;
    }

    const magnitude = BigInt('0x' + match[2]);
    if (magnitude > MAX_ADDRESS) {
        return MAX_ADDRESS;
    }
    return match[1] === '-' ? BigInt.asUintN(64, -magnitude) : magnitude;
}

export function hasAddressLiteral(text: string): boolean {
    return ADDRESS_LITERAL.test(text);
}
