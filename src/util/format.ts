import { Address } from '../models/types';

export function formatAddress(value: Address): string {
    return '0x' + value.toString(16);
}

/** "name+0xoffset", the shape of every symbolized trace line. */
export function formatSymbol(name: string, offset: bigint): string {
    return `${name}+0x${offset.toString(16)}`;
}

export function numberToHuman(value: number): string {
    const K = 1_000;
    const M = K * K;
    if (value > M) {
        return `${(value / M).toFixed(1)}m`;
    }
    if (value > K) {
        return `${(value / K).toFixed(1)}k`;
    }
    return value.toFixed(1);
}

export function secondsToHuman(seconds: number): string {
    const whole = Math.floor(seconds);
    const M = 60;
    const H = M * 60;
    const D = H * 24;
    if (whole >= D) { return `${(whole / D).toFixed(1)}d`; }
    if (whole >= H) { return `${(whole / H).toFixed(1)}hr`; }
    if (whole >= M) { return `${(whole / M).toFixed(1)}min`; }
    return `${whole.toFixed(1)}s`;
}

export function parseCount(value: string): number | undefined {
    const trimmed = value.trim();

    // Hex count
    if (/^0x[0-9a-fA-F]+$/i.test(trimmed)) {
        return parseInt(trimmed, 16);
    }

    // Plain decimal count, digit separators allowed
    if (/^\d[\d_]*$/.test(trimmed)) {
        return parseInt(trimmed.replace(/_/g, ''), 10);
    }

    return undefined;
}
