import * as crypto from 'crypto';

type Fingerprintable = string | number | boolean | null | undefined | Fingerprintable[] | { [key: string]: Fingerprintable };

/**
 * JSON encoding with sorted object keys, so equal values always hash equally.
 */
export function stableStringify(value: Fingerprintable): string {
    if (value === undefined) {
        return 'null';
    }
    if (value === null || typeof value !== 'object') {
        return JSON.stringify(value);
    }
    if (Array.isArray(value)) {
        return `[${value.map(item => stableStringify(item)).join(',')}]`;
    }
    const keys = Object.keys(value).sort();
    return `{${keys.map(key => `${JSON.stringify(key)}:${stableStringify(value[key])}`).join(',')}}`;
}

export function fingerprint(...parts: Fingerprintable[]): string {
    return crypto.createHash('sha256').update(stableStringify(parts)).digest('hex');
}

export function shortFingerprint(...parts: Fingerprintable[]): string {
    return fingerprint(...parts).slice(0, 16);
}

/**
 * Collapse whitespace and case so cosmetic edits keep the same identity.
 */
export function normalizeText(text: string): string {
    return text.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Unsigned 32-bit hash for deterministic bucketing.
 */
export function stableHash32(value: string): number {
    return crypto.createHash('sha256').update(value).digest().readUInt32BE(0);
}

export function slugify(value: string): string {
    return value
        .toLowerCase()
        .normalize('NFKD')
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
}
