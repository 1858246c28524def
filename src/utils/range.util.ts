/**
 * Parsing of single-range `Range: bytes=...` request headers.
 */
export interface ByteRange {
    start: number;
    end: number; // inclusive
}

export type RangeParseResult =
    | { kind: 'none' }
    | { kind: 'unsatisfiable' }
    | { kind: 'range'; range: ByteRange };

const RANGE_PATTERN = /^bytes=(\d*)-(\d*)$/;

/**
 * Interpret a Range header against a resource of `size` bytes.
 *
 * Malformed or multi-range headers yield `none` and the caller serves the
 * whole resource. `bytes=a-b`, `bytes=a-` and `bytes=-n` are supported;
 * an end past the last byte is clamped.
 */
export function parseRangeHeader(header: string | undefined, size: number): RangeParseResult {
    if (!header) {
        return { kind: 'none' };
    }

    const match = RANGE_PATTERN.exec(header.trim());
    if (!match) {
        return { kind: 'none' };
    }

    const [, rawStart, rawEnd] = match;
    if (rawStart === '' && rawEnd === '') {
        return { kind: 'none' };
    }

    if (rawStart === '') {
        const suffix = Number(rawEnd);
        if (suffix === 0 || size === 0) {
            return { kind: 'unsatisfiable' };
        }
        return { kind: 'range', range: { start: Math.max(size - suffix, 0), end: size - 1 } };
    }

    const start = Number(rawStart);
    const end = rawEnd === '' ? size - 1 : Math.min(Number(rawEnd), size - 1);

    if (start >= size) {
        return { kind: 'unsatisfiable' };
    }
    if (end < start) {
        return { kind: 'none' };
    }

    return { kind: 'range', range: { start, end } };
}

export function contentRange(range: ByteRange, size: number): string {
    return `bytes ${range.start}-${range.end}/${size}`;
}
