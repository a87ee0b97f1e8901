import { ChunkingError } from "../errors";

export interface ChunkOptions {
    maxSize: number;
    overlap: number;
}

export interface TextChunk {
    index: number;
    start: number;
    end: number;
    text: string;
}

// Preferred cut points, strongest first. A cut lands right after the match.
const BOUNDARY_PATTERNS: readonly RegExp[] = [
    /\n[ \t]*\n\s*/g,
    /[.!?]["')\]]?\s+|\n/g,
    /\s+/g,
];

function assertOptions({ maxSize, overlap }: ChunkOptions): void {
    if (!Number.isInteger(maxSize) || maxSize <= 0) {
        throw new ChunkingError(`Chunk size must be a positive integer, got ${maxSize}.`);
    }
    if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxSize) {
        throw new ChunkingError(`Chunk overlap must be a non-negative integer below ${maxSize}, got ${overlap}.`);
    }
}

/**
 * Last cut point in (minEnd, maxEnd] produced by `pattern`, or undefined.
 */
function lastBoundary(text: string, windowStart: number, minEnd: number, maxEnd: number, pattern: RegExp): number | undefined {
    const window = text.slice(windowStart, maxEnd);
    const matcher = new RegExp(pattern.source, "g");
    let best: number | undefined;

    for (const match of window.matchAll(matcher)) {
        const cut = windowStart + (match.index ?? 0) + match[0].length;
        if (cut > minEnd && cut <= maxEnd) {
            best = cut;
        }
    }

    return best;
}

function findCut(text: string, start: number, options: ChunkOptions): number {
    const maxEnd = start + options.maxSize;
    // never cut so early that the next chunk would not advance, and avoid
    // slivers by only accepting soft boundaries in the back half
    const minEnd = Math.max(start + options.overlap, start + Math.floor(options.maxSize / 2));

    for (const pattern of BOUNDARY_PATTERNS) {
        const cut = lastBoundary(text, start, minEnd, maxEnd, pattern);
        if (cut !== undefined) {
            return cut;
        }
    }

    return maxEnd;
}

/**
 * Splits `text` into chunks of at most `maxSize` characters, preferring
 * paragraph, then sentence, then word boundaries and falling back to a hard
 * cut. Every chunk after the first begins with the last `overlap` characters
 * of its predecessor, so `chunks[0] + chunks[1..].map(c => c.slice(overlap))`
 * is exactly `text`. Whitespace-only input yields no chunks.
 */
export function chunkTextWithOffsets(text: string, options: ChunkOptions): TextChunk[] {
    assertOptions(options);

    if (text.trim().length === 0) {
        return [];
    }

    const chunks: TextChunk[] = [];
    let start = 0;

    while (true) {
        if (text.length - start <= options.maxSize) {
            chunks.push({ index: chunks.length, start, end: text.length, text: text.slice(start) });
            return chunks;
        }

        const end = findCut(text, start, options);
        chunks.push({ index: chunks.length, start, end, text: text.slice(start, end) });
        start = end - options.overlap;
    }
}

export function chunkText(text: string, maxSize: number, overlap: number): string[] {
    return chunkTextWithOffsets(text, { maxSize, overlap }).map((chunk) => chunk.text);
}

/**
 * Inverse of chunking for a known overlap.
 */
export function joinChunks(chunks: string[], overlap: number): string {
    return chunks.map((chunk, index) => (index === 0 ? chunk : chunk.slice(overlap))).join("");
}

export function chunkIdFor(sourceId: string, index: number): string {
    return `${sourceId}_${index}`;
}
