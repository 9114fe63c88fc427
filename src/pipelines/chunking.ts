export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

export interface TextChunk {
  text: string;
  /** Offset of the first character in the source text. */
  start: number;
  /** Offset one past the last character in the source text. */
  end: number;
}

interface Boundary {
  separator: string;
  /** Characters of the separator kept at the end of the chunk. */
  keep: number;
}

const BOUNDARIES: Boundary[] = [
  { separator: "\n\n", keep: 2 },
  { separator: "\n- ", keep: 1 },
  { separator: "\n* ", keep: 1 },
  { separator: "\n", keep: 1 },
  { separator: ". ", keep: 2 },
  { separator: "! ", keep: 2 },
  { separator: "? ", keep: 2 },
  { separator: "; ", keep: 2 },
  { separator: ", ", keep: 2 },
  { separator: " ", keep: 1 },
];

const MIN_BOUNDARY_RATIO = 0.55;

/**
 * Splits text into windows of at most `maxChars` characters. A window is cut
 * at the last natural boundary past 55% of its length, and the next window
 * starts `overlap` characters before that cut, so every character of the
 * input lands in at least one chunk. Whitespace-only windows are skipped.
 */
export function* iterateChunks(
  text: string,
  maxChars: number = DEFAULT_CHUNK_SIZE,
  overlap: number = DEFAULT_CHUNK_OVERLAP,
): Generator<TextChunk> {
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${maxChars}.`);
  }
  const safeOverlap = Math.min(Math.max(Math.floor(overlap), 0), maxChars - 1);

  let start = 0;
  while (start < text.length) {
    const hardEnd = Math.min(start + maxChars, text.length);
    let end = hardEnd;

    if (hardEnd < text.length) {
      const boundary = findLastBoundary(text.slice(start, hardEnd));
      if (boundary >= Math.floor(maxChars * MIN_BOUNDARY_RATIO)) {
        end = start + boundary;
      }
    }

    const piece = text.slice(start, end);
    if (piece.trim()) {
      yield { text: piece.trim(), start, end };
    }

    if (end >= text.length) {
      return;
    }

    const nextStart = end - safeOverlap;
    start = nextStart > start ? nextStart : end;
  }
}

function findLastBoundary(window: string): number {
  let best = -1;
  for (const { separator, keep } of BOUNDARIES) {
    const idx = window.lastIndexOf(separator);
    if (idx < 0) {
      continue;
    }
    const cut = idx + keep;
    if (cut > best && cut <= window.length) {
      best = cut;
    }
  }
  return best;
}
