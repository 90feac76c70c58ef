import { invalidConfig } from "../errors.ts";
import type { ChunkDraft } from "../types.ts";

export interface ChunkOptions {
  chunkSize: number;
  overlap: number;
  /** Lookback (chars) before a hard cut in which a boundary is searched. Default chunkSize / 5. */
  boundaryWindow?: number;
  /** Boundaries in order of preference. */
  separators?: string[];
}

const DEFAULT_SEPARATORS = ["\n\n", "\n", ". ", "! ", "? ", "; ", " "];

type ResolvedChunkOptions = Required<ChunkOptions>;

function resolveOptions(opts: ChunkOptions): ResolvedChunkOptions {
  const { chunkSize, overlap } = opts;

  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw invalidConfig(`chunkSize must be a positive integer (got ${String(chunkSize)})`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw invalidConfig(`overlap must be a non-negative integer (got ${String(overlap)})`);
  }
  if (overlap >= chunkSize) {
    throw invalidConfig(`overlap (${overlap}) must be smaller than chunkSize (${chunkSize})`);
  }

  const windowRaw = opts.boundaryWindow ?? 0;
  if (!Number.isInteger(windowRaw) || windowRaw < 0) {
    throw invalidConfig(`boundaryWindow must be a non-negative integer (got ${String(windowRaw)})`);
  }

  const seps = opts.separators ?? DEFAULT_SEPARATORS;

  return {
    chunkSize,
    overlap,
    boundaryWindow: windowRaw > 0 ? windowRaw : Math.floor(chunkSize / 5),
    separators: seps.filter((s) => typeof s === "string" && s.length > 0),
  };
}

/**
 * Picks the end of a chunk body. The end lands just after the latest
 * separator inside [hardEnd - window, hardEnd]; earlier separators in the
 * list win over later ones. Without any, the body is cut at hardEnd.
 */
function findBodyEnd(text: string, bodyStart: number, hardEnd: number, options: ResolvedChunkOptions): number {
  const windowStart = Math.max(bodyStart + 1, hardEnd - options.boundaryWindow);
  if (windowStart >= hardEnd) { return hardEnd; }

  for (const sep of options.separators) {
    const idx = text.lastIndexOf(sep, hardEnd - sep.length);
    if (idx === -1) { continue; }

    const end = idx + sep.length;
    if (end >= windowStart && end <= hardEnd) { return end; }
  }

  return hardEnd;
}

/** True when index falls between the two halves of a surrogate pair. */
function splitsSurrogatePair(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) { return false; }
  const before = text.charCodeAt(index - 1);
  const after = text.charCodeAt(index);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

function* generateChunks(text: string, options: ResolvedChunkOptions): Generator<ChunkDraft, void, void> {
  let bodyStart = 0;
  let sequenceIndex = 0;

  while (bodyStart < text.length) {
    let charStart = bodyStart - Math.min(options.overlap, bodyStart);
    if (splitsSurrogatePair(text, charStart)) { charStart += 1; }

    const hardEnd = charStart + options.chunkSize;
    let end = hardEnd >= text.length ? text.length : findBodyEnd(text, bodyStart, hardEnd, options);

    if (splitsSurrogatePair(text, end)) {
      if (end - 1 > bodyStart) {
        end -= 1;
      } else {
        // One code unit of room: take the whole pair and give up overlap instead.
        end += 1;
        charStart = Math.min(bodyStart, Math.max(charStart, end - options.chunkSize));
        if (splitsSurrogatePair(text, charStart)) { charStart += 1; }
      }
    }

    yield {
      sequenceIndex,
      text: text.slice(charStart, end),
      overlapChars: bodyStart - charStart,
      charStart,
      charEnd: end,
    };

    sequenceIndex += 1;
    bodyStart = end;
  }
}

/**
 * Splits text into overlapping chunks of at most chunkSize UTF-16 code
 * units. Chunk edges never split a surrogate pair, so with chunkSize 1 a
 * single astral character yields a two-unit chunk.
 * Options are validated eagerly; chunks are produced lazily and the returned
 * iterable can be walked any number of times.
 */
export function chunkText(input: string, opts: ChunkOptions): Iterable<ChunkDraft> {
  const options = resolveOptions(opts);
  const text = String(input ?? "");

  return {
    [Symbol.iterator]: () => generateChunks(text, options),
  };
}

export function reassembleChunks(chunks: Iterable<ChunkDraft>): string {
  let out = "";
  for (const c of chunks) {
    out += c.text.slice(c.overlapChars);
  }
  return out;
}
