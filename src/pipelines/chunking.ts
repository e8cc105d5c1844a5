import { normalizeText } from "../utils/text.js";

export interface ChunkingOptions {
  maxChars: number;
  overlap: number;
}

export const DEFAULT_CHUNKING: ChunkingOptions = {
  maxChars: 800,
  overlap: 120,
};

interface SectionBlock {
  title: string | null;
  body: string;
}

/**
 * Splits text into chunks along section headers and natural boundaries.
 * Each chunk of a titled section starts with `[title]` so it keeps its
 * context when retrieved alone. The output depends only on the input.
 */
export function splitIntoChunks(
  text: string,
  options: ChunkingOptions = DEFAULT_CHUNKING,
): string[] {
  const maxChars = Math.max(options.maxChars, 1);
  const overlap = Math.min(Math.max(options.overlap, 0), maxChars - 1);
  const normalized = normalizeText(text);
  if (!normalized) {
    return [];
  }

  const chunks: string[] = [];
  for (const section of splitIntoSections(normalized)) {
    const prefix = section.title ? `[${section.title}]\n` : "";
    const maxBodyChars = Math.max(Math.floor(maxChars / 2), maxChars - prefix.length);

    for (const body of splitByNaturalBoundary(section.body, maxBodyChars, overlap)) {
      const chunk = normalizeText(`${prefix}${body}`);
      if (chunk) {
        chunks.push(chunk);
      }
    }
  }

  return dedupe(chunks);
}

/**
 * Packs whole lines into chunks of at most `maxChars`, never splitting a
 * line unless the line alone is longer than the limit.
 */
export function groupLinesIntoChunks(lines: string[], maxChars: number): string[] {
  const chunks: string[] = [];
  let current: string[] = [];
  let currentLength = 0;

  const flush = () => {
    if (current.length > 0) {
      chunks.push(current.join("\n"));
    }
    current = [];
    currentLength = 0;
  };

  for (const raw of lines) {
    const line = raw.trim();
    if (!line) {
      continue;
    }

    if (line.length > maxChars) {
      flush();
      for (let start = 0; start < line.length; start += maxChars) {
        chunks.push(line.slice(start, start + maxChars));
      }
      continue;
    }

    const added = current.length === 0 ? line.length : line.length + 1;
    if (currentLength + added > maxChars) {
      flush();
      current.push(line);
      currentLength = line.length;
      continue;
    }

    current.push(line);
    currentLength += added;
  }

  flush();
  return chunks;
}

function splitIntoSections(text: string): SectionBlock[] {
  const sections: SectionBlock[] = [];
  let title: string | null = null;
  let bodyLines: string[] = [];

  const flush = () => {
    const body = normalizeText(bodyLines.join("\n"));
    if (body || title) {
      sections.push({ title, body });
    }
    title = null;
    bodyLines = [];
  };

  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    if (!line) {
      if (bodyLines.length > 0) {
        bodyLines.push("");
      }
      continue;
    }

    if (isSectionHeader(line)) {
      flush();
      title = cleanSectionTitle(line);
      continue;
    }

    bodyLines.push(line);
  }
  flush();

  return sections.length > 0 ? sections : [{ title: null, body: text }];
}

function isSectionHeader(line: string): boolean {
  return /^#{1,6}\s+\S/.test(line) || /^[A-Za-z0-9 _-]{2,80}:$/.test(line);
}

function cleanSectionTitle(line: string): string {
  return line.replace(/^#{1,6}\s+/, "").replace(/:$/, "").trim();
}

function splitByNaturalBoundary(text: string, maxChars: number, overlap: number): string[] {
  const normalized = normalizeText(text);
  if (!normalized) {
    return [];
  }
  if (normalized.length <= maxChars) {
    return [normalized];
  }

  const pieces: string[] = [];
  let start = 0;

  while (start < normalized.length) {
    const hardEnd = Math.min(start + maxChars, normalized.length);
    let end = hardEnd;

    if (hardEnd < normalized.length) {
      const boundary = findLastBoundary(normalized.slice(start, hardEnd));
      if (boundary >= Math.floor(maxChars * 0.55)) {
        end = start + boundary;
      }
    }

    const piece = normalized.slice(start, end).trim();
    if (piece) {
      pieces.push(piece);
    }
    if (end >= normalized.length) {
      break;
    }

    const nextStart = Math.max(0, end - overlap);
    start = nextStart > start ? nextStart : end;
  }

  return pieces;
}

// Sentence punctuation stays with the piece before the cut.
function findLastBoundary(text: string): number {
  const candidates = ["\n\n", "\n- ", "\n* ", "\n", ". ", "! ", "? ", "; ", ", "].map(
    (separator) => {
      const index = text.lastIndexOf(separator);
      return index >= 0 && separator[0] !== "\n" ? index + 1 : index;
    },
  );
  const best = Math.max(...candidates);
  return best < 0 ? text.length : best;
}

function dedupe(chunks: string[]): string[] {
  return [...new Set(chunks)];
}
