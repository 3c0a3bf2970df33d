import type { KnowledgeChunk } from '../contracts/kb-source.js';

export interface ChunkingOptions {
  maxChunkSize: number;
  minChunkSize: number;
}

export const DEFAULT_CHUNKING_OPTIONS: ChunkingOptions = {
  maxChunkSize: 800,
  minChunkSize: 80,
};

export interface ChunkOrigin {
  docId: string;
  source: string;
}

interface Section {
  headingPath: string[];
  startLine: number;
  lines: string[];
}

const HEADING_PATTERN = /^(#{1,6})\s+(.+)$/;

function splitSections(content: string): Section[] {
  const sections: Section[] = [];
  const headingStack: Array<{ level: number; text: string }> = [];
  let current: Section = { headingPath: [], startLine: 0, lines: [] };

  content.split('\n').forEach((line, index) => {
    const heading = line.match(HEADING_PATTERN);
    if (heading) {
      if (current.lines.some(l => l.trim().length > 0)) {
        sections.push(current);
      }

      const level = heading[1].length;
      while (headingStack.length > 0 && headingStack[headingStack.length - 1].level >= level) {
        headingStack.pop();
      }
      headingStack.push({ level, text: heading[2].trim() });

      current = { headingPath: headingStack.map(h => h.text), startLine: index, lines: [] };
    }
    current.lines.push(line);
  });

  if (current.lines.some(l => l.trim().length > 0)) {
    sections.push(current);
  }
  return sections;
}

// Single lines longer than the limit are wrapped on word boundaries.
function wrapLine(line: string, maxLength: number): string[] {
  if (line.length <= maxLength) {
    return [line];
  }

  const segments: string[] = [];
  let segment = '';
  for (const word of line.split(/\s+/).filter(w => w.length > 0)) {
    if (segment.length > 0 && segment.length + 1 + word.length > maxLength) {
      segments.push(segment);
      segment = word;
    } else {
      segment = segment.length > 0 ? `${segment} ${word}` : word;
    }
  }
  if (segment.length > 0) {
    segments.push(segment);
  }
  return segments;
}

function buildChunk(
  origin: ChunkOrigin,
  index: number,
  content: string,
  startLine: number,
  endLine: number,
  headingPath: string[],
): KnowledgeChunk {
  return {
    id: `${origin.docId}_chunk_${index}`,
    content,
    doc_id: origin.docId,
    source: origin.source,
    start_line: startLine,
    end_line: endLine,
    heading_path: headingPath,
    metadata: {
      char_count: content.length,
      word_count: content.split(/\s+/).length,
    },
  };
}

function mergeSmallChunks(chunks: KnowledgeChunk[], minChunkSize: number, origin: ChunkOrigin): KnowledgeChunk[] {
  const merged: KnowledgeChunk[] = [];
  for (const chunk of chunks) {
    const previous = merged[merged.length - 1];
    if (previous !== undefined && chunk.content.length < minChunkSize) {
      merged[merged.length - 1] = buildChunk(
        origin,
        merged.length - 1,
        `${previous.content}\n${chunk.content}`,
        previous.start_line,
        chunk.end_line,
        previous.heading_path,
      );
    } else {
      merged.push(buildChunk(origin, merged.length, chunk.content, chunk.start_line, chunk.end_line, chunk.heading_path));
    }
  }
  return merged;
}

/**
 * Split markdown into chunks that never cross a heading boundary.
 * Line numbers are 1-based and inclusive.
 */
export function chunkMarkdown(
  content: string,
  origin: ChunkOrigin,
  options: ChunkingOptions = DEFAULT_CHUNKING_OPTIONS
): KnowledgeChunk[] {
  if (content.trim().length === 0) {
    return [];
  }

  const chunks: KnowledgeChunk[] = [];

  for (const section of splitSections(content)) {
    let piece: string[] = [];
    let pieceStart = section.startLine;
    let pieceEnd = section.startLine;

    const flush = (): void => {
      const text = piece.join('\n').trim();
      if (text.length > 0) {
        chunks.push(buildChunk(origin, chunks.length, text, pieceStart + 1, pieceEnd + 1, section.headingPath));
      }
      piece = [];
    };

    section.lines.forEach((line, offset) => {
      const lineNumber = section.startLine + offset;
      for (const segment of wrapLine(line, options.maxChunkSize)) {
        if (piece.length > 0 && [...piece, segment].join('\n').length > options.maxChunkSize) {
          flush();
        }
        if (piece.length === 0) {
          pieceStart = lineNumber;
        }
        piece.push(segment);
        pieceEnd = lineNumber;
      }
    });
    flush();
  }

  return mergeSmallChunks(chunks, options.minChunkSize, origin);
}

/**
 * Pack sentences of plain text into chunks. Line numbers count sentences.
 */
export function chunkText(
  content: string,
  origin: ChunkOrigin,
  options: ChunkingOptions = DEFAULT_CHUNKING_OPTIONS
): KnowledgeChunk[] {
  if (content.trim().length === 0) {
    return [];
  }

  const sentences = (content.match(/[^.!?]+[.!?]+/g) ?? [content]).map(s => s.trim());
  const chunks: KnowledgeChunk[] = [];
  let current: string[] = [];
  let startIdx = 0;

  sentences.forEach((sentence, i) => {
    if (current.length > 0 && [...current, sentence].join(' ').length > options.maxChunkSize) {
      chunks.push(buildChunk(origin, chunks.length, current.join(' '), startIdx, i, []));
      current = [];
      startIdx = i;
    }
    current.push(sentence);
  });

  if (current.length > 0) {
    chunks.push(buildChunk(origin, chunks.length, current.join(' '), startIdx, sentences.length, []));
  }

  return mergeSmallChunks(chunks, options.minChunkSize, origin);
}
