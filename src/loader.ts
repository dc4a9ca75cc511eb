import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ReviewDocument } from './types.js';
import { parseMarkdown } from './parser.js';
import { MissingInputError } from './errors.js';

/** Role-grouped script content, rendered once per participant */
export const SCRIPT_SOURCE = 'script.md';

/** Flat skills list, rendered as the assessment form */
export const SKILLS_SOURCE = 'skills.md';

export const SOURCE_IDS = [SCRIPT_SOURCE, SKILLS_SOURCE] as const;

export type SourceId = typeof SOURCE_IDS[number];

/**
 * A content file and its parsed model
 */
export interface SourceDocument {
  /** File name within the content directory */
  documentId: SourceId;
  /** Absolute path it was read from */
  filePath: string;
  /** Raw markdown */
  content: string;
  /** Parsed model, shared by every render of this file */
  document: ReviewDocument;
}

/**
 * Result of loading the content directory
 */
export interface LoadResult {
  /** Sources that were found, by document ID */
  sources: Map<SourceId, SourceDocument>;
  /** One entry per source that was not found */
  missing: MissingInputError[];
}

export function isSourceId(id: string): id is SourceId {
  return SOURCE_IDS.some(sourceId => sourceId === id);
}

/**
 * Read and parse the content files. A missing file is recorded rather
 * than thrown so the renders that do not need it can still run.
 */
export function loadSources(contentDir: string): LoadResult {
  const sources = new Map<SourceId, SourceDocument>();
  const missing: MissingInputError[] = [];

  for (const documentId of SOURCE_IDS) {
    const filePath = path.resolve(contentDir, documentId);

    if (!fs.existsSync(filePath)) {
      missing.push(new MissingInputError(filePath));
      continue;
    }

    const content = fs.readFileSync(filePath, 'utf-8');
    sources.set(documentId, {
      documentId,
      filePath,
      content,
      document: parseMarkdown(content)
    });
  }

  return { sources, missing };
}

/**
 * Look up a loaded source, throwing MissingInputError if it was not found.
 */
export function requireSource(data: LoadResult, documentId: SourceId): SourceDocument {
  const source = data.sources.get(documentId);
  if (!source) {
    const known = data.missing.find(err => path.basename(err.filePath) === documentId);
    throw known ?? new MissingInputError(documentId);
  }
  return source;
}
