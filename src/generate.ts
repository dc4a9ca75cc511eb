import * as path from 'node:path';
import fs from 'fs-extra';
import type { ReviewDocument } from './types.js';
import type { ReviewConfig } from './config.js';
import {
  loadSources,
  requireSource,
  SCRIPT_SOURCE,
  SKILLS_SOURCE,
  type LoadResult,
  type SourceDocument,
  type SourceId
} from './loader.js';
import { renderAssessment, renderScript } from './renderer.js';
import { compileLatex } from './compiler.js';
import { MissingInputError } from './errors.js';

/**
 * One output document: where its content comes from and how it is rendered
 */
export interface Artifact {
  /** Base name of the .tex and .pdf files */
  name: string;
  source: SourceId;
  render: (doc: ReviewDocument) => string;
}

export interface ArtifactResult {
  name: string;
  ok: boolean;
  /** Set when the PDF was produced */
  pdfPath?: string;
  /** Set when the .tex file was kept, always the case after a failed compile */
  texPath?: string;
  error?: string;
}

export interface GenerateReport {
  ok: boolean;
  results: ArtifactResult[];
}

export interface GenerateOptions {
  /** Called before each artifact starts (index is 1-based) */
  onProgress?: (index: number, total: number, artifact: Artifact) => void;
  /** Called as each artifact finishes */
  onResult?: (result: ArtifactResult) => void;
}

// script.md is parsed once and rendered for each participant
export const ARTIFACTS: readonly Artifact[] = [
  { name: 'script_mentee', source: SCRIPT_SOURCE, render: doc => renderScript(doc, 'Mentee') },
  { name: 'script_mentor', source: SCRIPT_SOURCE, render: doc => renderScript(doc, 'Mentor') },
  { name: 'skill_assessment', source: SKILLS_SOURCE, render: renderAssessment },
];

/**
 * Render and compile one artifact. Failures are reported in the result;
 * files written by other artifacts are never touched.
 */
export async function generateArtifact(
  artifact: Artifact,
  data: LoadResult,
  config: ReviewConfig
): Promise<ArtifactResult> {
  const { name } = artifact;
  let source: SourceDocument;
  try {
    source = requireSource(data, artifact.source);
  } catch (err) {
    if (err instanceof MissingInputError) {
      return { name, ok: false, error: err.message };
    }
    throw err;
  }

  const texPath = path.resolve(config.outputDir, `${name}.tex`);
  const pdfPath = path.resolve(config.outputDir, `${name}.pdf`);

  let latex: string;
  try {
    latex = artifact.render(source.document);
  } catch (err) {
    return { name, ok: false, error: `Failed to render ${name}: ${err instanceof Error ? err.message : err}` };
  }

  try {
    await fs.outputFile(texPath, latex, 'utf-8');
  } catch (err) {
    return { name, ok: false, error: `Failed to write ${texPath}: ${err instanceof Error ? err.message : err}` };
  }
  console.log(`[Generate] Wrote LaTeX: ${texPath}`);

  const result = await compileLatex(texPath, pdfPath, {
    command: config.latexCommand,
    args: config.latexArgs,
    passes: config.compilePasses,
    timeoutMs: config.compileTimeoutMs
  });

  if (!result.ok) {
    return { name, ok: false, texPath, error: result.message };
  }

  if (config.keepTex) {
    return { name, ok: true, pdfPath, texPath };
  }
  try {
    await fs.remove(texPath);
  } catch (err) {
    // The PDF is in place; only the cleanup failed
    console.warn(`[Generate] Could not remove ${texPath}: ${err instanceof Error ? err.message : err}`);
    return { name, ok: true, pdfPath, texPath };
  }
  return { name, ok: true, pdfPath };
}

/**
 * Generate every artifact in order. A failing artifact does not stop the
 * ones after it.
 */
export async function generateAll(config: ReviewConfig, options: GenerateOptions = {}): Promise<GenerateReport> {
  await fs.ensureDir(config.outputDir);
  const data = loadSources(config.contentDir);

  const results: ArtifactResult[] = [];
  for (let i = 0; i < ARTIFACTS.length; i++) {
    const artifact = ARTIFACTS[i];
    options.onProgress?.(i + 1, ARTIFACTS.length, artifact);
    const result = await generateArtifact(artifact, data, config);
    options.onResult?.(result);
    results.push(result);
  }

  return { ok: results.every(r => r.ok), results };
}
