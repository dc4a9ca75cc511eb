#!/usr/bin/env node
/**
 * cli.ts - Generate the end-of-year meeting documents.
 *
 * Reads script.md and skills.md from the content directory and writes
 * script_mentee.pdf, script_mentor.pdf and skill_assessment.pdf to the
 * output directory.
 *
 * Usage: yearend-review [--content=<dir>] [--out=<dir>] [--keep-tex]
 */

import { loadConfig, type ReviewConfig } from './config.js';
import { generateAll, type GenerateReport } from './generate.js';

const RULE = '='.repeat(60);

function getFlag(args: string[], name: string): string | undefined {
  const arg = args.find(a => a.startsWith(`--${name}=`));
  return arg ? arg.slice(name.length + 3) : undefined;
}

/**
 * Apply command line overrides on top of the loaded config
 */
function applyArgs(config: ReviewConfig, args: string[]): ReviewConfig {
  return {
    ...config,
    contentDir: getFlag(args, 'content') ?? config.contentDir,
    outputDir: getFlag(args, 'out') ?? config.outputDir,
    keepTex: args.includes('--keep-tex') || config.keepTex
  };
}

function printSummary(report: GenerateReport): void {
  console.log('\n' + RULE);
  if (report.ok) {
    console.log('✓ All documents generated successfully!');
  } else {
    const failed = report.results.filter(r => !r.ok).length;
    console.log(`✗ ${failed} of ${report.results.length} documents failed`);
  }
  console.log(RULE);

  console.log('\nOutput files:');
  for (const result of report.results) {
    if (result.pdfPath) {
      console.log(`  - ${result.pdfPath}`);
    }
  }
  console.log();
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const config = applyArgs(await loadConfig(), args);

  console.log(RULE);
  console.log('Generating end-of-year meeting documents...');
  console.log(RULE);

  const report = await generateAll(config, {
    onProgress: (index, total, artifact) => {
      console.log(`\n[${index}/${total}] Generating ${artifact.name}.pdf...`);
    },
    onResult: result => {
      if (result.ok) {
        console.log(`  ✓ Generated: ${result.pdfPath}`);
        return;
      }
      console.error(`  ERROR: ${result.error}`);
      if (result.texPath) {
        console.error(`  LaTeX source saved at: ${result.texPath}`);
      }
    }
  });

  printSummary(report);
  return report.ok ? 0 : 1;
}

main().then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('Fatal:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  }
);
