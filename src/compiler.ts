import { spawn } from 'node:child_process';
import * as path from 'node:path';
import fs from 'fs-extra';

/**
 * How to invoke the LaTeX engine
 */
export interface CompileOptions {
  /** Engine executable (default: pdflatex) */
  command?: string;
  /** Arguments placed before the standard ones */
  args?: string[];
  /** Number of runs; the second resolves layout from the first (default: 2) */
  passes?: number;
  /** Time allowed for each run (default: 30000) */
  timeoutMs?: number;
}

export type CompileResult =
  | { ok: true }
  | { ok: false; message: string };

interface PassResult {
  code: number | null;
  timedOut: boolean;
  output: string;
}

const AUX_EXTENSIONS = ['.aux', '.log', '.out'];

// Lines of engine output kept in a failure message
const OUTPUT_TAIL_LINES = 20;

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function tail(output: string): string {
  return output.trimEnd().split('\n').slice(-OUTPUT_TAIL_LINES).join('\n');
}

/**
 * Run the engine once. Rejects only when the process cannot be started.
 */
function runPass(command: string, args: string[], cwd: string, timeoutMs: number): Promise<PassResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { cwd, stdio: ['ignore', 'pipe', 'pipe'] });
    let output = '';
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, timeoutMs);

    child.stdout.on('data', (chunk: Buffer) => {
      output += chunk.toString();
    });
    child.stderr.on('data', (chunk: Buffer) => {
      output += chunk.toString();
    });

    child.on('error', err => {
      clearTimeout(timer);
      reject(err);
    });
    child.on('close', code => {
      clearTimeout(timer);
      resolve({ code, timedOut, output });
    });
  });
}

async function removeAuxFiles(texDir: string, baseName: string): Promise<void> {
  for (const ext of AUX_EXTENSIONS) {
    await fs.remove(path.join(texDir, baseName + ext));
  }
}

/**
 * Compile a .tex file to PDF and move the result to `pdfPath`.
 *
 * Success means the engine actually wrote the PDF; its exit status is not
 * trusted on its own. On failure nothing from this run is left at `pdfPath`.
 */
export async function compileLatex(
  texPath: string,
  pdfPath: string,
  options: CompileOptions = {}
): Promise<CompileResult> {
  const { command = 'pdflatex', args = [], passes = 2, timeoutMs = 30000 } = options;

  const texDir = path.dirname(path.resolve(texPath));
  const texFile = path.basename(texPath);
  const baseName = texFile.replace(/\.tex$/, '');
  const generatedPdf = path.join(texDir, `${baseName}.pdf`);
  const targetPdf = path.resolve(pdfPath);

  try {
    // A PDF left over from an earlier run must not pass for this run's output
    await fs.remove(generatedPdf);
    if (targetPdf !== generatedPdf) {
      await fs.remove(targetPdf);
    }

    let last: PassResult | null = null;
    for (let pass = 1; pass <= passes; pass++) {
      console.log(`[Compile] ${texFile}: ${command} pass ${pass} of ${passes}`);
      last = await runPass(command, [...args, '-interaction=nonstopmode', texFile], texDir, timeoutMs);
      if (last.timedOut) {
        await fs.remove(generatedPdf);
        return { ok: false, message: `${command} timed out after ${timeoutMs} ms (pass ${pass} of ${passes})` };
      }
    }

    if (!(await fs.pathExists(generatedPdf))) {
      let message = `${command} failed to generate PDF`;
      if (last && last.code !== 0) {
        message += ` (exit code ${last.code})\n${tail(last.output)}`;
      }
      return { ok: false, message };
    }

    if (targetPdf !== generatedPdf) {
      await fs.move(generatedPdf, targetPdf, { overwrite: true });
    }
    await removeAuxFiles(texDir, baseName);

    return { ok: true };
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT' && err.syscall?.startsWith('spawn')) {
      return { ok: false, message: `${command} not found. Please install TeX Live or similar LaTeX distribution.` };
    }
    return { ok: false, message: `Error during PDF compilation: ${err}` };
  }
}
