/**
 * LaTeX building blocks shared by the script and assessment projectors.
 */

const LATEX_ESCAPES: Record<string, string> = {
  '&': '\\&',
  '%': '\\%',
  '$': '\\$',
  '#': '\\#',
  '_': '\\_',
  '{': '\\{',
  '}': '\\}',
  '~': '\\textasciitilde{}',
  '^': '\\textasciicircum{}',
  '\\': '\\textbackslash{}',
};

const LATEX_SPECIAL_PATTERN = /[&%$#_{}~^\\]/g;

/**
 * Escape characters LaTeX reserves so the text typesets literally.
 *
 * Each input character is substituted once; the backslashes the
 * substitutions introduce are never scanned again.
 */
export function escapeLatex(text: string): string {
  return text.replace(LATEX_SPECIAL_PATTERN, ch => LATEX_ESCAPES[ch] ?? ch);
}

/**
 * Issues sequential identifiers. One per render call, never shared.
 */
export class FieldCounter {
  private next = 1;

  constructor(private readonly prefix: string) {}

  /** Returns prefix + n and advances n */
  take(): string {
    const name = `${this.prefix}${this.next}`;
    this.next++;
    return name;
  }
}

/**
 * Accumulates the lines of one LaTeX document.
 */
export class LatexWriter {
  private readonly lines: string[] = [];

  line(...lines: string[]): this {
    this.lines.push(...lines);
    return this;
  }

  blank(): this {
    this.lines.push('');
    return this;
  }

  /** A vertical gap as its own paragraph */
  vspace(size: string): this {
    return this.line(`\\vspace{${size}}`).blank();
  }

  /** A line of text followed by a paragraph break */
  paragraph(text: string): this {
    return this.line(text).blank();
  }

  /** Ask for `size` of room before the next block so it is not split across pages */
  needspace(size: string): this {
    return this.line(`\\needspace{${size}}`);
  }

  /** Large bold centered title */
  title(text: string): this {
    return this.line(
      '\\begin{center}',
      `{\\Large\\bfseries ${text}}`,
      '\\end{center}'
    ).blank();
  }

  toString(): string {
    return this.lines.join('\n');
  }
}

/**
 * Standard document preamble: class, geometry and the given packages,
 * followed by any extra preamble lines.
 */
export function documentPreamble(packages: string[], extra: string[] = []): string[] {
  return [
    '\\documentclass[9pt,a4paper]{article}',
    '\\usepackage[margin=1in]{geometry}',
    ...packages.map(pkg => `\\usepackage{${pkg}}`),
    ...extra,
  ];
}
