import {
  ACTION_SUFFIX,
  SHARED_TOKEN,
  type ReviewDocument,
  type Role,
  type Section,
  type SubsectionKind,
} from './types.js';
import { UnrecognizedRoleError } from './errors.js';
import { documentPreamble, escapeLatex, FieldCounter, LatexWriter } from './latex.js';

/**
 * Options for rendering a script
 */
export interface ScriptOptions {
  /** Throw on a subsection heading that is not Mentee, Mentor or Both (default: skip it) */
  strict?: boolean;
}

const TEXT_FIELD_OPTIONS = 'multiline=true,width=\\textwidth,height=2.5cm,bordercolor={0 0 0},backgroundcolor={0.95 0.95 0.95}';

const ASSESSMENT_TITLE = 'Assessment of skills for next year planning';

const ABILITY_POSITIONS = 5;
const IMPORTANCE_POSITIONS = 3;

// text | ability | gap | importance | gap | target
// The text column gives up the padding of the five inner column boundaries
const ASSESSMENT_COLUMNS = [
  '@{}p{\\dimexpr\\textwidth-2.4cm-1.5cm-1cm-2em-10\\tabcolsep\\relax}',
  '                >{\\centering\\arraybackslash}p{2.4cm}',
  '                p{1em}',
  '                >{\\centering\\arraybackslash}p{1.5cm}',
  '                p{1em}',
  '                >{\\centering\\arraybackslash}p{1cm}@{}',
];

const ASSESSMENT_GUIDANCE = [
  '\\noindent For each skill, tick one box under \\textit{current ability} to show where you stand today, from poor on the left to great on the right, and one box under \\textit{importance} to show how much the skill matters for your work over the coming year.',
  '\\noindent Tick \\textit{target} for the few skills you most want to develop next year. Mentee and mentor each complete a copy before the meeting; comparing the two is the starting point for next year\'s plan.',
];

/**
 * The participant a script is not rendered for
 */
export function otherRole(role: Role): Role {
  return role === 'Mentee' ? 'Mentor' : 'Mentee';
}

function isActionItem(text: string): boolean {
  return text.endsWith(ACTION_SUFFIX);
}

/**
 * Remove trailing action markers and surrounding whitespace
 */
function stripActionSuffix(text: string): string {
  let end = text.length;
  while (end > 0 && text[end - 1] === ACTION_SUFFIX) {
    end--;
  }
  return text.slice(0, end).trim();
}

/**
 * Decide how a subsection heading renders for the given role.
 */
export function classifySubsection(header: string, role: Role): SubsectionKind {
  const token = stripActionSuffix(header);
  const other = otherRole(role);

  if (token !== SHARED_TOKEN && token !== 'Mentee' && token !== 'Mentor') {
    return { kind: 'unrecognized', token: header };
  }
  if (isActionItem(header)) {
    return { kind: 'action' };
  }
  if (token === SHARED_TOKEN) {
    return { kind: 'shared', other };
  }
  if (token === role) {
    return { kind: 'own' };
  }
  return { kind: 'other', other };
}

function writeActionText(out: LatexWriter, item: string): void {
  out.paragraph(`\\noindent\\textit{${escapeLatex(stripActionSuffix(item))}}`);
  out.vspace('0.3cm');
}

/**
 * A question and the text box it is answered in. The label is shown in
 * gray ahead of the question when the box belongs to the other participant.
 */
function writeQuestion(
  out: LatexWriter,
  fields: FieldCounter,
  text: string,
  gapAfter: string,
  label?: Role
): void {
  out.needspace('4cm');
  out.paragraph(label ? `\\noindent{\\color{gray}${label}: ${text}}` : `\\noindent ${text}`);
  out.line('\\vspace{0.3em}');
  out.paragraph(`\\noindent\\TextField[name=${fields.take()},${TEXT_FIELD_OPTIONS}]{}`);
  out.vspace(gapAfter);
}

function writeSubsection(
  out: LatexWriter,
  fields: FieldCounter,
  kind: SubsectionKind,
  items: string[]
): void {
  switch (kind.kind) {
    case 'action':
      for (const item of items) {
        writeActionText(out, item);
      }
      break;

    case 'shared':
      for (const item of items) {
        if (isActionItem(item)) {
          writeActionText(out, item);
          continue;
        }
        const text = escapeLatex(stripActionSuffix(item));
        writeQuestion(out, fields, text, '0.2cm');
        writeQuestion(out, fields, text, '0.4cm', kind.other);
      }
      break;

    case 'own':
      for (const item of items) {
        if (isActionItem(item)) {
          writeActionText(out, item);
          continue;
        }
        writeQuestion(out, fields, escapeLatex(stripActionSuffix(item)), '0.4cm');
      }
      break;

    case 'other':
      // Reference only: the other participant answers these
      for (const item of items) {
        out.paragraph(`\\noindent{\\color{gray}${kind.other}: ${escapeLatex(stripActionSuffix(item))}}`);
        out.vspace('0.15cm');
      }
      break;

    case 'unrecognized':
      break;
  }
}

/**
 * Render the meeting script for one participant. Questions addressed to
 * `role` get fillable text boxes; the other participant's questions are
 * shown in gray for reference.
 */
export function renderScript(doc: ReviewDocument, role: Role, options: ScriptOptions = {}): string {
  const other = otherRole(role);
  const fields = new FieldCounter('field');
  const out = new LatexWriter();

  out.line(...documentPreamble(['hyperref', 'xcolor', 'needspace']));
  out.blank();
  out.line(
    '% Configure form field appearance',
    '\\hypersetup{',
    '    pdfborder={0 0 0}',
    '}'
  );
  out.blank();
  out.paragraph('\\begin{document}');

  if (doc.title) {
    out.title(`${escapeLatex(doc.title)} (${role})`);
    out.vspace('0.5cm');
  }

  out.paragraph('\\noindent\\textbf{Instructions:}');
  out.vspace('0.2cm');
  out.paragraph(
    '\\noindent This script is designed to help you prepare for and guide your end-of-year meeting. ' +
    'Questions in black are meant for you to answer and have fillable text fields. ' +
    `Questions in gray (prefixed with \`\`${other}:'') are for the other person and are provided for your reference. ` +
    'Items in italics are instructions or actions to be completed.'
  );
  out.vspace('0.2cm');
  out.paragraph(
    '\\noindent\\textbf{Preparation:} Please complete this form \\textit{before} the meeting. ' +
    'Thoughtful preparation is essential---take time to reflect deeply on each question. ' +
    'Your honest, considered responses will make the meeting more productive and meaningful for both parties.'
  );
  out.vspace('0.5cm');

  for (const section of doc.sections) {
    out.needspace('6cm');
    out.paragraph(`\\noindent\\textbf{\\large ${escapeLatex(section.header)}}`);
    out.vspace('0.3cm');

    // Bullets with no role heading render as instructions
    for (const item of section.items) {
      writeActionText(out, item);
    }

    for (const subsection of section.subsections) {
      const kind = classifySubsection(subsection.header, role);
      if (kind.kind === 'unrecognized' && options.strict) {
        throw new UnrecognizedRoleError(section.header, kind.token);
      }
      writeSubsection(out, fields, kind, subsection.items);
    }

    out.vspace('0.3cm');
  }

  out.line('\\end{document}');

  return out.toString();
}

/**
 * Column spec for `count` cells spread evenly across a tabular*
 */
function spreadColumns(count: number): string {
  return `@{}${new Array<string>(count).fill('c').join('@{\\extracolsep{\\fill}}')}@{}`;
}

/**
 * The items an assessment row is drawn for: the section's own bullets,
 * or when it has none, the bullets of all its subsections in order.
 */
export function assessmentItems(section: Section): string[] {
  if (section.items.length > 0) {
    return section.items;
  }
  return section.subsections.flatMap(subsection => subsection.items);
}

function writeAssessmentRow(out: LatexWriter, skill: string, item: string): void {
  const ability: string[] = [];
  for (let n = 1; n <= ABILITY_POSITIONS; n++) {
    ability.push(`\\ratingbox{${skill}}{${n}}`);
  }
  const importance: string[] = [];
  for (let n = 1; n <= IMPORTANCE_POSITIONS; n++) {
    importance.push(`\\importancebox{${skill}}{${n}}`);
  }

  out.line(`\\noindent\\begin{tabular}{${ASSESSMENT_COLUMNS[0]}`);
  out.line(...ASSESSMENT_COLUMNS.slice(1, -1));
  out.line(`${ASSESSMENT_COLUMNS[ASSESSMENT_COLUMNS.length - 1]}}`);
  out.line(`\t\t${escapeLatex(item)} &`);
  out.line(
    `\\begin{tabular*}{2.4cm}{${spreadColumns(ABILITY_POSITIONS)}}`,
    ability.join(' & '),
    '\\end{tabular*} & &',
    `\\begin{tabular*}{1.5cm}{${spreadColumns(IMPORTANCE_POSITIONS)}}`,
    importance.join(' & '),
    `\\end{tabular*} & & \\targetbox{${skill}}`
  );
  out.line('\\end{tabular}\\\\[0.08cm]');
}

/**
 * Render the skills assessment form: one row per skill with ability,
 * importance and target markers, each named under the skill's own prefix.
 */
export function renderAssessment(doc: ReviewDocument): string {
  const skills = new FieldCounter('skill');
  const out = new LatexWriter();
  const checkBox = 'bordercolor={0 0 0},borderstyle=S,borderwidth=1';

  out.line(...documentPreamble(['array', 'hyperref'], ['\\pagestyle{empty}']));
  out.blank();
  out.line(
    '% Rating and target markers; every marker is its own clickable form field',
    '\\newcommand{\\ratingbox}[2]{%',
    `  \\raisebox{-0ex}{\\CheckBox[name=#1_#2,width=1.2ex,height=1.2ex,${checkBox}]{}}%`,
    '}',
    '\\newcommand{\\importancebox}[2]{%',
    `  \\raisebox{-0ex}{\\CheckBox[name=#1_importance#2,width=1.2ex,height=1.2ex,${checkBox}]{}}%`,
    '}',
    '\\newcommand{\\targetbox}[1]{%',
    `  \\raisebox{-0.3ex}{\\CheckBox[name=#1_target,width=2ex,height=2ex,${checkBox}]{}}%`,
    '}'
  );
  out.blank();
  out.paragraph('\\begin{document}');
  out.title(ASSESSMENT_TITLE);
  out.vspace('0.2cm');

  // Legend
  out.line('\\noindent');
  out.line(`\\begin{tabular}{${ASSESSMENT_COLUMNS[0]}`);
  out.line(...ASSESSMENT_COLUMNS.slice(1, -1));
  out.line(`${ASSESSMENT_COLUMNS[ASSESSMENT_COLUMNS.length - 1]}}`);
  out.line(
    '\t& {\\small current ability} & & {\\small importance} & & \\\\',
    '\t& \\begin{tabular*}{2.4cm}{@{}l@{\\extracolsep{\\fill}}r@{}}',
    '    \\small poor & \\small great',
    '  \\end{tabular*} & & \\begin{tabular*}{1.5cm}{@{}l@{\\extracolsep{\\fill}}r@{}}',
    '    \\small low & \\small high',
    '  \\end{tabular*} & & {\\small target} \\\\',
    '\\end{tabular}'
  );
  out.blank();
  out.vspace('0.3cm');

  for (const section of doc.sections) {
    out.line(`\\noindent\\textbf{${escapeLatex(section.header)}}\\\\[0.1cm]`);
    for (const item of assessmentItems(section)) {
      writeAssessmentRow(out, skills.take(), item);
    }
    out.blank();
  }

  out.vspace('0.5cm');
  out.paragraph('\\noindent\\textbf{How to use this assessment}');
  out.vspace('0.2cm');
  for (const paragraph of ASSESSMENT_GUIDANCE) {
    out.paragraph(paragraph);
  }

  out.line('\\end{document}');

  return out.toString();
}
