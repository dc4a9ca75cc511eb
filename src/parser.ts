import type { ReviewDocument, Section, Subsection } from './types.js';

/**
 * Line prefixes recognised by the review content schema.
 * Each must appear at column 0; anything else on a line is ignored.
 */

// "# Title"
const TITLE_PATTERN = /^# (.*)$/;

// "## Section header"
const SECTION_PATTERN = /^## (.*)$/;

// "### Mentee", "### Both*", ...
const SUBSECTION_PATTERN = /^### (.*)$/;

// "- Bullet text"
const BULLET_PATTERN = /^- (.*)$/;

/**
 * Parse review content markdown into a document model.
 *
 * Unrecognised lines are skipped, so this never fails on malformed input.
 */
export function parseMarkdown(content: string): ReviewDocument {
  // Normalize line endings (handle Windows \r\n)
  const lines = content.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');
  const document: ReviewDocument = { title: '', sections: [] };

  let currentSection: Section | null = null;
  let currentSubsection: Subsection | null = null;

  function closeSubsection() {
    if (currentSubsection && currentSection) {
      currentSection.subsections.push(currentSubsection);
    }
    currentSubsection = null;
  }

  function closeSection() {
    closeSubsection();
    if (currentSection) {
      document.sections.push(currentSection);
    }
    currentSection = null;
  }

  for (const rawLine of lines) {
    const line = rawLine.trimEnd();

    let match = line.match(TITLE_PATTERN);
    if (match) {
      document.title = match[1].trim();
      continue;
    }

    match = line.match(SECTION_PATTERN);
    if (match) {
      closeSection();
      currentSection = { header: match[1].trim(), subsections: [], items: [] };
      continue;
    }

    match = line.match(SUBSECTION_PATTERN);
    if (match) {
      // Role headings outside a section have nowhere to go
      if (currentSection) {
        closeSubsection();
        currentSubsection = { header: match[1].trim(), items: [] };
      }
      continue;
    }

    match = line.match(BULLET_PATTERN);
    if (match) {
      const text = match[1].trim();
      if (currentSubsection) {
        currentSubsection.items.push(text);
      } else if (currentSection) {
        currentSection.items.push(text);
      }
    }
  }

  closeSection();

  return document;
}
