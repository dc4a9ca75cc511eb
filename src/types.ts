/**
 * A group of bullet items under a role heading (### Mentee, ### Both*, ...).
 */
export interface Subsection {
  /** Role token as written, e.g. "Mentee", "Mentor", "Both" or "Both*" */
  header: string;

  /** Bullet texts in source order */
  items: string[];
}

/**
 * A ## heading and everything up to the next one.
 */
export interface Section {
  /** The section heading text */
  header: string;

  /** Role-grouped items (script content) */
  subsections: Subsection[];

  /** Bullets placed directly under the heading (assessment content) */
  items: string[];
}

/**
 * Result of parsing a review content file.
 */
export interface ReviewDocument {
  /** Text of the # heading, or '' when there is none */
  title: string;

  /** Sections in source order */
  sections: Section[];
}

/**
 * The two participants a script can be rendered for.
 */
export type Role = 'Mentee' | 'Mentor';

export const ROLES: readonly Role[] = ['Mentee', 'Mentor'];

/** Subsection header shared by both participants */
export const SHARED_TOKEN = 'Both';

/** Trailing marker for instruction/action items and blocks */
export const ACTION_SUFFIX = '*';

/**
 * How a subsection renders for a given role.
 */
export type SubsectionKind =
  | { kind: 'action' }
  | { kind: 'shared'; other: Role }
  | { kind: 'own' }
  | { kind: 'other'; other: Role }
  | { kind: 'unrecognized'; token: string };
