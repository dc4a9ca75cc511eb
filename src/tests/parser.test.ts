import * as test from 'node:test';
import * as assert from 'node:assert';
import { parseMarkdown } from '../parser.js';

const { describe, it } = test;

describe('parseMarkdown', () => {

  it('should parse title, sections, role subsections and bullets', () => {
    const result = parseMarkdown('# Title\n## Sec\n### Mentee\n- Q1\n### Both\n- Q2*\n- Q3\n');

    assert.deepStrictEqual(result, {
      title: 'Title',
      sections: [
        {
          header: 'Sec',
          items: [],
          subsections: [
            { header: 'Mentee', items: ['Q1'] },
            { header: 'Both', items: ['Q2*', 'Q3'] }
          ]
        }
      ]
    });
  });

  it('should preserve source order of sections and items', () => {
    const content = `## S1
### Mentee
- a
- b
## S2
### Mentor*
- c
`;
    const result = parseMarkdown(content);

    assert.deepStrictEqual(result.sections.map(s => s.header), ['S1', 'S2']);
    assert.deepStrictEqual(result.sections[0].subsections[0].items, ['a', 'b']);
    assert.strictEqual(result.sections[1].subsections[0].header, 'Mentor*');
    assert.deepStrictEqual(result.sections[1].subsections[0].items, ['c']);
  });

  it('should put bullets with no role heading on the section', () => {
    const result = parseMarkdown('# T\n## Skills\n- Communication\n- Writing\n');

    assert.deepStrictEqual(result.sections[0].items, ['Communication', 'Writing']);
    assert.deepStrictEqual(result.sections[0].subsections, []);
  });

  it('should yield an empty document for empty input', () => {
    assert.deepStrictEqual(parseMarkdown(''), { title: '', sections: [] });
    assert.deepStrictEqual(parseMarkdown('just some prose\n\nmore prose'), { title: '', sections: [] });
  });

  it('should keep the last title when there are several', () => {
    const result = parseMarkdown('# First\n# Second\n');
    assert.strictEqual(result.title, 'Second');
  });

  it('should ignore role headings and bullets outside any section', () => {
    const content = `### Mentee
- orphan
## Section
- kept
`;
    const result = parseMarkdown(content);

    assert.strictEqual(result.sections.length, 1);
    assert.deepStrictEqual(result.sections[0].items, ['kept']);
    assert.deepStrictEqual(result.sections[0].subsections, []);
  });

  it('should strip trailing whitespace and handle CRLF line endings', () => {
    const result = parseMarkdown('## Sec  \r\n### Both \r\n-   item one   \r\n');

    assert.strictEqual(result.sections[0].header, 'Sec');
    assert.strictEqual(result.sections[0].subsections[0].header, 'Both');
    assert.deepStrictEqual(result.sections[0].subsections[0].items, ['item one']);
  });

  it('should only match prefixes at the start of the line', () => {
    const content = `## Sec
#NoSpace
#### Too deep
  - indented
* star bullet
-no space
- real
`;
    const result = parseMarkdown(content);

    assert.strictEqual(result.title, '');
    assert.deepStrictEqual(result.sections[0].subsections, []);
    assert.deepStrictEqual(result.sections[0].items, ['real']);
  });

  it('should close the open subsection when a new section starts', () => {
    const content = `## A
### Mentee
- one
## B
- two
`;
    const result = parseMarkdown(content);

    assert.deepStrictEqual(result.sections[0].subsections, [{ header: 'Mentee', items: ['one'] }]);
    assert.deepStrictEqual(result.sections[0].items, []);
    assert.deepStrictEqual(result.sections[1].items, ['two']);
  });

  it('should keep unknown role tokens as written', () => {
    const result = parseMarkdown('## S\n### Advisor\n- q\n');
    assert.deepStrictEqual(result.sections[0].subsections, [{ header: 'Advisor', items: ['q'] }]);
  });
});
