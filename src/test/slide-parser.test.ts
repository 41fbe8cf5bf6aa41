import { describe, expect, it } from 'vitest';

import {
  classifyLine,
  extractBulletLabel,
  extractHeading,
  parseSlide,
  parseSlideBody,
} from '../tools/docx/parsers/index.js';

describe('classifyLine', () => {
  it('treats fences as fences inside and outside code blocks', () => {
    expect(classifyLine('```', false, false)).toBe('code-fence');
    expect(classifyLine('```typescript', false, false)).toBe('code-fence');
    expect(classifyLine('   ```', true, false)).toBe('code-fence');
  });

  it('does not classify lines inside a code block any further', () => {
    expect(classifyLine('- **Label**', true, true)).toBe('code-line');
    expect(classifyLine('', true, false)).toBe('code-line');
  });

  it('recognises bullets and sub-bullets', () => {
    expect(classifyLine('- **Label** text', false, false)).toBe('bullet');
    expect(classifyLine('  - detail', false, true)).toBe('sub-bullet');
  });

  it('prefers the bullet rule for an indented bold bullet', () => {
    expect(classifyLine('  - **Nested**', false, true)).toBe('bullet');
  });

  it('ignores sub-bullets without a bullet and deeper indentation', () => {
    expect(classifyLine('  - detail', false, false)).toBe('other');
    expect(classifyLine('    - deeper', false, true)).toBe('other');
    expect(classifyLine('- plain item', false, true)).toBe('other');
    expect(classifyLine('', false, true)).toBe('other');
  });
});

describe('extractBulletLabel / extractHeading', () => {
  it('takes the text up to the closing bold marker', () => {
    expect(extractBulletLabel('- **Foo** more text')).toBe('Foo');
    expect(extractBulletLabel('- **Unclosed label')).toBe('Unclosed label');
    expect(extractBulletLabel('- ****')).toBe('');
  });

  it('strips one leading "# " only', () => {
    expect(extractHeading('# Example')).toBe('Example');
    expect(extractHeading('Plain title')).toBe('Plain title');
    expect(extractHeading('# C# tips')).toBe('C# tips');
  });
});

describe('parseSlide', () => {
  it('parses heading, bullets and sub-bullets', () => {
    const slide = parseSlide('# Example\n\n- **Foo** more text\n  - Detail\n');

    expect(slide.heading).toBe('Example');
    expect(slide.blocks).toEqual([
      { type: 'bullet', label: 'Foo' },
      { type: 'sub-bullet', text: 'Detail' },
    ]);
    expect(slide.warnings).toEqual([]);
  });

  it('drops a sub-bullet that has no preceding bullet and reports it', () => {
    const slide = parseSlide('# T\n\n  - Detail\n- **A**');

    expect(slide.blocks).toEqual([{ type: 'bullet', label: 'A' }]);
    expect(slide.warnings).toEqual([
      {
        code: 'orphan-sub-bullet',
        line: 3,
        message: 'Sub-bullet on line 3 has no preceding bullet and was dropped',
      },
    ]);
  });

  it('joins fenced code into one block and excludes the fences', () => {
    const slide = parseSlide('# T\n\n```\ncode here\nmore code\n```');

    expect(slide.blocks).toEqual([{ type: 'code', lines: ['code here', 'more code'] }]);
  });

  it('ignores the language tag and keeps code indentation', () => {
    const slide = parseSlide('# T\n\n```php\n  $x = 1;\n- **not a bullet**\n```\n');

    expect(slide.blocks).toEqual([{ type: 'code', lines: ['  $x = 1;', '- **not a bullet**'] }]);
  });

  it('discards an unclosed code block', () => {
    const slide = parseSlide('# T\n\n- **A**\n```\nlost\n');

    expect(slide.blocks).toEqual([{ type: 'bullet', label: 'A' }]);
    expect(slide.warnings).toEqual([
      {
        code: 'unclosed-code-block',
        line: 4,
        message: 'Code block opened on line 4 is never closed; 1 line(s) dropped',
      },
    ]);
  });

  it('emits nothing for an empty code block but keeps a blank-line block', () => {
    expect(parseSlide('# T\n\n```\n```').blocks).toEqual([]);
    expect(parseSlide('# T\n\n```\n\n```').blocks).toEqual([{ type: 'code', lines: [''] }]);
  });

  it('always skips the second line', () => {
    const slide = parseSlide('# T\n- **Skipped**\n- **Kept**');

    expect(slide.blocks).toEqual([{ type: 'bullet', label: 'Kept' }]);
  });

  it('uses the first non-blank line as heading', () => {
    const slide = parseSlide('\n\n# Title\n\n- **A**\n  - B');

    expect(slide.heading).toBe('Title');
    expect(slide.blocks).toEqual([
      { type: 'bullet', label: 'A' },
      { type: 'sub-bullet', text: 'B' },
    ]);
  });

  it('normalises CRLF line endings', () => {
    const slide = parseSlide('# T\r\n\r\n- **A** x\r\n  - B\r\n```\r\nline\r\n```\r\n');

    expect(slide.heading).toBe('T');
    expect(slide.blocks).toEqual([
      { type: 'bullet', label: 'A' },
      { type: 'sub-bullet', text: 'B' },
      { type: 'code', lines: ['line'] },
    ]);
  });

  it('accepts a sub-bullet without a space after the dash', () => {
    const slide = parseSlide('# T\n\n- **A**\n  -Tight');

    expect(slide.blocks).toEqual([
      { type: 'bullet', label: 'A' },
      { type: 'sub-bullet', text: 'Tight' },
    ]);
  });

  it('ignores unsupported markdown', () => {
    const slide = parseSlide('# T\n\n## Sub heading\n1. ordered\n| a | b |\n> quote\nplain text');

    expect(slide.blocks).toEqual([]);
    expect(slide.warnings).toEqual([]);
  });

  it('yields an empty heading for an empty file', () => {
    expect(parseSlide('')).toEqual({ heading: '', blocks: [], warnings: [] });
  });

  it('does not carry bullet context from one slide to the next', () => {
    const first = parseSlide('# One\n\n- **A**');
    const second = parseSlide('# Two\n\n  - orphan');

    expect(first.blocks).toHaveLength(1);
    expect(second.blocks).toEqual([]);
    expect(second.warnings.map((w) => w.code)).toEqual(['orphan-sub-bullet']);
  });
});

describe('parseSlideBody', () => {
  it('numbers warnings from the given first line', () => {
    const body = parseSlideBody(['  - orphan'], 10);

    expect(body.warnings[0].line).toBe(10);
  });
});
