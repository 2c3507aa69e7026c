import { describe, it, expect } from 'vitest';
import { stripAnsi } from '../fixing/util.js';
import { diffLines, formatFieldDiff, splitFieldLines } from './field-diff.js';

describe('splitFieldLines', () => {
  it('splits on every form of <br> and on newlines', () => {
    expect(splitFieldLines('a<br>b<br/>c<BR />d\ne')).toEqual([
      'a',
      'b',
      'c',
      'd',
      'e',
    ]);
  });
});

describe('diffLines', () => {
  it('marks kept, removed and added lines', () => {
    expect(diffLines(['1. dog', '2. hound'], ['1. dog', 'syn: vovve'])).toEqual(
      [
        { kind: 'same', text: '1. dog' },
        { kind: 'removed', text: '2. hound' },
        { kind: 'added', text: 'syn: vovve' },
      ],
    );
  });

  it('keeps the lines around a removed one', () => {
    expect(diffLines(['a', 'b', 'c'], ['a', 'c'])).toEqual([
      { kind: 'same', text: 'a' },
      { kind: 'removed', text: 'b' },
      { kind: 'same', text: 'c' },
    ]);
  });

  it('handles an empty old value', () => {
    expect(diffLines([], ['new'])).toEqual([{ kind: 'added', text: 'new' }]);
  });
});

describe('formatFieldDiff', () => {
  it('prefixes lines by kind', () => {
    const lines = formatFieldDiff('hund<br>dog', 'en hund<br>dog');
    expect(lines.map(stripAnsi)).toEqual(['- hund', '+ en hund', '  dog']);
  });
});
