import { describe, it, expect } from 'vitest';
import { sanitize, toCardHtml } from './sanitize-html.js';

describe('sanitize', () => {
  it('keeps the tags used on vocabulary cards', () => {
    const input = '<b>en</b> <i>hund</i> <small>(2)</small>';
    expect(sanitize(input)).toBe(input);
  });

  it('keeps inline styles on spans untouched', () => {
    const input = '<span style="color: #C2C2C2">Hunden skäller.</span>';
    expect(sanitize(input)).toBe(input);
  });

  it('writes line breaks the way Anki stores them', () => {
    expect(sanitize('one<br/>two<br />three')).toBe('one<br>two<br>three');
  });

  it('strips script tags and their content', () => {
    expect(sanitize('<script>alert("x")</script>Safe text')).toBe('Safe text');
  });

  it('strips event handlers', () => {
    expect(sanitize('<span onclick="steal()">text</span>')).toBe(
      '<span>text</span>',
    );
  });

  it('drops tags outside the allowlist but keeps their text', () => {
    expect(sanitize('<p>1. <a href="x">link</a></p>')).toBe('1. link');
  });
});

describe('toCardHtml', () => {
  it('converts newlines to <br>', () => {
    expect(toCardHtml('1. dog\nsyn: vovve')).toBe('1. dog<br>syn: vovve');
  });
});
