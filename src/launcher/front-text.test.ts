import { describe, it, expect } from 'vitest';
import type { CurrentCardInfo } from '../types.js';
import {
  deriveWordList,
  extractFrontText,
  stripHtml,
  tokensFromText,
} from './front-text.js';

function card(question: string, fields: Record<string, string> = {}): CurrentCardInfo {
  return {
    cardId: 1,
    deckName: 'Svenska',
    modelName: 'Basic',
    question,
    fields,
  };
}

describe('stripHtml', () => {
  it('drops markup, styles and sound tags', () => {
    expect(
      stripHtml(
        '<style>.card { color: red; }</style><div>en&nbsp;hund</div>[sound:x.mp3] &amp; <b>katt</b>',
      ),
    ).toBe('en hund & katt');
  });

  it('unescapes angle brackets', () => {
    expect(stripHtml('a &lt;b&gt; c')).toBe('a <b> c');
  });
});

describe('tokensFromText', () => {
  it('keeps words of two or more characters once, ignoring case', () => {
    expect(tokensFromText('Hund, i hund och HUND! älg')).toEqual([
      'Hund',
      'och',
      'älg',
    ]);
  });
});

describe('deriveWordList', () => {
  it('keeps the three longest words in their original order', () => {
    expect(deriveWordList('en stor hund och en liten katt')).toBe(
      'stor,hund,liten',
    );
  });

  it('uses every word when there are three or fewer', () => {
    expect(deriveWordList('att springa')).toBe('att,springa');
  });

  it('falls back to the text itself without usable words', () => {
    expect(deriveWordList('?! -')).toBe('?! -');
  });

  it('limits the fallback to 100 characters', () => {
    expect(deriveWordList('!'.repeat(150))).toBe('!'.repeat(100));
  });
});

describe('extractFrontText', () => {
  it('uses the rendered question', () => {
    expect(extractFrontText(card('<div>en hund</div>'))).toBe('en hund');
  });

  it('falls back to the first field when the question has no text', () => {
    expect(
      extractFrontText(
        card('<img src="a.png">', { Front: '<b>ett hus</b>', Back: 'house' }),
      ),
    ).toBe('ett hus');
  });

  it('truncates long fronts to 800 characters', () => {
    expect(extractFrontText(card('a'.repeat(900)))).toHaveLength(800);
  });
});
