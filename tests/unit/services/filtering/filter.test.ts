import { describe, it, expect } from 'vitest';
import {
  BUILTIN_PATTERNS,
  compilePattern,
  filterUnits,
  selectUnits,
  toUnits,
} from '../../../../src/services/filtering/filter.js';
import { segment } from '../../../../src/services/segmentation/segmenter.js';
import { FilterConfigError } from '../../../../src/services/extraction/errors.js';

describe('compilePattern', () => {
  it('compiles case-insensitive with dot matching newlines', () => {
    expect(compilePattern('budget').flags).toBe('is');
  });

  it('rebuilds a RegExp without its global flag', () => {
    const regex = compilePattern(/grant/g);
    expect(regex.flags).toBe('is');
    expect(regex.test('Grant')).toBe(true);
    expect(regex.test('Grant')).toBe(true);
  });

  it('keeps the unicode flag of a RegExp', () => {
    const regex = compilePattern(/^\p{Lu}{3} \d/uy);
    expect(regex.flags).toBe('isu');
    expect(regex.test('eur 500')).toBe(true);
    expect(regex.test('Éur 500')).toBe(true);
    expect(regex.test('12 500')).toBe(false);
  });

  it('throws FilterConfigError on invalid syntax', () => {
    expect(() => compilePattern('(unclosed')).toThrow(FilterConfigError);
  });

  it('throws FilterConfigError on an empty pattern', () => {
    expect(() => compilePattern('  ')).toThrow(FilterConfigError);
  });
});

describe('built-in money pattern', () => {
  const matches = (text: string): boolean => compilePattern(BUILTIN_PATTERNS.money).test(text);

  it('needs a digit and a euro token', () => {
    expect(matches('The budget is EUR 500,000.')).toBe(true);
    expect(matches('Up to 2 million euros per project.')).toBe(true);
    expect(matches('Total: 1 000 000 €')).toBe(true);
  });

  it('rejects units without a digit or without a currency', () => {
    expect(matches('The budget is expressed in euro.')).toBe(false);
    expect(matches('Projects last 24 months.')).toBe(false);
  });

  it('does not take European for a currency', () => {
    expect(matches('European Union programme 2021')).toBe(false);
  });
});

describe('built-in entity pattern', () => {
  it('matches the composition table across lines', () => {
    const table =
      'Consortium composition\nMinimum number of entities: 3\nCoordinators and beneficiaries';
    expect(compilePattern(BUILTIN_PATTERNS.entity).test(table)).toBe(true);
  });

  it('needs every keyword', () => {
    expect(
      compilePattern(BUILTIN_PATTERNS.entity).test('Consortium composition: 3 entities')
    ).toBe(false);
  });
});

describe('filterUnits', () => {
  it('keeps matching units in order, duplicates included', () => {
    const units = [{ text: 'grant A' }, { text: 'other' }, { text: 'grant A' }, { text: 'GRANT B' }];
    expect(filterUnits(units, 'grant').map((u) => u.text)).toEqual([
      'grant A',
      'grant A',
      'GRANT B',
    ]);
  });
});

describe('selectUnits', () => {
  const doc = segment(
    'Intro without amounts.\n\nThe budget is EUR 500,000. Projects last 24 months.\n\nCo-financing of EUR 50,000 is required.',
    { documentId: 'doc-1' }
  );

  it('selects paragraphs at paragraph depth', () => {
    expect(selectUnits(doc, BUILTIN_PATTERNS.money, 'paragraphs')).toEqual([
      { text: 'The budget is EUR 500,000. Projects last 24 months.', paragraphIndex: 1 },
      { text: 'Co-financing of EUR 50,000 is required.', paragraphIndex: 2 },
    ]);
  });

  it('selects sentences at sentence depth', () => {
    expect(selectUnits(doc, BUILTIN_PATTERNS.money, 'sentences')).toEqual([
      { text: 'The budget is EUR 500,000.', paragraphIndex: 1, sentenceIndex: 0 },
      { text: 'Co-financing of EUR 50,000 is required.', paragraphIndex: 2, sentenceIndex: 0 },
    ]);
  });

  it('returns nothing when no unit matches', () => {
    expect(selectUnits(doc, 'consortium', 'paragraphs')).toEqual([]);
  });

  it('rejects a bad pattern', () => {
    expect(() => selectUnits(doc, '[', 'sentences')).toThrow(FilterConfigError);
  });
});

describe('toUnits', () => {
  it('lists every sentence at sentence depth', () => {
    const doc = segment('One. Two.\n\nThree.');
    expect(toUnits(doc, 'sentences').map((u) => u.text)).toEqual(['One.', 'Two.', 'Three.']);
  });
});
