import { describe, it, expect } from 'vitest';
import { cleanBlockTexts, stripBullet, tagLine, tagLines } from '../lineTraits';

describe('tagLine', () => {
  it('classifies structural lines', () => {
    expect(tagLine('Page 2 of 3').kind).toBe('footer');
    expect(tagLine('Contact').kind).toBe('noise');
    expect(tagLine('Контакты').kind).toBe('noise');
    expect(tagLine('Achievements:').kind).toBe('label');
  });

  it('prefers a date range over a bullet', () => {
    const traits = tagLine('• Led migration 2019 - 2020');
    expect(traits.kind).toBe('dateRange');
    expect(traits.bullet).toBe(true);
  });

  it('recognizes durations in several languages', () => {
    expect(tagLine('2 yrs 3 mos').kind).toBe('duration');
    expect(tagLine('3 года').kind).toBe('duration');
    expect(tagLine('1 an 4 mois').kind).toBe('duration');
    expect(tagLine('Since 2019, 3 years').duration).toBe(false);
  });

  it('flags employment types without changing the kind', () => {
    const traits = tagLine('Full-time');
    expect(traits.employment).toBe(true);
    expect(traits.kind).toBe('plain');
  });
});

describe('tagLines', () => {
  it('drops blank lines', () => {
    expect(tagLines(['Acme', '   ', '- Shipped']).map((t) => t.kind)).toEqual(['plain', 'bullet']);
  });
});

describe('stripBullet', () => {
  it('removes leading bullet glyphs', () => {
    expect(stripBullet('• Built things')).toBe('Built things');
    expect(stripBullet('– Led team')).toBe('Led team');
  });
});

describe('cleanBlockTexts', () => {
  it('removes noise and optional durations and employment types', () => {
    const texts = ['Acme', 'Page 1 of 2', '2 yrs', 'Full-time', 'Achievements', 'Engineer'];
    expect(cleanBlockTexts(texts)).toEqual(['Acme', '2 yrs', 'Full-time', 'Engineer']);
    expect(cleanBlockTexts(texts, { dropDuration: true, dropEmployment: true })).toEqual(['Acme', 'Engineer']);
  });
});
