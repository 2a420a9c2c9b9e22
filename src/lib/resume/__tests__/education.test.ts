import { describe, it, expect } from 'vitest';
import { parseDegree, parseEducation, parseEducationBlock } from '../parsers/education';
import type { ResumeLine } from '../../../types/resume';

function lines(texts: string[]): ResumeLine[] {
  return texts.map((text, i) => ({ text, left: 40, right: 400, top: i * 12, bottom: i * 12 + 10, page: 0 }));
}

describe('parseDegree', () => {
  it('splits at a comma after a degree keyword', () => {
    expect(parseDegree('Master of Science, Computer Science (2014 - 2016)')).toEqual({
      studyType: 'Master of Science',
      area: 'Computer Science',
    });
  });

  it('splits at " in "', () => {
    expect(parseDegree('Bachelor of Science in Physics · (2010 - 2014)')).toEqual({
      studyType: 'Bachelor of Science',
      area: 'Physics',
    });
  });

  it('keeps an undivided degree as the study type', () => {
    expect(parseDegree('Diploma')).toEqual({ studyType: 'Diploma', area: '' });
    expect(parseDegree('')).toEqual({ studyType: '', area: '' });
  });
});

describe('parseEducation', () => {
  it('parses institutions, degrees and years', () => {
    const education = parseEducation(
      lines([
        'Stanford University',
        'Master of Science, Computer Science (2014 -',
        '2016)',
        'MIT',
        'Bachelor of Science in Physics · (2010 - 2014)',
      ])
    );
    expect(education).toEqual([
      {
        institution: 'Stanford University',
        studyType: 'Master of Science',
        area: 'Computer Science',
        startDate: '2014',
        endDate: '2016',
      },
      {
        institution: 'MIT',
        studyType: 'Bachelor of Science',
        area: 'Physics',
        startDate: '2010',
        endDate: '2014',
      },
    ]);
  });

  it('keeps a dated line that is not a degree', () => {
    expect(parseEducation(lines(['General Assembly', 'Certificate in Marketing 2019']))).toEqual([
      { institution: 'General Assembly', studyType: '', area: '', startDate: '', endDate: '' },
      { institution: 'Certificate in Marketing 2019', studyType: '', area: '', startDate: '2019', endDate: '' },
    ]);
  });

  it('gives a stray year to the entry above it', () => {
    expect(parseEducation(lines(['Coding Bootcamp', '2015']))).toEqual([
      { institution: 'Coding Bootcamp', studyType: '', area: '', startDate: '2015', endDate: '' },
    ]);
  });
});

describe('parseEducationBlock', () => {
  it('leaves the study type empty when the second line is only a date', () => {
    expect(parseEducationBlock(lines(['Night School', '2012 - 2013']))).toEqual({
      institution: 'Night School',
      studyType: '',
      area: '',
      startDate: '2012',
      endDate: '2013',
    });
  });
});
