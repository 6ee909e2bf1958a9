import { describe, it, expect } from 'vitest';
import { filterEducation, gapKeywordsForSkills, tailorResume } from '../pipeline/tailoring.js';
import type { EducationEntry, KeywordGap } from '../pipeline/types.js';
import type { JsonValue } from '../lib/json-repair.js';
import {
  FakeCompletion,
  makeAnalysis,
  makeContext,
  makeExperience,
  makeJob,
  makeResume,
  type Responder,
} from './helpers.js';

const threeExperiences = [
  makeExperience({ company: 'Newest Co', description: ['Newest work'] }),
  makeExperience({ company: 'Middle Co', description: ['Middle work'] }),
  makeExperience({ company: 'Oldest Co', description: ['Oldest work'] }),
];

/** Marks every experience irrelevant unless the prompt forces it to be kept. */
const rejectUnlessForced: Responder = (prompt, description): JsonValue | Error => {
  if (description.startsWith('Tailoring Experience')) {
    return prompt.includes('MUST be kept')
      ? { relevant: true, tailored_bullet_points: ['Forced bullet'] }
      : { relevant: false, tailored_bullet_points: [] };
  }
  if (description.startsWith('Tailoring Skills')) return { Languages: ['TypeScript'] };
  if (description.startsWith('Tailoring Project')) return { relevant: true, tailored_bullet_points: ['Project bullet'] };
  return new Error(`unexpected ${description}`);
};

describe('tailorResume', () => {
  it('force-keeps the two most recent experiences when all are filtered out', async () => {
    const completion = new FakeCompletion(rejectUnlessForced);
    const resume = makeResume({ work_history: threeExperiences });

    const tailored = await tailorResume(makeContext(completion), resume, makeAnalysis(), makeJob());

    expect(tailored.tailored_work_history.map(e => e.company)).toEqual(['Newest Co', 'Middle Co']);
    expect(tailored.tailored_work_history[0].tailored_bullet_points).toEqual(['Forced bullet']);
    expect(completion.callsFor('Tailoring Experience')).toBe(5);
  });

  it('does not force anything when one experience survives', async () => {
    const completion = new FakeCompletion((prompt, description) => {
      if (description.startsWith('Tailoring Experience')) {
        return prompt.includes('Middle Co')
          ? { relevant: true, tailored_bullet_points: ['Kept'] }
          : { relevant: false, tailored_bullet_points: [] };
      }
      return rejectUnlessForced(prompt, description);
    });
    const resume = makeResume({ work_history: threeExperiences });

    const tailored = await tailorResume(makeContext(completion), resume, makeAnalysis(), makeJob());

    expect(tailored.tailored_work_history.map(e => e.company)).toEqual(['Middle Co']);
    expect(completion.callsFor('Tailoring Experience')).toBe(3);
  });

  it('returns no work history for a resume without any', async () => {
    const completion = new FakeCompletion(rejectUnlessForced);
    const resume = makeResume({ work_history: [] });

    const tailored = await tailorResume(makeContext(completion), resume, makeAnalysis(), makeJob());

    expect(tailored.tailored_work_history).toEqual([]);
    expect(completion.callsFor('Tailoring Experience')).toBe(0);
  });

  it('falls back to the original skills when tailoring returns nothing', async () => {
    const completion = new FakeCompletion((prompt, description) =>
      description.startsWith('Tailoring Skills') ? {} : rejectUnlessForced(prompt, description),
    );
    const resume = makeResume();

    const tailored = await tailorResume(makeContext(completion), resume, makeAnalysis(), makeJob());

    expect(tailored.updated_skills).toEqual(resume.skills);
  });

  it('filters projects independently and keeps degree education', async () => {
    const completion = new FakeCompletion(rejectUnlessForced);
    const resume = makeResume();

    const tailored = await tailorResume(makeContext(completion), resume, makeAnalysis(), makeJob());

    expect(tailored.tailored_projects).toEqual([
      {
        name: 'Trail Planner',
        tailored_bullet_points: ['Project bullet'],
        tech_stack: ['React Native', 'SQLite'],
        url: 'github.com/example/trail-planner',
      },
    ]);
    expect(tailored.tailored_education.map(e => e.entry_type)).toEqual(['degree']);
    expect(tailored.updated_skills).toEqual({ Languages: ['TypeScript'] });
  });
});

describe('gapKeywordsForSkills', () => {
  it('takes only gaps suggested for the skills section', () => {
    const gap = (missing_keyword: string, suggested_section: string): KeywordGap => ({
      missing_keyword,
      importance: 'medium',
      context_in_job: null,
      suggested_section,
      integration_suggestion: '',
    });
    const analysis = makeAnalysis({
      gaps: [gap('Terraform', 'skills'), gap('On-call', 'work_history'), gap('Kafka', 'Skills')],
    });

    expect(gapKeywordsForSkills(analysis)).toEqual(['Terraform', 'Kafka']);
  });
});

describe('filterEducation', () => {
  const entry = (degree: string, entry_type: EducationEntry['entry_type']): EducationEntry => ({
    institution: 'Somewhere',
    degree,
    graduation_date: null,
    entry_type,
  });

  it('keeps degree entries only', () => {
    expect(filterEducation([entry('B.S.', 'degree'), entry('AWS', 'certification')])).toEqual([entry('B.S.', 'degree')]);
  });

  it('keeps everything when no degree is listed', () => {
    const list = [entry('AWS', 'certification'), entry('Web', 'bootcamp')];
    expect(filterEducation(list)).toEqual(list);
  });
});
