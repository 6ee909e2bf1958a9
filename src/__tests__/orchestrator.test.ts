import { utimes, writeFile } from 'node:fs/promises';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileContentCache, MemoryContentCache } from '../lib/content-cache.js';
import { ProviderError } from '../lib/errors.js';
import type { JsonValue } from '../lib/json-repair.js';
import { UsageTracker } from '../lib/llm-provider.js';
import {
  createPipeline,
  loadLatestStructuredResume,
  runPipeline,
  toRenderPayload,
} from '../pipeline/orchestrator.js';
import { CACHE_TYPES } from '../pipeline/stage-runner.js';
import type { PipelineEvent } from '../pipeline/types.js';
import { FakeCompletion, makeTempDir, routeByDescription, silentLogger } from './helpers.js';

const input = { resume_text: 'Jane Smith resume text', job_text: 'Backend Engineer job text' };

function pipelineResponses(overrides: Record<string, JsonValue | Error> = {}) {
  return routeByDescription({
    'Structuring Resume': {
      name: 'Jane Smith',
      skills: { Languages: ['TypeScript'] },
      work_history: [{ company: 'Example Co', role: 'Engineer', duration: '2021', description: ['Built APIs'] }],
      projects: [],
      education: [],
    },
    'Structuring Job Description': {
      title: 'Backend Engineer',
      required_skills: ['TypeScript', 'Terraform'],
      responsibilities: ['Build APIs', 'Operate services'],
    },
    'Finding Semantic Matches': {
      matches: [
        { resume_item: 'TypeScript', job_requirement: 'TypeScript', match_score: 1, reasoning: 'same', match_type: 'exact' },
        { resume_item: 'Built APIs', job_requirement: 'Build APIs', match_score: 0.9, reasoning: 'same work', match_type: 'semantic' },
        { resume_item: 'Built APIs', job_requirement: 'Operate services', match_score: 0.6, reasoning: 'nearby', match_type: 'transferable' },
      ],
    },
    'Detecting Keyword Gaps': {
      gaps: [{ missing_keyword: 'Terraform', importance: 'high', suggested_section: 'skills' }],
    },
    'Tailoring Experience': { relevant: true, tailored_bullet_points: ['Built TypeScript APIs serving [~1M requests/day]'] },
    'Tailoring Skills': { Languages: ['TypeScript'], Tools: ['Terraform'] },
    'Generating Cover Letter': {
      opening_paragraph: 'I am applying for the Backend Engineer role.',
      body_paragraphs: ['First.', 'Second.'],
      closing_paragraph: 'Thank you.',
    },
    ...overrides,
  });
}

describe('runPipeline', () => {
  it('runs every stage in order and returns the full result', async () => {
    const events: PipelineEvent[] = [];
    const completion = new FakeCompletion(pipelineResponses());

    const result = await runPipeline(
      { completion, cache: new MemoryContentCache(), emit: e => events.push(e), logger: silentLogger },
      input,
    );

    expect(completion.calls.map(c => c.description)).toEqual([
      'Structuring Resume',
      'Structuring Job Description',
      'Finding Semantic Matches',
      'Detecting Keyword Gaps',
      'Tailoring Experience: Engineer at Example Co',
      'Tailoring Skills',
      'Generating Cover Letter',
    ]);
    expect(events.map(e => (e.type === 'pipeline_complete' ? e.type : `${e.type}:${e.stage}`))).toEqual([
      'stage_start:structure_resume',
      'stage_complete:structure_resume',
      'stage_start:structure_job',
      'stage_complete:structure_job',
      'stage_start:analysis',
      'stage_complete:analysis',
      'stage_start:tailoring',
      'stage_complete:tailoring',
      'stage_start:cover_letter',
      'stage_complete:cover_letter',
      'pipeline_complete',
    ]);
    expect(result.analysis.overall_alignment_score).toBe(0.75);
    expect(result.analysis.recommendations).toEqual([
      'Add 1 high-priority keywords: Terraform',
      'Strong alignment with job requirements - focus on highlighting relevant projects',
      'Emphasize transferable skills: Built APIs',
    ]);
    expect(result.tailored_resume.updated_skills).toEqual({ Languages: ['TypeScript'], Tools: ['Terraform'] });
    expect(result.cover_letter.sign_off).toBe('Sincerely,');
    expect(result.usage).toEqual({ input_tokens: 0, output_tokens: 0, calls: 0 });
  });

  it('makes no provider calls when re-run on the same inputs', async () => {
    const cache = new MemoryContentCache();
    const completion = new FakeCompletion(pipelineResponses());
    const pipeline = createPipeline({ completion, cache, logger: silentLogger });

    const first = await pipeline.run(input);
    const callsAfterFirst = completion.calls.length;
    const second = await pipeline.run(input);

    expect(completion.calls.length).toBe(callsAfterFirst);
    expect(second.analysis).toEqual(first.analysis);
    expect(second.tailored_resume).toEqual(first.tailored_resume);
    expect(second.cover_letter).toEqual(first.cover_letter);
  });

  it('aborts on the first failing stage and tags the error with it', async () => {
    const events: PipelineEvent[] = [];
    const completion = new FakeCompletion(
      pipelineResponses({ 'Detecting Keyword Gaps': new ProviderError('Rate limited', { status: 429 }) }),
    );

    const run = runPipeline(
      { completion, cache: new MemoryContentCache(), emit: e => events.push(e), logger: silentLogger },
      input,
    );

    await expect(run).rejects.toMatchObject({ name: 'ProviderError', stage: 'analysis', status: 429 });
    expect(events.at(-1)).toEqual({
      type: 'pipeline_error',
      stage: 'analysis',
      error: 'Rate limited',
      code: 'PROVIDER_ERROR',
    });
    expect(events.some(e => e.type === 'stage_complete' && e.stage === 'analysis')).toBe(false);
    expect(completion.callsFor('Tailoring')).toBe(0);
  });

  it('is not affected by a throwing event listener', async () => {
    const completion = new FakeCompletion(pipelineResponses());

    const result = await runPipeline(
      {
        completion,
        cache: new MemoryContentCache(),
        logger: silentLogger,
        emit: () => {
          throw new Error('listener bug');
        },
      },
      input,
    );

    expect(result.structured_resume.name).toBe('Jane Smith');
  });

  it('reports usage from the tracker it was given', async () => {
    const usage = new UsageTracker();
    usage.record({ input_tokens: 3, output_tokens: 4 });
    const completion = new FakeCompletion(pipelineResponses());

    const result = await runPipeline({ completion, cache: new MemoryContentCache(), usage, logger: silentLogger }, input);

    expect(result.usage).toEqual({ input_tokens: 3, output_tokens: 4, calls: 1 });
  });
});

describe('toRenderPayload', () => {
  it('exposes the documents a renderer needs', async () => {
    const completion = new FakeCompletion(pipelineResponses());
    const result = await runPipeline({ completion, cache: new MemoryContentCache(), logger: silentLogger }, input);

    const payload = toRenderPayload(result);

    expect(payload.resume).toBe(result.structured_resume);
    expect(payload.tailored_resume).toBe(result.tailored_resume);
    expect(payload.cover_letter).toBe(result.cover_letter);
  });
});

describe('loadLatestStructuredResume', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('returns the resume written by the last run', async () => {
    const cache = new FileContentCache(dir, silentLogger);
    const completion = new FakeCompletion(pipelineResponses());
    await runPipeline({ completion, cache, logger: silentLogger }, input);

    const resume = await loadLatestStructuredResume(cache, silentLogger);

    expect(resume?.name).toBe('Jane Smith');
    expect(resume?.skills).toEqual({ Languages: ['TypeScript'] });
  });

  it('returns undefined when nothing is cached', async () => {
    expect(await loadLatestStructuredResume(new FileContentCache(dir, silentLogger), silentLogger)).toBeUndefined();
  });

  it('skips a newer entry that does not parse as a resume', async () => {
    const cache = new FileContentCache(dir, silentLogger);
    await runPipeline({ completion: new FakeCompletion(pipelineResponses()), cache, logger: silentLogger }, input);
    const broken = cache.pathFor(CACHE_TYPES.resume, 'x');
    await writeFile(broken, '{"skills": []}', 'utf8');
    const later = new Date(Date.now() + 60_000);
    await utimes(broken, later, later);

    const resume = await loadLatestStructuredResume(cache, silentLogger);

    expect(resume?.name).toBe('Jane Smith');
  });

  it('returns undefined when the latest entry does not parse as a resume', async () => {
    const cache = new FileContentCache(dir, silentLogger);
    await writeFile(cache.pathFor(CACHE_TYPES.resume, 'x'), '{"skills": []}', 'utf8');

    expect(await loadLatestStructuredResume(cache, silentLogger)).toBeUndefined();
  });
});
