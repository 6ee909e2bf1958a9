import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { parseCliArgs, runCli, type CliIo } from '../cli.js';
import { ProviderError, ValidationError } from '../lib/errors.js';
import { FakeCompletion, makeTempDir, routeByDescription, type Responder } from './helpers.js';

const responses = routeByDescription({
  'Structuring Resume': { name: 'Jane Smith', skills: ['TypeScript'], work_history: [] },
  'Structuring Job Description': { title: 'Backend Engineer', required_skills: ['TypeScript'] },
  'Finding Semantic Matches': { matches: [] },
  'Detecting Keyword Gaps': { gaps: [] },
  'Tailoring Skills': { Languages: ['TypeScript'] },
  'Generating Cover Letter': { opening_paragraph: 'Hello.' },
});

describe('parseCliArgs', () => {
  it('reads every option', () => {
    expect(parseCliArgs(['--resume', 'r.txt', '--job', 'j.txt', '--cache-dir', 'c', '--no-cache', '--stream'])).toEqual({
      resume: 'r.txt',
      job: 'j.txt',
      out: undefined,
      cacheDir: 'c',
      noCache: true,
      stream: true,
      clearCache: false,
      help: false,
    });
  });

  it('rejects unknown flags', () => {
    expect(() => parseCliArgs(['--bogus'])).toThrow(ValidationError);
  });
});

describe('runCli', () => {
  let dir: string;
  let cleanup: () => Promise<void>;
  let stdout: string[];
  let stderr: string[];

  const io = (responder: Responder = responses): CliIo => ({
    env: {},
    stdout: line => stdout.push(line),
    stderr: line => stderr.push(line),
    createCompletion: () => new FakeCompletion(responder),
  });

  const writeInputs = async () => {
    const resume = path.join(dir, 'resume.txt');
    const job = path.join(dir, 'job.txt');
    await writeFile(resume, 'Jane Smith\nTypeScript engineer\n', 'utf8');
    await writeFile(job, 'Backend Engineer\nTypeScript required\n', 'utf8');
    return { resume, job };
  };

  beforeEach(async () => {
    ({ dir, cleanup } = await makeTempDir());
    stdout = [];
    stderr = [];
  });

  afterEach(async () => {
    await cleanup();
  });

  it('prints usage for --help', async () => {
    expect(await runCli(['--help'], io())).toBe(0);
    expect(stdout[0]).toMatch(/^Usage: resume-tailor --resume <file> --job <file>/);
  });

  it('fails when an input file is not given', async () => {
    expect(await runCli(['--resume', 'resume.txt', '--cache-dir', dir], io())).toBe(1);
    expect(stderr[0]).toMatch(/^Usage: /);
  });

  it('runs the pipeline and writes the output documents', async () => {
    const { resume, job } = await writeInputs();
    const outDir = path.join(dir, 'out');

    const code = await runCli(
      ['--resume', resume, '--job', job, '--out', outDir, '--cache-dir', path.join(dir, 'cache')],
      io(),
    );

    expect(code).toBe(0);
    expect(stderr[0]).toBe('→ Structuring resume...');
    expect(stdout).toContain(`Wrote ${path.join(outDir, 'analysis.json')}`);
    expect(stdout).toContain('Alignment score: 0%');

    const tailored: unknown = JSON.parse(await readFile(path.join(outDir, 'tailored_resume.json'), 'utf8'));
    expect(tailored).toMatchObject({ updated_skills: { Languages: ['TypeScript'] } });
    const letter: unknown = JSON.parse(await readFile(path.join(outDir, 'cover_letter.json'), 'utf8'));
    expect(letter).toMatchObject({ opening_paragraph: 'Hello.', sign_off: 'Sincerely,' });
  });

  it('reports the failing stage and exits non-zero', async () => {
    const { resume, job } = await writeInputs();

    const code = await runCli(
      ['--resume', resume, '--job', job, '--out', path.join(dir, 'out'), '--no-cache'],
      io(() => new ProviderError('Unauthorized', { status: 401 })),
    );

    expect(code).toBe(1);
    expect(stderr.at(-1)).toBe('Error [PROVIDER_ERROR] in structure_resume: Unauthorized');
  });

  it('clears the cache without running when no inputs are given', async () => {
    const { resume, job } = await writeInputs();
    const cacheDir = path.join(dir, 'cache');
    await runCli(['--resume', resume, '--job', job, '--out', path.join(dir, 'out'), '--cache-dir', cacheDir], io());
    stdout = [];

    expect(await runCli(['--clear-cache', '--cache-dir', cacheDir], io())).toBe(0);
    // resume, job, matches, gaps, skills, cover letter
    expect(stdout).toEqual([`Cleared 6 cache entries from ${cacheDir}`]);
  });
});
