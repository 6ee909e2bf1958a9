#!/usr/bin/env node
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import { createCompletionPort, type CompletionPort, type CompletionProgress } from './lib/completion.js';
import { loadConfig, type AppConfig } from './lib/config.js';
import { FileContentCache, MemoryContentCache, type ContentCache } from './lib/content-cache.js';
import { PipelineError, ValidationError } from './lib/errors.js';
import { createProvider, getModel } from './lib/llm.js';
import { UsageTracker } from './lib/llm-provider.js';
import logger from './lib/logger.js';
import { PlainTextExtractor } from './pipeline/boundaries.js';
import { runPipeline, toRenderPayload } from './pipeline/orchestrator.js';
import { sortGapsByImportance } from './pipeline/stages/keyword-gaps.js';
import type { PipelineEvent, PipelineResult } from './pipeline/types.js';

const USAGE = `Usage: resume-tailor --resume <file> --job <file> [options]

Options:
  --resume <file>      Resume as plain text
  --job <file>         Job description as plain text
  --out <dir>          Output directory (default: $OUTPUT_DIR or ./output)
  --cache-dir <dir>    Cache directory (default: $CACHE_DIR or ./cache)
  --no-cache           Keep cache entries in memory for this run only
  --stream             Stream completions and print progress
  --clear-cache        Remove every cache entry first; alone, just clears
  -h, --help           Show this message`;

export interface CliOptions {
  resume?: string;
  job?: string;
  out?: string;
  cacheDir?: string;
  noCache: boolean;
  stream: boolean;
  clearCache: boolean;
  help: boolean;
}

const CLI_OPTIONS = {
  resume: { type: 'string' },
  job: { type: 'string' },
  out: { type: 'string' },
  'cache-dir': { type: 'string' },
  'no-cache': { type: 'boolean' },
  stream: { type: 'boolean' },
  'clear-cache': { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

function parseRaw(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: CLI_OPTIONS, strict: true, allowPositionals: false }).values;
  } catch (err) {
    throw new ValidationError('Invalid arguments', err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const values = parseRaw(argv);
  return {
    resume: values.resume,
    job: values.job,
    out: values.out,
    cacheDir: values['cache-dir'],
    noCache: values['no-cache'] === true,
    stream: values.stream === true,
    clearCache: values['clear-cache'] === true,
    help: values.help === true,
  };
}

export interface CliIo {
  env?: Record<string, string | undefined>;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  /** Replaces the configured provider; used to run without network access. */
  createCompletion?: (usage: UsageTracker, config: AppConfig, onProgress: (p: CompletionProgress) => void) => CompletionPort;
}

function formatEvent(event: PipelineEvent): string {
  switch (event.type) {
    case 'stage_start':
      return `→ ${event.message}`;
    case 'stage_complete':
      return `✓ ${event.message} (${(event.duration_ms / 1000).toFixed(1)}s)`;
    case 'pipeline_complete':
      return `Done in ${(event.duration_ms / 1000).toFixed(1)}s`;
    case 'pipeline_error':
      return `✗ ${event.stage} failed [${event.code}]: ${event.error}`;
  }
}

export function formatSummary(result: PipelineResult): string[] {
  const { analysis, tailored_resume, structured_resume } = result;
  const lines = [
    '',
    `Alignment score: ${(analysis.overall_alignment_score * 100).toFixed(0)}%`,
    `Matches: ${analysis.matches.length}  Gaps: ${analysis.gaps.length}`,
    `Experiences kept: ${tailored_resume.tailored_work_history.length}/${structured_resume.work_history.length}`,
    `Projects kept: ${tailored_resume.tailored_projects.length}/${structured_resume.projects.length}`,
  ];
  if (analysis.strengths.length > 0) {
    lines.push('', 'Strengths:', ...analysis.strengths.map(s => `  - ${s}`));
  }
  const gaps = sortGapsByImportance(analysis.gaps);
  if (gaps.length > 0) {
    lines.push('', 'Missing keywords:', ...gaps.map(g => `  - [${g.importance}] ${g.missing_keyword}`));
  }
  if (analysis.recommendations.length > 0) {
    lines.push('', 'Recommendations:', ...analysis.recommendations.map(r => `  - ${r}`));
  }
  lines.push(`Tokens: ${result.usage.input_tokens} in / ${result.usage.output_tokens} out (${result.usage.calls} calls)`);
  return lines;
}

async function readText(file: string, extractor: PlainTextExtractor): Promise<string> {
  const bytes = await readFile(file);
  const document = await extractor.extract(bytes, path.basename(file));
  if (!document.raw_text) {
    throw new ValidationError(`${file} contains no text`);
  }
  return document.raw_text;
}

async function writeJson(dir: string, name: string, value: unknown): Promise<string> {
  const file = path.join(dir, name);
  await writeFile(file, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
  return file;
}

/** Runs the CLI and returns its exit code. */
export async function runCli(argv: string[], io: CliIo = {}): Promise<number> {
  const out = io.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));
  const err = io.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));

  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      out(USAGE);
      return 0;
    }

    const config = loadConfig(io.env ?? process.env);
    const cacheDir = path.resolve(options.cacheDir ?? config.cacheDir);
    const fileCache = new FileContentCache(cacheDir);

    if (options.clearCache) {
      const removed = await fileCache.clear();
      out(`Cleared ${removed} cache entries from ${cacheDir}`);
      if (!options.resume && !options.job) return 0;
    }

    if (!options.resume || !options.job) {
      err(USAGE);
      return 1;
    }

    const extractor = new PlainTextExtractor();
    const resumeText = await readText(options.resume, extractor);
    const jobText = await readText(options.job, extractor);

    const mode = options.stream ? 'streaming' : config.completionMode;
    const onProgress = (p: CompletionProgress) => {
      if (process.stderr.isTTY) {
        process.stderr.write(`\r  ${p.description}: ${(p.bytes / 1024).toFixed(1)} KB (${p.bytes_per_sec} B/s)   `);
      }
    };
    const usage = new UsageTracker();
    const completion = io.createCompletion
      ? io.createCompletion(usage, config, onProgress)
      : createCompletionPort(mode, {
          provider: createProvider(config),
          model: getModel(config),
          maxTokens: config.maxTokens,
          usage,
          onProgress,
        });
    const cache: ContentCache = options.noCache ? new MemoryContentCache() : fileCache;

    const result = await runPipeline(
      { completion, cache, usage, emit: event => err(formatEvent(event)) },
      { resume_text: resumeText, job_text: jobText },
    );

    const outDir = path.resolve(options.out ?? config.outputDir);
    await mkdir(outDir, { recursive: true });
    const payload = toRenderPayload(result);
    const written = [
      await writeJson(outDir, 'structured_resume.json', payload.resume),
      await writeJson(outDir, 'tailored_resume.json', payload.tailored_resume),
      await writeJson(outDir, 'cover_letter.json', payload.cover_letter),
      await writeJson(outDir, 'analysis.json', result.analysis),
    ];

    for (const line of formatSummary(result)) out(line);
    out('');
    for (const file of written) out(`Wrote ${file}`);
    return 0;
  } catch (error) {
    if (error instanceof PipelineError) {
      err(`Error [${error.code}]${error.stage ? ` in ${error.stage}` : ''}: ${error.message}`);
      if (error instanceof ValidationError) {
        for (const detail of error.details) err(`  ${detail}`);
      }
    } else {
      logger.error({ err: error }, 'Unexpected failure');
      err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    return 1;
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(fileURLToPath(import.meta.url));
}

if (isMainModule()) {
  runCli(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.fatal({ err: error }, 'CLI crashed');
      process.exitCode = 1;
    },
  );
}
