/**
 * Structuring stages: raw resume / job text → typed entities.
 *
 * The cache key is the raw text itself, so the same upload never pays for a
 * second provider call. Skills are normalized by the schema on every parse,
 * cache hits included.
 */

import { structureJobPrompt, structureResumePrompt } from '../prompts.js';
import { StructuredJobSchema, StructuredResumeSchema, flattenSkills } from '../schemas.js';
import { CACHE_TYPES, parseWith, runCachedStage, type StageContext } from '../stage-runner.js';
import type { StructuredJob, StructuredResume } from '../types.js';

const parseResume = parseWith(StructuredResumeSchema, 'Structure resume');
const parseJob = parseWith(StructuredJobSchema, 'Structure job description');

export async function structureResume(ctx: StageContext, rawText: string): Promise<StructuredResume> {
  const { value, fromCache } = await runCachedStage(ctx, {
    cacheType: CACHE_TYPES.resume,
    key: rawText,
    description: 'Structuring Resume',
    prompt: () => structureResumePrompt(rawText),
    parse: parseResume,
  });

  ctx.logger.info(
    {
      fromCache,
      experiences: value.work_history.length,
      projects: value.projects.length,
      skills: flattenSkills(value.skills).length,
    },
    'Resume structured',
  );
  return value;
}

export async function structureJob(ctx: StageContext, rawText: string): Promise<StructuredJob> {
  const { value, fromCache } = await runCachedStage(ctx, {
    cacheType: CACHE_TYPES.job,
    key: rawText,
    description: 'Structuring Job Description',
    prompt: () => structureJobPrompt(rawText),
    parse: parseJob,
  });

  ctx.logger.info(
    {
      fromCache,
      title: value.title,
      required_skills: value.required_skills.length,
      responsibilities: value.responsibilities.length,
    },
    'Job description structured',
  );
  return value;
}

/** Normalizes a cached resume document read outside a pipeline run. */
export function parseStructuredResume(document: unknown): StructuredResume {
  return parseResume(document);
}
