import type { z } from 'zod';
import type { CompletionPort } from '../lib/completion.js';
import type { ContentCache } from '../lib/content-cache.js';
import { ValidationError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import { describeIssues } from './schemas.js';

/**
 * Everything a stage needs, passed in explicitly. Stages hold no state of
 * their own between calls.
 */
export interface StageContext {
  completion: CompletionPort;
  cache: ContentCache;
  logger: Logger;
}

/** One cache partition per stage. Also the file name prefix on disk. */
export const CACHE_TYPES = {
  resume: 'resume',
  job: 'job_description',
  matches: 'semantic_matches',
  gaps: 'keyword_gaps',
  experience: 'tailored_experience',
  project: 'tailored_project',
  skills: 'tailored_skills',
  coverLetter: 'cover_letter',
} as const;

export type CacheType = (typeof CACHE_TYPES)[keyof typeof CACHE_TYPES];

/**
 * Key suffixes. Bumping one retires every cache entry written under the old
 * key composition or document shape for that stage.
 */
export const KEY_VERSIONS = {
  matches: 'matches_v1',
  gaps: 'gaps_v1',
  experience: 'tailored_exp_v2',
  experienceForced: 'tailored_exp_v2_force_keep',
  project: 'tailored_proj_v1',
  skills: 'tailored_skills_v1',
  coverLetter: 'cover_letter_v1',
} as const;

export interface CachedStageSpec<T> {
  cacheType: CacheType;
  /** Canonical key of the stage inputs. */
  key: string;
  /** Human-readable label used in logs and progress output. */
  description: string;
  prompt: () => string;
  /** Document → stage value. Throws ValidationError when the shape is wrong. */
  parse: (document: unknown) => T;
  /** Values rejected here are returned but not written to the cache. */
  shouldCache?: (value: T) => boolean;
}

export interface CachedStageResult<T> {
  value: T;
  fromCache: boolean;
}

/**
 * check cache → build prompt → complete → parse/validate → write cache.
 *
 * A hit short-circuits everything else, even if the provider or model has
 * changed since the entry was written. A cached document that no longer
 * parses under the stage's schema is logged and recomputed.
 */
export async function runCachedStage<T>(
  ctx: StageContext,
  spec: CachedStageSpec<T>,
): Promise<CachedStageResult<T>> {
  const log = ctx.logger.child({ cacheType: spec.cacheType });

  const cached = await ctx.cache.get(spec.cacheType, spec.key);
  if (cached !== undefined) {
    try {
      const value = spec.parse(cached);
      log.debug({ description: spec.description }, 'Loaded from cache');
      return { value, fromCache: true };
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      log.warn({ details: err.details }, 'Cached document no longer matches the stage schema; recomputing');
    }
  }

  const document = await ctx.completion.complete(spec.prompt(), spec.description);
  const value = spec.parse(document);

  if (spec.shouldCache?.(value) ?? true) {
    await ctx.cache.put(spec.cacheType, spec.key, value);
  } else {
    log.debug({ description: spec.description }, 'Result not cached');
  }
  return { value, fromCache: false };
}

/**
 * Parser for `CachedStageSpec.parse` backed by a zod schema.
 */
export function parseWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  label: string,
): (document: unknown) => T {
  return (document: unknown) => {
    const result = schema.safeParse(document);
    if (!result.success) {
      throw new ValidationError(`${label}: document does not match the expected shape`, describeIssues(result.error));
    }
    return result.data;
  };
}

/**
 * List-valued stages: the provider wraps the list in an object under
 * `field`, the cache stores the bare list. Both parse here. Entries that do
 * not fit `schema` are dropped.
 */
export function parseListWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  field: string,
  label: string,
): (document: unknown) => T[] {
  return (document: unknown) => {
    let items: unknown;
    if (Array.isArray(document)) {
      items = document;
    } else if (document !== null && typeof document === 'object') {
      items = Reflect.get(document, field) ?? [];
    }
    if (!Array.isArray(items)) {
      throw new ValidationError(`${label}: expected a list under "${field}"`);
    }
    return items.flatMap(item => {
      const parsed = schema.safeParse(item);
      return parsed.success ? [parsed.data] : [];
    });
  };
}
