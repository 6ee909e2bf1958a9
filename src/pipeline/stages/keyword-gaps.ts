import { composeKey } from '../../lib/canonical.js';
import { keywordGapPrompt } from '../prompts.js';
import { KeywordGapSchema } from '../schemas.js';
import { CACHE_TYPES, KEY_VERSIONS, parseListWith, runCachedStage, type StageContext } from '../stage-runner.js';
import type { GapImportance, KeywordGap, SemanticMatch, StructuredJob, StructuredResume } from '../types.js';

const parseGaps = parseListWith(KeywordGapSchema, 'gaps', 'Keyword gap detection');

const IMPORTANCE_RANK: Record<GapImportance, number> = { high: 0, medium: 1, low: 2 };

/** high > medium > low; entries of equal importance keep their order. */
export function sortGapsByImportance(gaps: readonly KeywordGap[]): KeywordGap[] {
  return [...gaps].sort((a, b) => IMPORTANCE_RANK[a.importance] - IMPORTANCE_RANK[b.importance]);
}

/**
 * Finds job keywords the resume lacks. Requirements the semantic matches
 * already cover are passed to the provider as excluded.
 *
 * The key covers resume and job only: matches are derived from the same two
 * inputs, so they add nothing to it.
 */
export async function findKeywordGaps(
  ctx: StageContext,
  resume: StructuredResume,
  job: StructuredJob,
  matches: readonly SemanticMatch[],
): Promise<KeywordGap[]> {
  const covered = [...new Set(matches.map(m => m.job_requirement))];

  const { value, fromCache } = await runCachedStage(ctx, {
    cacheType: CACHE_TYPES.gaps,
    key: composeKey([resume, job], KEY_VERSIONS.gaps),
    description: 'Detecting Keyword Gaps',
    prompt: () => keywordGapPrompt(resume, job, covered),
    parse: parseGaps,
  });

  ctx.logger.info(
    { fromCache, gaps: value.length, high: value.filter(g => g.importance === 'high').length },
    'Keyword gap detection complete',
  );
  return value;
}
