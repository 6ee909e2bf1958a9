import { composeKey } from '../../lib/canonical.js';
import { semanticMatchPrompt } from '../prompts.js';
import { SemanticMatchSchema } from '../schemas.js';
import { CACHE_TYPES, KEY_VERSIONS, parseListWith, runCachedStage, type StageContext } from '../stage-runner.js';
import type { SemanticMatch, StructuredJob, StructuredResume } from '../types.js';

const parseMatches = parseListWith(SemanticMatchSchema, 'matches', 'Semantic matching');

/**
 * Links resume items to job requirements. Matches that name no job
 * requirement carry no information for gap detection and are dropped.
 */
export async function findSemanticMatches(
  ctx: StageContext,
  resume: StructuredResume,
  job: StructuredJob,
): Promise<SemanticMatch[]> {
  const { value, fromCache } = await runCachedStage(ctx, {
    cacheType: CACHE_TYPES.matches,
    key: composeKey([resume, job], KEY_VERSIONS.matches),
    description: 'Finding Semantic Matches',
    prompt: () => semanticMatchPrompt(resume, job),
    parse: document => parseMatches(document).filter(m => m.job_requirement.length > 0),
  });

  ctx.logger.info({ fromCache, matches: value.length }, 'Semantic matching complete');
  return value;
}
