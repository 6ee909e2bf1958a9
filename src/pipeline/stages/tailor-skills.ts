import { composeKey } from '../../lib/canonical.js';
import { tailorSkillsPrompt } from '../prompts.js';
import { SkillGroupsSchema } from '../schemas.js';
import { CACHE_TYPES, KEY_VERSIONS, parseWith, runCachedStage, type StageContext } from '../stage-runner.js';
import type { SkillGroups, StructuredJob } from '../types.js';

const parseSkills = parseWith(SkillGroupsSchema, 'Tailor skills');

const isNonEmpty = (groups: SkillGroups): boolean => Object.keys(groups).length > 0;

/**
 * Curates the skills section for the job and folds in the gap keywords.
 *
 * Only a non-empty mapping is accepted. Anything else (an empty object, a
 * bare string) leaves the original skills in place and is not cached, so
 * the next run asks again.
 */
export async function tailorSkills(
  ctx: StageContext,
  skills: SkillGroups,
  job: StructuredJob,
  gapKeywords: readonly string[],
): Promise<SkillGroups> {
  const { value, fromCache } = await runCachedStage(ctx, {
    cacheType: CACHE_TYPES.skills,
    key: composeKey([skills, job, gapKeywords], KEY_VERSIONS.skills),
    description: 'Tailoring Skills',
    prompt: () => tailorSkillsPrompt(skills, job, gapKeywords),
    parse: parseSkills,
    shouldCache: isNonEmpty,
  });

  if (!isNonEmpty(value)) {
    ctx.logger.warn('Skills tailoring returned no categories; keeping original skills');
    return skills;
  }

  ctx.logger.debug({ fromCache, categories: Object.keys(value).length }, 'Skills tailored');
  return value;
}
