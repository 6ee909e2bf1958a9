import { composeKey } from '../../lib/canonical.js';
import { tailorExperiencePrompt } from '../prompts.js';
import { ExperienceDraftSchema } from '../schemas.js';
import { CACHE_TYPES, KEY_VERSIONS, parseWith, runCachedStage, type StageContext } from '../stage-runner.js';
import type { AnalysisResult, Experience, StructuredJob, TailoredExperience } from '../types.js';

const parseDraft = parseWith(ExperienceDraftSchema, 'Tailor experience');

export interface TailorExperienceOptions {
  /**
   * Skip the relevance check and always return an entity. Used for the most
   * recent roles when every experience would otherwise be filtered out.
   */
  forceKeep?: boolean;
}

/**
 * Rewrites one experience's bullets for the job. Returns null when the
 * provider judges the experience irrelevant or writes no bullets, unless
 * `forceKeep` is set; a forced entry with no new bullets keeps its original
 * description.
 *
 * The generation document is what gets cached, so the relevance verdict is
 * replayed on a hit. Forced and unforced generations use different prompts
 * and therefore different keys.
 */
export async function tailorExperience(
  ctx: StageContext,
  experience: Experience,
  analysis: AnalysisResult,
  job: StructuredJob,
  options: TailorExperienceOptions = {},
): Promise<TailoredExperience | null> {
  const forceKeep = options.forceKeep ?? false;
  const label = `${experience.role} at ${experience.company}`;

  const { value: draft, fromCache } = await runCachedStage(ctx, {
    cacheType: CACHE_TYPES.experience,
    key: composeKey([experience, job], forceKeep ? KEY_VERSIONS.experienceForced : KEY_VERSIONS.experience),
    description: `Tailoring Experience: ${label}`,
    prompt: () => tailorExperiencePrompt(experience, analysis, job, forceKeep),
    parse: parseDraft,
  });

  let bullets = draft.tailored_bullet_points;
  if (!forceKeep && (!draft.relevant || bullets.length === 0)) {
    ctx.logger.info({ fromCache, experience: label }, 'Experience dropped as irrelevant');
    return null;
  }
  if (bullets.length === 0) {
    ctx.logger.warn({ experience: label }, 'Forced experience came back empty; keeping original bullets');
    bullets = [...experience.description];
  }

  ctx.logger.debug({ fromCache, experience: label, bullets: bullets.length, forceKeep }, 'Experience tailored');
  return {
    company: experience.company,
    role: experience.role,
    duration: experience.duration,
    tailored_bullet_points: bullets,
  };
}
