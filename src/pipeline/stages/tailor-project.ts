import { composeKey } from '../../lib/canonical.js';
import { tailorProjectPrompt } from '../prompts.js';
import { ProjectDraftSchema } from '../schemas.js';
import { CACHE_TYPES, KEY_VERSIONS, parseWith, runCachedStage, type StageContext } from '../stage-runner.js';
import type { Project, StructuredJob, TailoredProject } from '../types.js';

const parseDraft = parseWith(ProjectDraftSchema, 'Tailor project');

/**
 * Rewrites one project for the job, or null when it is irrelevant. The
 * generated tech stack replaces the original only when it is non-empty.
 */
export async function tailorProject(
  ctx: StageContext,
  project: Project,
  job: StructuredJob,
): Promise<TailoredProject | null> {
  const { value: draft, fromCache } = await runCachedStage(ctx, {
    cacheType: CACHE_TYPES.project,
    key: composeKey([project, job], KEY_VERSIONS.project),
    description: `Tailoring Project: ${project.name}`,
    prompt: () => tailorProjectPrompt(project, job),
    parse: parseDraft,
  });

  if (!draft.relevant || draft.tailored_bullet_points.length === 0) {
    ctx.logger.info({ fromCache, project: project.name }, 'Project dropped as irrelevant');
    return null;
  }

  return {
    name: project.name,
    tailored_bullet_points: draft.tailored_bullet_points,
    tech_stack: draft.tech_stack.length > 0 ? draft.tech_stack : [...project.tech_stack],
    url: project.url,
  };
}
