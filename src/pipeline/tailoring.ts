import type { StageContext } from './stage-runner.js';
import { tailorExperience } from './stages/tailor-experience.js';
import { tailorProject } from './stages/tailor-project.js';
import { tailorSkills } from './stages/tailor-skills.js';
import type {
  AnalysisResult,
  EducationEntry,
  StructuredJob,
  StructuredResume,
  TailoredExperience,
  TailoredProject,
  TailoredResume,
} from './types.js';

/** Entries regenerated without the relevance check when all were dropped. */
export const FORCE_KEEP_COUNT = 2;

export function gapKeywordsForSkills(analysis: AnalysisResult): string[] {
  return analysis.gaps
    .filter(g => g.suggested_section.toLowerCase() === 'skills')
    .map(g => g.missing_keyword);
}

/** Degree entries only; the full list when that leaves nothing. */
export function filterEducation(education: readonly EducationEntry[]): EducationEntry[] {
  const degrees = education.filter(e => e.entry_type === 'degree');
  return degrees.length > 0 ? degrees : [...education];
}

async function tailorWorkHistory(
  ctx: StageContext,
  resume: StructuredResume,
  analysis: AnalysisResult,
  job: StructuredJob,
): Promise<TailoredExperience[]> {
  const kept: TailoredExperience[] = [];
  for (const experience of resume.work_history) {
    const tailored = await tailorExperience(ctx, experience, analysis, job);
    if (tailored) kept.push(tailored);
  }
  if (kept.length > 0 || resume.work_history.length === 0) return kept;

  // Work history is most recent first.
  ctx.logger.warn(
    { experiences: resume.work_history.length },
    'Every experience was filtered out; force-keeping the most recent entries',
  );
  for (const experience of resume.work_history.slice(0, FORCE_KEEP_COUNT)) {
    const tailored = await tailorExperience(ctx, experience, analysis, job, { forceKeep: true });
    if (tailored) kept.push(tailored);
  }
  return kept;
}

async function tailorProjects(
  ctx: StageContext,
  resume: StructuredResume,
  job: StructuredJob,
): Promise<TailoredProject[]> {
  const kept: TailoredProject[] = [];
  for (const project of resume.projects) {
    const tailored = await tailorProject(ctx, project, job);
    if (tailored) kept.push(tailored);
  }
  return kept;
}

/**
 * Builds the tailored resume. Every provider call runs sequentially, in
 * resume order.
 */
export async function tailorResume(
  ctx: StageContext,
  resume: StructuredResume,
  analysis: AnalysisResult,
  job: StructuredJob,
): Promise<TailoredResume> {
  const tailored_work_history = await tailorWorkHistory(ctx, resume, analysis, job);
  const updated_skills = await tailorSkills(ctx, resume.skills, job, gapKeywordsForSkills(analysis));
  const tailored_education = filterEducation(resume.education);
  const tailored_projects = await tailorProjects(ctx, resume, job);

  ctx.logger.info(
    {
      experiences: `${tailored_work_history.length}/${resume.work_history.length}`,
      projects: `${tailored_projects.length}/${resume.projects.length}`,
      education: tailored_education.length,
    },
    'Resume tailored',
  );

  return { tailored_work_history, updated_skills, tailored_projects, tailored_education };
}
