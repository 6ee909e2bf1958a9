import { composeKey } from '../../lib/canonical.js';
import { coverLetterPrompt } from '../prompts.js';
import { CoverLetterSchema } from '../schemas.js';
import { CACHE_TYPES, KEY_VERSIONS, parseWith, runCachedStage, type StageContext } from '../stage-runner.js';
import type { AnalysisResult, CoverLetter, StructuredJob, StructuredResume } from '../types.js';

const parseLetter = parseWith(CoverLetterSchema, 'Cover letter');

export async function writeCoverLetter(
  ctx: StageContext,
  resume: StructuredResume,
  job: StructuredJob,
  analysis: AnalysisResult,
): Promise<CoverLetter> {
  const { value, fromCache } = await runCachedStage(ctx, {
    cacheType: CACHE_TYPES.coverLetter,
    key: composeKey([resume, job], KEY_VERSIONS.coverLetter),
    description: 'Generating Cover Letter',
    prompt: () => coverLetterPrompt(resume, job, analysis),
    parse: parseLetter,
  });

  ctx.logger.info({ fromCache, paragraphs: value.body_paragraphs.length }, 'Cover letter written');
  return value;
}
