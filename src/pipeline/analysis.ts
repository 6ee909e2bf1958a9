/**
 * Analysis: semantic matches + keyword gaps, summarized into an alignment
 * score, strength statements and recommendations.
 *
 * Only the two provider stages are cached. The summary is cheap and
 * recomputed from them on every run.
 */

import type { StageContext } from './stage-runner.js';
import { findKeywordGaps } from './stages/keyword-gaps.js';
import { findSemanticMatches } from './stages/semantic-match.js';
import type { AnalysisResult, KeywordGap, SemanticMatch, StructuredJob, StructuredResume } from './types.js';

const TOP_STRENGTHS = 5;
const LISTED_HIGH_GAPS = 3;
const LISTED_TRANSFERABLE = 2;

/** min(1, matches / max(1, required skills + responsibilities)) */
export function alignmentScore(matches: readonly SemanticMatch[], job: StructuredJob): number {
  const requirements = job.required_skills.length + job.responsibilities.length;
  return Math.min(1, matches.length / Math.max(1, requirements));
}

export function describeStrengths(matches: readonly SemanticMatch[]): string[] {
  return [...matches]
    .sort((a, b) => b.match_score - a.match_score)
    .slice(0, TOP_STRENGTHS)
    .map(m => `${m.resume_item} aligns with ${m.job_requirement} (score: ${m.match_score.toFixed(2)})`);
}

export function buildRecommendations(
  matches: readonly SemanticMatch[],
  gaps: readonly KeywordGap[],
  score: number,
): string[] {
  const recommendations: string[] = [];

  const highGaps = gaps.filter(g => g.importance === 'high');
  if (highGaps.length > 0) {
    const listed = highGaps.slice(0, LISTED_HIGH_GAPS).map(g => g.missing_keyword);
    recommendations.push(`Add ${highGaps.length} high-priority keywords: ${listed.join(', ')}`);
  }

  if (score < 0.5) {
    recommendations.push('Consider tailoring your experience descriptions to better match job responsibilities');
  } else if (score >= 0.75) {
    recommendations.push('Strong alignment with job requirements - focus on highlighting relevant projects');
  }

  const transferable = matches.filter(m => m.match_type === 'transferable');
  if (transferable.length > 0) {
    const listed = transferable.slice(0, LISTED_TRANSFERABLE).map(m => m.resume_item);
    recommendations.push(`Emphasize transferable skills: ${listed.join(', ')}`);
  }

  return recommendations;
}

export async function analyzeResume(
  ctx: StageContext,
  resume: StructuredResume,
  job: StructuredJob,
): Promise<AnalysisResult> {
  const matches = await findSemanticMatches(ctx, resume, job);
  const gaps = await findKeywordGaps(ctx, resume, job, matches);
  const score = alignmentScore(matches, job);

  ctx.logger.info({ matches: matches.length, gaps: gaps.length, score }, 'Analysis complete');

  return {
    matches,
    gaps,
    overall_alignment_score: score,
    strengths: describeStrengths(matches),
    recommendations: buildRecommendations(matches, gaps, score),
  };
}
