/**
 * Zod schemas that turn parsed provider output into the strict entity shapes
 * of ./types.ts.
 *
 * Provider output is unpredictable, so the schemas are permissive about
 * everything a stage can live without (missing lists default to empty,
 * numbers become strings, free-text enums are normalized) and strict only
 * about what the stage cannot do without, such as a resume's name.
 *
 * Usage:
 *   const result = StructuredResumeSchema.safeParse(document);
 *   if (!result.success) throw new ValidationError(...)
 */

import { z } from 'zod';
import type {
  CoverLetter,
  EducationEntry,
  EducationType,
  Experience,
  ExperienceDraft,
  GapImportance,
  KeywordGap,
  MatchType,
  Project,
  ProjectDraft,
  SemanticMatch,
  SkillGroups,
  StructuredJob,
  StructuredResume,
} from './types.js';

// ─── Scalar coercion ─────────────────────────────────────────────────

function toText(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

function toTextList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.map(toText).filter(item => item.length > 0);
  }
  const single = toText(value);
  return single ? [single] : [];
}

const text = z.unknown().transform(toText);
const nullableText = z.unknown().transform(value => toText(value) || null);
const textList = z.unknown().transform(toTextList);
const requiredText = (field: string) =>
  text.refine(value => value.length > 0, { message: `${field} is required` });

// ─── Skills ──────────────────────────────────────────────────────────

export const GENERAL_SKILLS_CATEGORY = 'General';

/**
 * Skills arrive either as a flat list or as a category mapping. Both are
 * normalized here into the mapping shape so nothing downstream branches on it.
 */
export function normalizeSkills(raw: unknown): SkillGroups {
  if (Array.isArray(raw)) {
    const skills = toTextList(raw);
    return skills.length > 0 ? { [GENERAL_SKILLS_CATEGORY]: skills } : {};
  }
  if (raw !== null && typeof raw === 'object') {
    const groups: SkillGroups = {};
    for (const [category, skills] of Object.entries(raw)) {
      const name = category.trim();
      const list = toTextList(skills);
      if (name && list.length > 0) groups[name] = list;
    }
    return groups;
  }
  return {};
}

export function flattenSkills(groups: SkillGroups): string[] {
  return Object.values(groups).flat();
}

export const SkillGroupsSchema: z.ZodType<SkillGroups, z.ZodTypeDef, unknown> =
  z.unknown().transform(normalizeSkills);

// ─── Free-text enums ─────────────────────────────────────────────────

export function normalizeEntryType(raw: unknown): EducationType {
  const s = toText(raw).toLowerCase();
  if (/cert/.test(s)) return 'certification';
  if (/boot\s*-?\s*camp/.test(s)) return 'bootcamp';
  return 'degree';
}

/**
 * Maps labels such as "Exact Match" or "TRANSFERABLE_SKILL" onto a match
 * type. Unrecognized labels fall back to the score bracket.
 */
export function normalizeMatchType(raw: unknown, score: number): MatchType {
  const s = toText(raw).toLowerCase();
  if (/exact/.test(s)) return 'exact';
  if (/transfer/.test(s)) return 'transferable';
  if (/semantic|similar|equivalent/.test(s)) return 'semantic';
  if (score >= 0.95) return 'exact';
  if (score >= 0.7) return 'semantic';
  return 'transferable';
}

export function normalizeImportance(raw: unknown): GapImportance {
  const s = toText(raw).toLowerCase();
  if (/high|critical|required|must/.test(s)) return 'high';
  if (/low|minor|optional/.test(s)) return 'low';
  return 'medium';
}

export function clampScore(raw: unknown): number {
  const n = typeof raw === 'number' ? raw : Number.parseFloat(toText(raw));
  if (!Number.isFinite(n)) return 0;
  return Math.min(1, Math.max(0, n));
}

// ─── Structuring ─────────────────────────────────────────────────────

export const ExperienceSchema: z.ZodType<Experience, z.ZodTypeDef, unknown> = z.object({
  company: text,
  role: z.unknown(),
  title: z.unknown(),
  duration: text,
  description: textList,
}).transform(e => ({
  company: e.company,
  role: toText(e.role) || toText(e.title),
  duration: e.duration,
  description: e.description,
}));

export const ProjectSchema: z.ZodType<Project, z.ZodTypeDef, unknown> = z.object({
  name: requiredText('project name'),
  description: textList,
  tech_stack: textList,
  url: nullableText,
});

export const EducationEntrySchema: z.ZodType<EducationEntry, z.ZodTypeDef, unknown> = z.object({
  institution: text,
  degree: text,
  graduation_date: nullableText,
  entry_type: z.unknown().transform(normalizeEntryType),
});

// Entries that do not fit the entry schema are dropped, not fatal.
const listOf = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) =>
  z.unknown().transform((value): T[] => {
    if (!Array.isArray(value)) return [];
    return value.flatMap(item => {
      const parsed = schema.safeParse(item);
      return parsed.success ? [parsed.data] : [];
    });
  });

export const StructuredResumeSchema: z.ZodType<StructuredResume, z.ZodTypeDef, unknown> = z.object({
  name: requiredText('name'),
  email: nullableText,
  phone: nullableText,
  location: nullableText,
  links: textList,
  skills: SkillGroupsSchema,
  work_history: listOf(ExperienceSchema),
  projects: listOf(ProjectSchema),
  education: listOf(EducationEntrySchema),
});

export const StructuredJobSchema: z.ZodType<StructuredJob, z.ZodTypeDef, unknown> = z.object({
  title: requiredText('title'),
  required_skills: textList,
  responsibilities: textList,
});

// ─── Analysis ────────────────────────────────────────────────────────

export const SemanticMatchSchema: z.ZodType<SemanticMatch, z.ZodTypeDef, unknown> = z.object({
  resume_item: text,
  job_requirement: text,
  match_score: z.unknown().transform(clampScore),
  reasoning: text,
  match_type: z.unknown(),
}).transform(m => ({
  resume_item: m.resume_item,
  job_requirement: m.job_requirement,
  match_score: m.match_score,
  reasoning: m.reasoning,
  match_type: normalizeMatchType(m.match_type, m.match_score),
}));

export const KeywordGapSchema: z.ZodType<KeywordGap, z.ZodTypeDef, unknown> = z.object({
  missing_keyword: requiredText('missing_keyword'),
  importance: z.unknown().transform(normalizeImportance),
  context_in_job: nullableText,
  suggested_section: text.transform(s => s || 'skills'),
  integration_suggestion: text,
});

// ─── Tailoring ───────────────────────────────────────────────────────

// `relevant` defaults to true: only an explicit false drops an entry.
const relevance = z.unknown().transform(value => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return !/^(false|no|irrelevant)$/i.test(value.trim());
  return true;
});

export const ExperienceDraftSchema: z.ZodType<ExperienceDraft, z.ZodTypeDef, unknown> = z.object({
  relevant: relevance,
  tailored_bullet_points: textList,
});

export const ProjectDraftSchema: z.ZodType<ProjectDraft, z.ZodTypeDef, unknown> = z.object({
  relevant: relevance,
  tailored_bullet_points: textList,
  tech_stack: textList,
});

// ─── Cover letter ────────────────────────────────────────────────────

export const CoverLetterSchema: z.ZodType<CoverLetter, z.ZodTypeDef, unknown> = z.object({
  greeting: text.transform(s => s || 'Dear Hiring Manager,'),
  opening_paragraph: requiredText('opening_paragraph'),
  body_paragraphs: textList,
  closing_paragraph: text,
  sign_off: text.transform(s => s || 'Sincerely,'),
});

/** Zod issues as `path: message` lines for ValidationError details. */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}
