/**
 * Entities produced by the pipeline stages.
 *
 * Every entity is immutable once a stage returns it; a later stage produces a
 * new value instead of editing an earlier one. Field names follow the JSON
 * documents exchanged with the provider and stored in the cache.
 */

/** Category name → ordered skills. Always a mapping, never a flat list. */
export type SkillGroups = Record<string, string[]>;

// ─── Structuring ─────────────────────────────────────────────────────

export interface Experience {
  company: string;
  role: string;
  duration: string;
  description: string[];
}

export interface Project {
  name: string;
  description: string[];
  tech_stack: string[];
  url: string | null;
}

export type EducationType = 'degree' | 'certification' | 'bootcamp';

export interface EducationEntry {
  institution: string;
  degree: string;
  graduation_date: string | null;
  entry_type: EducationType;
}

export interface StructuredResume {
  name: string;
  email: string | null;
  phone: string | null;
  location: string | null;
  links: string[];
  skills: SkillGroups;
  /** Most recent first. */
  work_history: Experience[];
  projects: Project[];
  education: EducationEntry[];
}

export interface StructuredJob {
  title: string;
  required_skills: string[];
  responsibilities: string[];
}

// ─── Analysis ────────────────────────────────────────────────────────

export type MatchType = 'exact' | 'semantic' | 'transferable';

export interface SemanticMatch {
  resume_item: string;
  job_requirement: string;
  /** 0..1; exact ≈ 1.0, semantic ≈ 0.7–0.9, transferable ≈ 0.5–0.7 (guideline only) */
  match_score: number;
  reasoning: string;
  match_type: MatchType;
}

export type GapImportance = 'high' | 'medium' | 'low';

export interface KeywordGap {
  missing_keyword: string;
  importance: GapImportance;
  context_in_job: string | null;
  suggested_section: string;
  integration_suggestion: string;
}

export interface AnalysisResult {
  matches: SemanticMatch[];
  gaps: KeywordGap[];
  overall_alignment_score: number;
  strengths: string[];
  recommendations: string[];
}

// ─── Tailoring ───────────────────────────────────────────────────────

export interface TailoredExperience {
  company: string;
  role: string;
  duration: string;
  tailored_bullet_points: string[];
}

export interface TailoredProject {
  name: string;
  tailored_bullet_points: string[];
  tech_stack: string[];
  url: string | null;
}

export interface TailoredResume {
  tailored_work_history: TailoredExperience[];
  updated_skills: SkillGroups;
  tailored_projects: TailoredProject[];
  tailored_education: EducationEntry[];
}

/** Generation document cached by the experience tailoring stage. */
export interface ExperienceDraft {
  relevant: boolean;
  tailored_bullet_points: string[];
}

/** Generation document cached by the project tailoring stage. */
export interface ProjectDraft {
  relevant: boolean;
  tailored_bullet_points: string[];
  tech_stack: string[];
}

// ─── Cover letter ────────────────────────────────────────────────────

export interface CoverLetter {
  greeting: string;
  opening_paragraph: string;
  body_paragraphs: string[];
  closing_paragraph: string;
  sign_off: string;
}

// ─── Orchestration ───────────────────────────────────────────────────

export type PipelineStage =
  | 'structure_resume'
  | 'structure_job'
  | 'analysis'
  | 'tailoring'
  | 'cover_letter';

export interface PipelineInput {
  resume_text: string;
  job_text: string;
}

export interface PipelineResult {
  structured_resume: StructuredResume;
  structured_job: StructuredJob;
  analysis: AnalysisResult;
  tailored_resume: TailoredResume;
  cover_letter: CoverLetter;
  usage: { input_tokens: number; output_tokens: number; calls: number };
}

export type PipelineEvent =
  | { type: 'stage_start'; stage: PipelineStage; message: string }
  | { type: 'stage_complete'; stage: PipelineStage; message: string; duration_ms: number }
  | { type: 'pipeline_complete'; duration_ms: number }
  | { type: 'pipeline_error'; stage: PipelineStage; error: string; code: string };
