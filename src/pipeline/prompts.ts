/**
 * Prompt builders for every pipeline stage. Each prompt ends by asking for a
 * single JSON object in a fixed shape; the stage schemas in ./schemas.ts are
 * written against these shapes.
 */

import { flattenSkills } from './schemas.js';
import type {
  AnalysisResult,
  Experience,
  KeywordGap,
  Project,
  SemanticMatch,
  SkillGroups,
  StructuredJob,
  StructuredResume,
} from './types.js';

const RESUME_TEXT_LIMIT = 30_000;
const JOB_TEXT_LIMIT = 20_000;

// ─── Formatting helpers ──────────────────────────────────────────────

export function bulletList(items: readonly string[]): string {
  return items.map(item => `- ${item}`).join('\n');
}

function formatMatches(matches: readonly SemanticMatch[]): string {
  if (matches.length === 0) return '- (none)';
  return matches
    .map(m => `- "${m.resume_item}" supports "${m.job_requirement}" (${m.match_type}, ${m.match_score.toFixed(2)})`)
    .join('\n');
}

function formatGaps(gaps: readonly KeywordGap[]): string {
  if (gaps.length === 0) return '- (none)';
  return gaps.map(g => `- "${g.missing_keyword}" is missing (${g.importance} importance)`).join('\n');
}

function formatWorkHistory(history: readonly Experience[]): string {
  return history
    .map(e => `- ${e.role} at ${e.company} (${e.duration}):\n${e.description.map(d => `    ${d}`).join('\n')}`)
    .join('\n');
}

// ─── Structuring ─────────────────────────────────────────────────────

const RESUME_SHAPE = `{
  "name": "Jane Smith",
  "email": "jane@example.com",
  "phone": "(555) 010-0000",
  "location": "Denver, CO",
  "links": ["github.com/example", "linkedin.com/in/example"],
  "skills": {
    "Languages": ["TypeScript", "SQL"],
    "Frameworks": ["React", "Express"],
    "Tools": ["Docker", "Git"]
  },
  "work_history": [
    {
      "company": "Example Co",
      "role": "Software Engineer",
      "duration": "2021 - Present",
      "description": ["Built the billing service used by 40 internal teams"]
    }
  ],
  "projects": [
    {
      "name": "Trail Planner",
      "description": ["Route planner with offline map tiles"],
      "tech_stack": ["React Native", "SQLite"],
      "url": "github.com/example/trail-planner"
    }
  ],
  "education": [
    {
      "institution": "State University",
      "degree": "B.S. Computer Science",
      "graduation_date": "2021",
      "entry_type": "degree"
    }
  ]
}`;

export function structureResumePrompt(rawText: string): string {
  return `You are a resume parser for software engineering resumes. Convert the resume text below into a single JSON object with exactly this shape:

${RESUME_SHAPE}

Rules:
- Every list field ("description", "tech_stack", "links", skill lists) MUST be a JSON array, never a string that looks like an array.
- "skills" MUST be an object grouped by category (Languages, Frameworks, Tools, Cloud, Databases, ...). Leave out soft skills and office software.
- Copy phone and email exactly as written; use null when absent. "location" is city and state, or null.
- Ignore any Summary or Objective section.
- "work_history" is ordered most recent first.
- "projects" is [] when the resume has no projects section.
- Each education entry's "entry_type" is one of "degree", "certification", "bootcamp".
- "links" holds GitHub, LinkedIn, portfolio or personal site URLs; [] when none.
- Return ONLY the JSON object, no markdown fences, no explanation.

---RESUME START---
${rawText.slice(0, RESUME_TEXT_LIMIT)}
---RESUME END---`;
}

export function structureJobPrompt(rawText: string): string {
  return `You are a job description parser. Convert the job posting below into a single JSON object with exactly this shape:

{
  "title": "Senior Backend Engineer",
  "required_skills": ["Go", "PostgreSQL", "Kubernetes"],
  "responsibilities": [
    "Design and operate payment APIs",
    "Mentor engineers on the platform team"
  ]
}

Rules:
- All list fields MUST be JSON arrays, never strings that look like arrays.
- "required_skills" are concrete skills, tools and technologies the posting asks for.
- "responsibilities" are the duties of the role, one per entry.
- Return ONLY the JSON object, no markdown fences, no explanation.

---JOB DESCRIPTION START---
${rawText.slice(0, JOB_TEXT_LIMIT)}
---JOB DESCRIPTION END---`;
}

// ─── Analysis ────────────────────────────────────────────────────────

export function semanticMatchPrompt(resume: StructuredResume, job: StructuredJob): string {
  const bullets = resume.work_history.flatMap(e => e.description).slice(0, 20);
  return `You are a technical recruiter mapping a candidate's resume onto a job's requirements.

RESUME SKILLS: ${JSON.stringify(flattenSkills(resume.skills))}
RESUME EXPERIENCE BULLETS: ${JSON.stringify(bullets)}

JOB REQUIRED SKILLS: ${JSON.stringify(job.required_skills)}
JOB RESPONSIBILITIES: ${JSON.stringify(job.responsibilities)}

Find the connections between resume items and job requirements:
- "exact": same term on both sides (score 1.0)
- "semantic": different words, same concept, e.g. "Team Captain" → "Leadership" (score 0.7–0.9)
- "transferable": related skill that carries over, e.g. "JavaScript" → "Frontend development" (score 0.5–0.7)

Only report genuine connections. Do not invent skills the resume does not show.

Return ONLY valid JSON:
{
  "matches": [
    {
      "resume_item": "Led a team of 5 developers",
      "job_requirement": "Leadership experience",
      "match_score": 0.85,
      "reasoning": "Leading developers directly demonstrates leadership",
      "match_type": "semantic"
    }
  ]
}`;
}

export function keywordGapPrompt(
  resume: StructuredResume,
  job: StructuredJob,
  coveredRequirements: readonly string[],
): string {
  const history = resume.work_history.slice(0, 15).map(e => e.description);
  return `You are an applicant tracking system (ATS) specialist. Find keywords from the job description that the resume is missing.

RESUME SKILLS: ${JSON.stringify(flattenSkills(resume.skills))}
RESUME WORK HISTORY: ${JSON.stringify(history)}

JOB REQUIRED SKILLS: ${JSON.stringify(job.required_skills)}
JOB RESPONSIBILITIES: ${JSON.stringify(job.responsibilities)}

ALREADY COVERED (do not report these): ${JSON.stringify(coveredRequirements)}

Rules:
- Only report keywords that appear in the job description.
- Skip anything already covered.
- importance: "high" for required skills, "medium" for nice-to-haves, "low" for passing mentions.
- suggested_section is "skills", "work_history" or "projects".
- Say concretely where and how the keyword could be worked in.

Return ONLY valid JSON:
{
  "gaps": [
    {
      "missing_keyword": "Terraform",
      "importance": "high",
      "context_in_job": "Experience managing infrastructure as code with Terraform",
      "suggested_section": "skills",
      "integration_suggestion": "Add Terraform under Tools if you have used it"
    }
  ]
}`;
}

// ─── Tailoring ───────────────────────────────────────────────────────

const BULLET_RULES = `- Each bullet follows "Accomplished [X] as measured by [Y], by doing [Z]".
- Each bullet carries a metric (%, $, time, users, volume). If the original has none, use a bracketed placeholder such as [~30% faster].
- Start with a strong verb (Engineered, Architected, Optimized, Automated, Migrated, Scaled). Never "Helped", "Assisted" or "Worked on".
- No soft-skill filler.
- Work in the job's keywords where they are truthful.
- Reframe and quantify what is there; do not invent new experience.`;

export function tailorExperiencePrompt(
  experience: Experience,
  analysis: AnalysisResult,
  job: StructuredJob,
  forceKeep: boolean,
): string {
  const relevanceRule = forceKeep
    ? `- This experience MUST be kept. Set "relevant" to true and write 2-3 bullets that surface whatever in it supports the target job.`
    : `- RELEVANCE CHECK: if this experience has nothing to do with the target job, return {"relevant": false, "tailored_bullet_points": []}. If it is only partly relevant, keep 1-2 bullets.`;

  return `You are a resume coach for software engineers. Rewrite the bullet points of one work experience for the target job.

ROLE: ${experience.role} at ${experience.company} (${experience.duration})

ORIGINAL BULLETS:
${bulletList(experience.description)}

TARGET JOB KEYWORDS: ${job.required_skills.slice(0, 15).join(', ')}
TARGET JOB RESPONSIBILITIES:
${bulletList(job.responsibilities.slice(0, 10))}

MATCHES FOUND:
${formatMatches(analysis.matches)}

KEYWORD GAPS:
${formatGaps(analysis.gaps)}

Rules:
${relevanceRule}
${BULLET_RULES}

Return ONLY valid JSON:
{
  "relevant": true,
  "tailored_bullet_points": [
    "Cut API p95 latency by 40% (200ms to 120ms) by adding a Redis read-through cache"
  ]
}`;
}

export function tailorProjectPrompt(project: Project, job: StructuredJob): string {
  return `You are a resume coach for software engineers. Rewrite the bullet points of one personal or side project for the target job.

PROJECT: ${project.name}
TECH STACK: ${project.tech_stack.join(', ') || 'N/A'}
URL: ${project.url ?? 'N/A'}

ORIGINAL BULLETS:
${bulletList(project.description)}

TARGET JOB KEYWORDS: ${job.required_skills.slice(0, 15).join(', ')}

Rules:
- RELEVANCE CHECK: if this project has nothing to do with the target job, return {"relevant": false, "tailored_bullet_points": [], "tech_stack": []}.
- Put the technologies that overlap with the job first in "tech_stack".
${BULLET_RULES}

Return ONLY valid JSON:
{
  "relevant": true,
  "tailored_bullet_points": [
    "Built an offline-first route planner serving [~300 weekly users] with React Native and SQLite"
  ],
  "tech_stack": ["React Native", "SQLite"]
}`;
}

export function tailorSkillsPrompt(
  skills: SkillGroups,
  job: StructuredJob,
  gapKeywords: readonly string[],
): string {
  return `You are a resume coach for software engineers. Curate the candidate's skills section for the target job.

CURRENT SKILLS BY CATEGORY:
${JSON.stringify(skills, null, 2)}

GAP KEYWORDS TO ADD: ${JSON.stringify(gapKeywords)}

TARGET JOB REQUIRED SKILLS: ${JSON.stringify(job.required_skills)}
TARGET JOB RESPONSIBILITIES: ${job.responsibilities.slice(0, 8).join(', ')}

Rules:
- Keep only skills relevant or closely related to the target job.
- Put each gap keyword into the most fitting category.
- Use clean categories (Languages, Frameworks, Tools, Cloud/DevOps, Databases). Rename or merge as needed; drop empty ones.
- Order skills within a category by relevance to the job.
- Do not add skills the candidate does not have, apart from the gap keywords.

Return ONLY a JSON object whose keys are category names and whose values are arrays of skills:
{
  "Languages": ["TypeScript", "SQL"],
  "Tools & Cloud": ["Docker", "AWS"]
}`;
}

// ─── Cover letter ────────────────────────────────────────────────────

export function coverLetterPrompt(
  resume: StructuredResume,
  job: StructuredJob,
  analysis: AnalysisResult,
): string {
  return `You are a career coach. Write a concise, professional cover letter for this candidate and job.

CANDIDATE NAME: ${resume.name}
CANDIDATE SKILLS: ${JSON.stringify(flattenSkills(resume.skills))}
CANDIDATE WORK HISTORY:
${formatWorkHistory(resume.work_history)}

JOB TITLE: ${job.title}
JOB REQUIRED SKILLS: ${JSON.stringify(job.required_skills)}
JOB RESPONSIBILITIES: ${JSON.stringify(job.responsibilities)}

STRENGTHS FROM ANALYSIS:
${bulletList(analysis.strengths)}

TOP MATCHES:
${formatMatches(analysis.matches.slice(0, 5))}

Rules:
- Every claim must come from the candidate's actual experience above. Do not invent achievements.
- One opening paragraph, two body paragraphs, one closing paragraph.
- The body paragraphs connect specific experience to the job's requirements.
- Professional but personable tone.

Return ONLY valid JSON:
{
  "greeting": "Dear Hiring Manager,",
  "opening_paragraph": "...",
  "body_paragraphs": ["...", "..."],
  "closing_paragraph": "...",
  "sign_off": "Sincerely,"
}`;
}
