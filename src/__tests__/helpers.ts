import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import pino from 'pino';
import type { CompletionPort } from '../lib/completion.js';
import { MemoryContentCache, type ContentCache } from '../lib/content-cache.js';
import type { JsonValue } from '../lib/json-repair.js';
import type { ChatParams, ChatResponse, LLMProvider, StreamEvent } from '../lib/llm-provider.js';
import type { StageContext } from '../pipeline/stage-runner.js';
import type { AnalysisResult, Experience, Project, StructuredJob, StructuredResume } from '../pipeline/types.js';

export const silentLogger = pino({ level: 'silent' });

// ─── Fakes ────────────────────────────────────────────────────────────────────

export type Responder = (prompt: string, description: string) => JsonValue | Error;

/** CompletionPort that answers from a responder and records every call. */
export class FakeCompletion implements CompletionPort {
  readonly calls: { prompt: string; description: string }[] = [];

  constructor(private readonly respond: Responder) {}

  async complete(prompt: string, description: string): Promise<JsonValue> {
    this.calls.push({ prompt, description });
    const answer = this.respond(prompt, description);
    if (answer instanceof Error) throw answer;
    return answer;
  }

  callsFor(prefix: string): number {
    return this.calls.filter(c => c.description.startsWith(prefix)).length;
  }
}

/** Answers by the first description prefix in `routes` that matches. */
export function routeByDescription(routes: Record<string, JsonValue | Error>): Responder {
  return (_prompt, description) => {
    for (const [prefix, answer] of Object.entries(routes)) {
      if (description.startsWith(prefix)) return answer;
    }
    return new Error(`No fake response for "${description}"`);
  };
}

/** LLMProvider whose chat reply and stream chunks are fixed up front. */
export class FakeProvider implements LLMProvider {
  readonly name = 'fake';
  readonly chatCalls: ChatParams[] = [];
  readonly streamCalls: ChatParams[] = [];

  constructor(
    private readonly reply: { text?: string; chunks?: string[]; error?: Error } = {},
  ) {}

  async chat(params: ChatParams): Promise<ChatResponse> {
    this.chatCalls.push(params);
    if (this.reply.error) throw this.reply.error;
    return { text: this.reply.text ?? '', usage: { input_tokens: 10, output_tokens: 20 } };
  }

  async *stream(params: ChatParams): AsyncGenerator<StreamEvent> {
    this.streamCalls.push(params);
    for (const chunk of this.reply.chunks ?? []) {
      yield { type: 'text', text: chunk };
    }
    if (this.reply.error) throw this.reply.error;
    yield { type: 'done', usage: { input_tokens: 5, output_tokens: 7 } };
  }
}

export function makeContext(
  completion: CompletionPort,
  cache: ContentCache = new MemoryContentCache(),
): StageContext {
  return { completion, cache, logger: silentLogger };
}

export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(tmpdir(), 'resume-tailor-'));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

// ─── Fixture Factories ────────────────────────────────────────────────────────

export function makeExperience(overrides: Partial<Experience> = {}): Experience {
  return {
    company: 'Example Co',
    role: 'Software Engineer',
    duration: '2021 - Present',
    description: ['Built the billing service', 'Maintained CI pipelines'],
    ...overrides,
  };
}

export function makeProject(overrides: Partial<Project> = {}): Project {
  return {
    name: 'Trail Planner',
    description: ['Offline route planner'],
    tech_stack: ['React Native', 'SQLite'],
    url: 'github.com/example/trail-planner',
    ...overrides,
  };
}

export function makeResume(overrides: Partial<StructuredResume> = {}): StructuredResume {
  return {
    name: 'Jane Smith',
    email: 'jane@example.com',
    phone: null,
    location: 'Denver, CO',
    links: [],
    skills: { Languages: ['TypeScript', 'SQL'], Tools: ['Docker'] },
    work_history: [
      makeExperience(),
      makeExperience({ company: 'Older Co', role: 'Junior Developer', duration: '2019 - 2021' }),
    ],
    projects: [makeProject()],
    education: [
      { institution: 'State University', degree: 'B.S. Computer Science', graduation_date: '2019', entry_type: 'degree' },
      { institution: 'Cloud Academy', degree: 'Cloud Practitioner', graduation_date: null, entry_type: 'certification' },
    ],
    ...overrides,
  };
}

export function makeJob(overrides: Partial<StructuredJob> = {}): StructuredJob {
  return {
    title: 'Backend Engineer',
    required_skills: ['TypeScript', 'PostgreSQL', 'Kubernetes', 'Terraform'],
    responsibilities: ['Build APIs', 'Operate services', 'Review code', 'Mentor', 'Write docs', 'On-call'],
    ...overrides,
  };
}

export function makeAnalysis(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return {
    matches: [],
    gaps: [],
    overall_alignment_score: 0,
    strengths: [],
    recommendations: [],
    ...overrides,
  };
}
