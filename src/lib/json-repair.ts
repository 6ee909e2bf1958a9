import { MalformedResponseError } from './errors.js';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * One named, pure text transformation. Steps run in the order they appear in
 * REPAIR_STEPS, each on the previous step's output.
 */
export interface RepairStep {
  name: string;
  apply: (text: string) => string;
}

// ─── Step 1: fenced code block ───────────────────────────────────────

const FENCED = /```[\w-]*[ \t]*\r?\n([\s\S]*?)\r?\n?[ \t]*```/;
const OPENING_FENCE = /```[\w-]*[ \t]*\r?\n/;

/**
 * Takes the body of the first fenced block, wherever it sits in the text.
 * Text that already starts as JSON is left alone, fences inside its strings
 * included.
 */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  if (trimmed.startsWith('{') || trimmed.startsWith('[')) return trimmed;
  const match = FENCED.exec(trimmed);
  if (match) return match[1].trim();
  // Truncated output: opening fence without a closing one
  const opening = OPENING_FENCE.exec(trimmed);
  if (opening) return trimmed.slice(opening.index + opening[0].length).trim();
  return trimmed;
}

// ─── Step 2: prose around the document ───────────────────────────────

/**
 * Cuts the text down to the span from the first `{` or `[` to the last
 * matching closer. Text without either is returned unchanged.
 */
export function extractJsonBody(text: string): string {
  const firstBrace = text.indexOf('{');
  const firstBracket = text.indexOf('[');
  let start = -1;
  let closeChar = '';

  if (firstBrace >= 0 && (firstBracket < 0 || firstBrace < firstBracket)) {
    start = firstBrace;
    closeChar = '}';
  } else if (firstBracket >= 0) {
    start = firstBracket;
    closeChar = ']';
  }
  if (start < 0) return text;

  const lastClose = text.lastIndexOf(closeChar);
  // Truncated output keeps its tail so the error points at the real end
  if (lastClose <= start) return text.slice(start);
  return text.slice(start, lastClose + 1);
}

// ─── Step 3: raw control characters inside strings ───────────────────

const CONTROL_ESCAPES = new Map<string, string>([
  ['\n', '\\n'],
  ['\r', '\\r'],
  ['\t', '\\t'],
  ['\b', '\\b'],
  ['\f', '\\f'],
]);

export function escapeControlChars(text: string): string {
  let out = '';
  let inString = false;
  let escaped = false;

  for (const ch of text) {
    if (!inString) {
      if (ch === '"') inString = true;
      out += ch;
      continue;
    }
    if (escaped) {
      escaped = false;
      out += ch;
    } else if (ch === '\\') {
      escaped = true;
      out += ch;
    } else if (ch === '"') {
      inString = false;
      out += ch;
    } else {
      out += CONTROL_ESCAPES.get(ch) ?? ch;
    }
  }
  return out;
}

// ─── Step 4: arrays emitted as strings ───────────────────────────────

// A member value (after `:`) that is a string literal starting with `[` and ending with `]`.
const STRINGIFIED_ARRAY = /(:\s*)"(\[(?:[^"\\]|\\.)*\])"/g;

type ParseAttempt = { ok: true; value: unknown } | { ok: false; error: unknown };

function tryParse(text: string): ParseAttempt {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error };
  }
}

function listFromBracketedText(literalBody: string): unknown[] | null {
  const unescaped = tryParse(`"${literalBody}"`);
  if (!unescaped.ok || typeof unescaped.value !== 'string') return null;
  const inner = unescaped.value;

  const asJson = tryParse(inner);
  if (asJson.ok) return Array.isArray(asJson.value) ? asJson.value : null;

  // Single-quoted list such as `['a', 'b']`. Unquoted bracketed text like
  // `[Hiring Manager, Acme]` is prose and stays a string.
  const content = inner.slice(1, -1).trim();
  if (!content) return null;
  const items = content.split(',').map(item => item.trim());
  if (!items.every(item => /^'[^']*'$/.test(item))) return null;
  return items.map(item => item.slice(1, -1).trim()).filter(item => item.length > 0);
}

export function unwrapStringifiedArrays(text: string): string {
  return text.replace(STRINGIFIED_ARRAY, (match: string, prefix: string, body: string) => {
    const items = listFromBracketedText(body);
    return items ? `${prefix}${JSON.stringify(items)}` : match;
  });
}

// ─── Step 5: trailing commas ─────────────────────────────────────────

export function removeTrailingCommas(text: string): string {
  let out = '';
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      out += ch;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === ',') {
      let j = i + 1;
      while (j < text.length && /\s/.test(text[j])) j++;
      if (text[j] === '}' || text[j] === ']') continue;
    }
    out += ch;
  }
  return out;
}

export const REPAIR_STEPS: readonly RepairStep[] = [
  { name: 'strip_code_fence', apply: stripCodeFence },
  { name: 'extract_json_body', apply: extractJsonBody },
  { name: 'escape_control_chars', apply: escapeControlChars },
  { name: 'unwrap_stringified_arrays', apply: unwrapStringifiedArrays },
  { name: 'remove_trailing_commas', apply: removeTrailingCommas },
];

// ─── Diagnostics ─────────────────────────────────────────────────────

const WHITESPACE = ' \t\n\r';
const NUMBER = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const SIMPLE_ESCAPES = '"\\/bfnrt';

/**
 * Recursive-descent JSON scanner that only reports where the input stops
 * being valid JSON. JSON.parse messages do not carry a position on every
 * Node version, so the location comes from here.
 */
class JsonScanner {
  private pos = 0;

  constructor(private readonly text: string) {}

  /** Offset of the first invalid character, or -1 for valid JSON. */
  scan(): number {
    this.skipWhitespace();
    if (!this.value()) return this.pos;
    this.skipWhitespace();
    return this.pos < this.text.length ? this.pos : -1;
  }

  private peek(): string {
    return this.pos < this.text.length ? this.text[this.pos] : '';
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && WHITESPACE.includes(this.text[this.pos])) this.pos++;
  }

  private value(): boolean {
    switch (this.peek()) {
      case '{': return this.object();
      case '[': return this.array();
      case '"': return this.string();
      case 't': return this.literal('true');
      case 'f': return this.literal('false');
      case 'n': return this.literal('null');
      default: return this.number();
    }
  }

  private object(): boolean {
    this.pos++;
    this.skipWhitespace();
    if (this.peek() === '}') {
      this.pos++;
      return true;
    }
    for (;;) {
      this.skipWhitespace();
      if (this.peek() !== '"' || !this.string()) return false;
      this.skipWhitespace();
      if (this.peek() !== ':') return false;
      this.pos++;
      this.skipWhitespace();
      if (!this.value()) return false;
      this.skipWhitespace();
      const next = this.peek();
      if (next === ',') {
        this.pos++;
        continue;
      }
      if (next === '}') {
        this.pos++;
        return true;
      }
      return false;
    }
  }

  private array(): boolean {
    this.pos++;
    this.skipWhitespace();
    if (this.peek() === ']') {
      this.pos++;
      return true;
    }
    for (;;) {
      this.skipWhitespace();
      if (!this.value()) return false;
      this.skipWhitespace();
      const next = this.peek();
      if (next === ',') {
        this.pos++;
        continue;
      }
      if (next === ']') {
        this.pos++;
        return true;
      }
      return false;
    }
  }

  private string(): boolean {
    this.pos++;
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === '"') {
        this.pos++;
        return true;
      }
      if (ch === '\\') {
        const next = this.text[this.pos + 1] ?? '';
        if (next !== '' && SIMPLE_ESCAPES.includes(next)) {
          this.pos += 2;
        } else if (next === 'u' && /^[0-9a-fA-F]{4}$/.test(this.text.slice(this.pos + 2, this.pos + 6))) {
          this.pos += 6;
        } else {
          this.pos++;
          return false;
        }
        continue;
      }
      if (ch.charCodeAt(0) < 0x20) return false;
      this.pos++;
    }
    return false;
  }

  private literal(word: string): boolean {
    if (!this.text.startsWith(word, this.pos)) return false;
    this.pos += word.length;
    return true;
  }

  private number(): boolean {
    NUMBER.lastIndex = this.pos;
    const match = NUMBER.exec(this.text);
    if (!match) return false;
    this.pos += match[0].length;
    return true;
  }
}

export function locateSyntaxError(text: string): number {
  return new JsonScanner(text).scan();
}

/** 1-based line and column of a character offset. */
export function lineColumnAt(text: string, offset: number): { line: number; column: number } {
  const before = text.slice(0, offset);
  const line = before.split('\n').length;
  const column = offset - (before.lastIndexOf('\n') + 1) + 1;
  return { line, column };
}

/**
 * Excerpt of up to `radius` lines around `line`, with a caret under `column`.
 */
export function excerptAround(text: string, line: number, column: number, radius = 3): string {
  const lines = text.split('\n');
  const first = Math.max(1, line - radius);
  const last = Math.min(lines.length, line + radius);
  const width = String(last).length;
  const out: string[] = [];

  for (let n = first; n <= last; n++) {
    const marker = n === line ? '>' : ' ';
    out.push(`${marker} ${String(n).padStart(width)} | ${lines[n - 1]}`);
    if (n === line) {
      out.push(`  ${' '.repeat(width)} | ${' '.repeat(Math.max(0, column - 1))}^`);
    }
  }
  return out.join('\n');
}

function malformed(message: string, text: string, parseError: unknown): MalformedResponseError {
  const located = locateSyntaxError(text);
  const offset = located >= 0 ? located : text.length;
  const { line, column } = lineColumnAt(text, offset);
  const reason = parseError instanceof Error ? parseError.message : String(parseError);
  return new MalformedResponseError(`${message}: ${reason}`, {
    raw: text,
    line,
    column,
    context: excerptAround(text, line, column),
  });
}

// ─── Public entry points ─────────────────────────────────────────────

export function applyRepairs(raw: string, steps: readonly RepairStep[] = REPAIR_STEPS): string {
  return steps.reduce((text, step) => step.apply(text), raw);
}

/**
 * Runs every repair step and returns text that is strict JSON.
 * Throws MalformedResponseError pointing at the first syntax error otherwise.
 * There is no retry here; re-running the stage is the caller's decision.
 */
export function repairResponse(raw: string): string {
  return repairAndParse(raw).text;
}

export function parseResponse(raw: string): JsonValue {
  return repairAndParse(raw).value;
}

/** Strict parse without repairs, with the same diagnostics on failure. */
export function parseStrict(text: string): JsonValue {
  if (!text.trim()) {
    throw malformed('Empty response', text, new Error('no content'));
  }
  try {
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch (err) {
    throw malformed('Response is not valid JSON', text, err);
  }
}

function repairAndParse(raw: string): { text: string; value: JsonValue } {
  const text = applyRepairs(raw);
  if (!text) {
    throw malformed('Empty response', text, new Error('no content'));
  }
  try {
    const value: JsonValue = JSON.parse(text);
    return { text, value };
  } catch (err) {
    throw malformed('Response could not be repaired into valid JSON', text, err);
  }
}
