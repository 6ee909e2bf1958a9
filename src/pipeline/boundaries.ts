/**
 * Edges of the system that stay outside the core: turning uploaded
 * documents into text, and turning the final documents into rendered
 * output. The pipeline depends on neither succeeding.
 */

import type { CoverLetter, StructuredResume, TailoredResume } from './types.js';

export interface ExtractedDocument {
  raw_text: string;
  page_count: number;
  metadata: Record<string, string>;
}

export interface DocumentExtractor {
  extract(bytes: Uint8Array, fileName?: string): Promise<ExtractedDocument>;
}

/**
 * UTF-8 text documents. A form feed starts a new page, the way text
 * exported from paginated sources marks page breaks.
 */
export class PlainTextExtractor implements DocumentExtractor {
  private readonly decoder = new TextDecoder('utf-8');

  async extract(bytes: Uint8Array, fileName?: string): Promise<ExtractedDocument> {
    const text = this.decoder.decode(bytes).replace(/\r\n/g, '\n');
    const pages = text.split('\f');
    return {
      raw_text: pages.map(page => page.trim()).filter(Boolean).join('\n\n'),
      page_count: pages.length,
      metadata: fileName ? { file_name: fileName, format: 'text' } : { format: 'text' },
    };
  }
}

/** Plain documents handed to a renderer. */
export interface RenderPayload {
  resume: StructuredResume;
  tailored_resume: TailoredResume;
  cover_letter: CoverLetter;
}

export interface RenderedDocuments {
  resume: Uint8Array;
  cover_letter: Uint8Array;
}

export type ResumeRenderer = (payload: RenderPayload) => Promise<RenderedDocuments>;
