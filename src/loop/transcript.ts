/**
 * Reads the most recent agent output out of a host session transcript
 * (JSONL, one message per line).
 */

import fs from 'node:fs';
import { z } from 'zod';

const ContentBlockSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

const TranscriptLineSchema = z
  .object({
    type: z.string().optional(),
    message: z
      .object({
        role: z.string().optional(),
        content: z.union([z.string(), z.array(ContentBlockSchema)]),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

type TranscriptLine = z.infer<typeof TranscriptLineSchema>;

function assistantText(line: TranscriptLine): string | null {
  const isAssistant = line.type === 'assistant' || line.message?.role === 'assistant';
  if (!isAssistant || !line.message) return null;

  const { content } = line.message;
  if (typeof content === 'string') return content;

  const texts = content.flatMap((block) => (block.type === 'text' && block.text !== undefined ? [block.text] : []));
  return texts.length > 0 ? texts.join('\n') : null;
}

/**
 * Text of the last assistant message that has any. Lines that are not JSON
 * or not messages are skipped.
 */
export function extractLastAssistantText(jsonl: string): string | null {
  const lines = jsonl.split('\n');
  for (let i = lines.length - 1; i >= 0; i--) {
    const raw = lines[i].trim();
    if (!raw) continue;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      continue;
    }

    const parsed = TranscriptLineSchema.safeParse(json);
    if (!parsed.success) continue;

    const text = assistantText(parsed.data);
    if (text !== null) return text;
  }
  return null;
}

/** Throws when the transcript cannot be read. */
export function readLastAssistantText(transcriptPath: string): string | null {
  return extractLastAssistantText(fs.readFileSync(transcriptPath, 'utf-8'));
}
