import { GenerationFailure } from '../errors.js';

const NUMBERING = /^\d+\s*[.):-]?\s*/;

/**
 * Pull the messages out of a numbered-list completion.
 * Only lines that start with a digit count; the numbering is stripped.
 */
export function extractNumberedMessages(text: string): string[] {
  return text
    .split(/(?:\r?\n)+/)
    .map(line => line.trim())
    .filter(line => /^\d/.test(line))
    .map(line => line.replace(NUMBERING, '').trim())
    .filter(Boolean);
}

/**
 * Extract exactly `count` messages, or fail so the caller can retry.
 */
export function toMessages(text: string, count: number): string[] {
  const messages = extractNumberedMessages(text);
  if (messages.length !== count) {
    throw new GenerationFailure(
      `Expected ${count} numbered message(s), got ${messages.length}`,
    );
  }
  return messages;
}
