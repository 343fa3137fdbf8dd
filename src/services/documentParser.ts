import path from 'path';
import mammoth from 'mammoth';
import type { UploadedDraft } from '../types';
import { HttpError } from '../utils/httpError';

// Every line boundary a text editor may have left in a draft
const LINE_BOUNDARY = /\r\n|[\n\r\v\f\x1c\x1d\x1e\x85\u2028\u2029]/;
const PARAGRAPH_SEPARATOR = '\n\n';
const REPLACEMENT_CHAR = '\uFFFD';
const ENCODED_REPLACEMENT_CHAR = Buffer.from([0xef, 0xbf, 0xbd]);

export const SUPPORTED_EXTENSIONS: readonly string[] = ['.txt', '.docx'];

export async function parseDraft(draft: UploadedDraft): Promise<string[]> {
  const ext = path.extname(draft.originalname).toLowerCase();

  switch (ext) {
    case '.txt':
      return parseTxtBuffer(draft.buffer);
    case '.docx':
      return await parseDocxBuffer(draft.buffer);
    default:
      throw new HttpError(400, 'Unsupported file (use .txt or .docx)');
  }
}

/**
 * A leading BOM is kept; the classifier strips it.
 */
export function parseTxtBuffer(buffer: Buffer): string[] {
  return splitLines(decodeUtf8(buffer));
}

/**
 * Decode UTF-8, dropping byte sequences that do not decode. A U+FFFD that
 * was itself encoded in the draft survives.
 */
export function decodeUtf8(buffer: Buffer): string {
  const segments: string[] = [];
  let start = 0;
  let index = buffer.indexOf(ENCODED_REPLACEMENT_CHAR, start);
  while (index !== -1) {
    segments.push(decodeDroppingInvalid(buffer.subarray(start, index)));
    start = index + ENCODED_REPLACEMENT_CHAR.length;
    index = buffer.indexOf(ENCODED_REPLACEMENT_CHAR, start);
  }
  segments.push(decodeDroppingInvalid(buffer.subarray(start)));
  return segments.join(REPLACEMENT_CHAR);
}

// Only called on segments without an encoded U+FFFD, so every replacement marks bad input
function decodeDroppingInvalid(segment: Buffer): string {
  return segment.toString('utf-8').split(REPLACEMENT_CHAR).join('');
}

export function splitLines(content: string): string[] {
  if (!content) {
    return [];
  }
  const lines = content.split(LINE_BOUNDARY);
  // A terminated last line does not start another one
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Plain text of each paragraph of a Word document; its formatting is discarded.
 */
export async function parseDocxBuffer(buffer: Buffer): Promise<string[]> {
  let result: { value: string; messages: Array<{ type: string; message: string }> };
  try {
    result = await mammoth.extractRawText({ buffer });
  } catch (error) {
    throw new HttpError(422, `Failed to parse Word document: ${error instanceof Error ? error.message : error}`);
  }

  if (result.messages && result.messages.length > 0) {
    console.warn('Mammoth warnings:', result.messages);
  }

  // mammoth terminates every paragraph with a blank line
  const paragraphs = result.value.split(PARAGRAPH_SEPARATOR);
  if (paragraphs[paragraphs.length - 1] === '') {
    paragraphs.pop();
  }
  return paragraphs;
}
