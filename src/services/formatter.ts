import { v4 as uuidv4 } from 'uuid';
import type { StyledDocument, StyledParagraph, UploadedDraft, UsageReport } from '../types';
import { buildStyledDocument } from './documentBuilder';
import { parseDraft } from './documentParser';
import { generateDocx } from './docxGenerator';
import { resolveStyleRuleTable } from './styleRules';

export interface FormatRequest {
  draft: UploadedDraft;
  styleMapJson?: string | null;
}

export interface FormatResult {
  requestId: string;
  buffer: Buffer;
  report: UsageReport;
  paragraphs: StyledParagraph[];
}

/**
 * Classify and style a draft without serializing it.
 */
export async function styleDraft(request: FormatRequest): Promise<StyledDocument> {
  // The style map is validated before the draft is decoded
  const rules = resolveStyleRuleTable(request.styleMapJson);
  const lines = await parseDraft(request.draft);
  return buildStyledDocument(lines, rules);
}

export async function formatDraft(request: FormatRequest): Promise<FormatResult> {
  const requestId = uuidv4();
  const started = Date.now();

  const { paragraphs, report } = await styleDraft(request);
  const buffer = await generateDocx(paragraphs, { title: request.draft.originalname });

  console.log(
    `Formatted ${request.draft.originalname} [${requestId}]: ${paragraphs.length} paragraphs in ${Date.now() - started}ms`,
    report
  );

  return { requestId, buffer, report, paragraphs };
}
