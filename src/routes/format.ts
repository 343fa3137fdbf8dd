import { Router, Request, Response, NextFunction } from 'express';
import { draftUpload } from '../middleware/upload';
import { formatDraft, styleDraft, type FormatRequest } from '../services/formatter';
import { DOCX_MIME_TYPE } from '../services/docxGenerator';
import type { UsageReport } from '../types';
import { HttpError } from '../utils/httpError';

const router = Router();

export const USAGE_REPORT_HEADER = 'X-Delta-Report';

// multer yields an array for a repeated field and an object for bracketed names
export interface FormatFields {
  style_map_json?: unknown;
}

interface PreviewResponse {
  success: boolean;
  paragraphs: Array<{ styleName: string; text: string }>;
  report: UsageReport;
}

export function toFormatRequest(req: { file?: Express.Multer.File; body?: FormatFields }): FormatRequest {
  if (!req.file) {
    throw new HttpError(400, 'No draft uploaded (expected multipart field "draft")');
  }
  const styleMapJson = req.body?.style_map_json;
  if (styleMapJson !== undefined && typeof styleMapJson !== 'string') {
    throw new HttpError(400, 'Invalid style_map_json JSON', 'style_map_json must be a single text field');
  }
  return {
    draft: { originalname: req.file.originalname, buffer: req.file.buffer },
    styleMapJson
  };
}

/**
 * JSON for a response header: anything outside printable ASCII is \u-escaped.
 */
export function toHeaderJson(report: UsageReport): string {
  return JSON.stringify(report).replace(
    /[\u007f-\uffff]/g,
    char => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

export function outputFilename(originalname: string): string {
  const base = originalname.replace(/\.[^.]+$/, '').replace(/[^a-z0-9]/gi, '_') || 'document';
  return `${base}_styled.docx`;
}

router.post('/',
  draftUpload.single('draft'),
  async (req: Request<{}, unknown, FormatFields>, res: Response, next: NextFunction) => {
    try {
      const request = toFormatRequest(req);
      const result = await formatDraft(request);

      res.setHeader('Content-Type', DOCX_MIME_TYPE);
      res.setHeader('Content-Disposition', `attachment; filename="${outputFilename(request.draft.originalname)}"`);
      res.setHeader(USAGE_REPORT_HEADER, toHeaderJson(result.report));
      res.setHeader('X-Request-Id', result.requestId);
      res.send(result.buffer);
    } catch (error) {
      next(error);
    }
  }
);

router.post('/preview',
  draftUpload.single('draft'),
  async (req: Request<{}, PreviewResponse, FormatFields>, res: Response<PreviewResponse>, next: NextFunction) => {
    try {
      const { paragraphs, report } = await styleDraft(toFormatRequest(req));

      res.json({
        success: true,
        paragraphs: paragraphs.map(paragraph => ({
          styleName: paragraph.styleName,
          text: paragraph.runs.map(run => run.text).join('')
        })),
        report
      });
    } catch (error) {
      next(error);
    }
  }
);

export default router;
