import { Router, Request, Response, NextFunction } from 'express';
import { referenceUpload } from '../middleware/upload';
import { DocxStyleExtractor } from '../services/docxStyleExtractor';
import { DEFAULT_STYLE_RULES } from '../services/styleRules';
import { HttpError } from '../utils/httpError';

const router = Router();

router.get('/', (_req: Request, res: Response) => {
  res.json({ styles: DEFAULT_STYLE_RULES });
});

/**
 * Turn the paragraph styles of a reference .docx into a rule table that can be
 * sent back as style_map_json.
 */
router.post('/extract',
  referenceUpload.single('reference'),
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.file) {
        throw new HttpError(400, 'No reference document uploaded (expected multipart field "reference")');
      }

      console.log(`Extracting styles from ${req.file.originalname} (${req.file.size} bytes)`);

      const extractor = new DocxStyleExtractor();
      const styles = await extractor.extractRuleTable(req.file.buffer);

      res.json({
        success: true,
        styles,
        styleCount: Object.keys(styles).length
      });
    } catch (error) {
      next(error);
    }
  }
);

export default router;
