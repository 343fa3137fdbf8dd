import multer from 'multer';
import path from 'path';
import { config } from '../config';
import { SUPPORTED_EXTENSIONS } from '../services/documentParser';
import { HttpError } from '../utils/httpError';

function extensionFilter(allowedTypes: readonly string[]) {
  return (_req: Express.Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
    const ext = path.extname(file.originalname).toLowerCase();

    if (allowedTypes.includes(ext)) {
      cb(null, true);
    } else {
      cb(new HttpError(400, `File type ${ext || '(none)'} not supported. Allowed types: ${allowedTypes.join(', ')}`));
    }
  };
}

// Drafts and reference documents are processed in memory and never written to disk
const storage = multer.memoryStorage();

export const draftUpload = multer({
  storage,
  fileFilter: extensionFilter(SUPPORTED_EXTENSIONS),
  limits: {
    fileSize: config.maxFileSize
  }
});

export const referenceUpload = multer({
  storage,
  fileFilter: extensionFilter(['.docx']),
  limits: {
    fileSize: config.maxFileSize
  }
});
