import multer from 'multer';
import { settings } from './settings';

/**
 * Drawing dumps are small JSON files; keep them in memory
 */
export const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: settings.maxUploadBytes },
  fileFilter: (req, file, cb) => {
    const isJson = file.mimetype === 'application/json' || file.originalname.toLowerCase().endsWith('.json');
    if (!isJson) {
      cb(new multer.MulterError('LIMIT_UNEXPECTED_FILE', file.fieldname));
      return;
    }
    cb(null, true);
  }
});
