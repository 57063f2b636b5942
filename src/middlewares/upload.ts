import multer from 'multer';
import { ApiError } from './errorHandler';

export const MAX_RESUME_BYTES = 5 * 1024 * 1024;

export const uploadResume = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: MAX_RESUME_BYTES, files: 1 },
  fileFilter: (_req, file, cb) => {
    if (file.mimetype !== 'application/pdf') {
      cb(new ApiError(400, 'Only PDF resumes are supported'));
      return;
    }
    cb(null, true);
  },
});
