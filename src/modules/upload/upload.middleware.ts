import multer from 'multer';
import { appConfig } from '../../connections/config/app.config';
import { ValidationError } from '../../utils/errors';
import { AVATAR_MIME_TYPES } from './upload.types';

const storage = multer.memoryStorage();

const upload = multer({
  storage,
  limits: {
    fileSize: appConfig.maxFileSize,
  },
  fileFilter: (_req, file, cb) => {
    if (AVATAR_MIME_TYPES.includes(file.mimetype)) {
      cb(null, true);
    } else {
      cb(new ValidationError(`File type ${file.mimetype} is not supported`));
    }
  },
});

// Single image in the `file` field
export const avatarUploadMiddleware = upload.single('file');
