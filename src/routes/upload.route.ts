import { RequestHandler, Router } from 'express';
import multer from 'multer';
import { createUploadController, UploadServices } from '../controllers/upload.controller';
import { ClientInputError, HttpError, errorMessage } from '../errors/http.errors';
import { isImageMimeType } from '../services/image.service';

export const createUploadRouter = (
  services: UploadServices,
  options: { maxFileSizeBytes: number }
): Router => {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxFileSizeBytes, files: 1 },
    fileFilter: (_req, file, cb) => {
      if (!isImageMimeType(file.mimetype)) {
        console.warn(`Rejected upload with content type "${file.mimetype}"`);
        cb(new ClientInputError('Invalid file type. Please upload an image.'));
        return;
      }
      cb(null, true);
    },
  });

  const parseImage = upload.single('image');
  // busboy reports malformed multipart bodies as plain errors.
  const parseForm: RequestHandler = (req, res, next) => {
    parseImage(req, res, (error?: unknown) => {
      if (!error || error instanceof HttpError || error instanceof multer.MulterError) {
        next(error);
        return;
      }
      next(
        new ClientInputError('Invalid upload.', {
          detail: `Multipart parsing failed: ${errorMessage(error)}`,
          cause: error,
        })
      );
    });
  };

  const router = Router();

  router.post('/upload_and_query', parseForm, createUploadController(services));

  return router;
};
