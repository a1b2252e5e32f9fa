import { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { HttpError, errorMessage } from '../errors/http.errors';

const uploadErrorMessage = (error: multer.MulterError): string =>
  error.code === 'LIMIT_FILE_SIZE' ? 'Image is too large.' : 'Invalid upload.';

/** 4xx status attached by express or body-parser style middleware, if any. */
const clientErrorStatus = (error: unknown): number | undefined => {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const status =
    'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
};

/**
 * Maps failures to a status code and a generic message. Internal detail is
 * logged here and never sent to the client.
 */
export const errorHandler = (
  error: unknown,
  _req: Request,
  res: Response,
  next: NextFunction
): void => {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof multer.MulterError) {
    console.warn(`Upload rejected: ${error.code}`);
    res.status(400).json({ success: false, error: uploadErrorMessage(error) });
    return;
  }

  if (error instanceof HttpError) {
    if (error.status >= 500) {
      console.error(`${error.name}: ${error.message}`, error.cause);
    } else {
      console.warn(`${error.name}: ${error.message}`);
    }
    res.status(error.status).json({ success: false, error: error.publicMessage });
    return;
  }

  const status = clientErrorStatus(error);
  if (status !== undefined) {
    console.warn(`Request rejected with ${status}: ${errorMessage(error)}`);
    res.status(status).json({ success: false, error: 'Invalid upload.' });
    return;
  }

  console.error('Request processing failed', error);
  res.status(500).json({ success: false, error: 'Processing error' });
};
