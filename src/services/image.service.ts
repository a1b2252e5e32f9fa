import sharp from 'sharp';
import { ClientInputError, errorMessage } from '../errors/http.errors';
import { UploadedImage } from '../types/RecommendationTypes';

export const isImageMimeType = (mimeType: string): boolean =>
  mimeType.toLowerCase().startsWith('image/');

export class ImageService {
  /**
   * Rejects uploads that do not declare an image type or whose bytes do not
   * fully decode. Returns the original buffer untouched.
   */
  async validate(image: UploadedImage): Promise<Buffer> {
    if (!isImageMimeType(image.mimeType)) {
      console.warn(`Rejected upload with content type "${image.mimeType}"`);
      throw new ClientInputError('Invalid file type. Please upload an image.');
    }

    try {
      // stats() forces a full decode, so truncated pixel data fails here too.
      await sharp(image.buffer).stats();
    } catch (error) {
      console.warn('Rejected undecodable image upload', errorMessage(error));
      throw new ClientInputError('Invalid or corrupt image.', {
        detail: `Image decode failed: ${errorMessage(error)}`,
        cause: error,
      });
    }

    return image.buffer;
  }
}
