import { NextFunction, Request, RequestHandler, Response } from 'express';
import { z } from 'zod';
import { ClientInputError } from '../errors/http.errors';
import { ImageService } from '../services/image.service';
import { OpenFdaService } from '../services/openfda.service';
import { RecommendationService } from '../services/recommendation.service';
import { VisionService } from '../services/vision.service';
import { AnalysisResponse, UploadedImage } from '../types/RecommendationTypes';

export interface UploadServices {
  imageService: ImageService;
  visionService: VisionService;
  openFdaService: OpenFdaService;
  recommendationService: RecommendationService;
}

const uploadFormSchema = z.object({
  query: z.string().trim().min(1),
});

export const createUploadController = ({
  imageService,
  visionService,
  openFdaService,
  recommendationService,
}: UploadServices): RequestHandler => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    // Upstream calls are abandoned once the client has gone away.
    const abort = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        abort.abort();
      }
    });

    try {
      if (!req.file) {
        throw new ClientInputError('No image uploaded.');
      }
      const form = uploadFormSchema.safeParse(req.body);
      if (!form.success) {
        throw new ClientInputError('A text query is required.');
      }

      const image: UploadedImage = {
        buffer: req.file.buffer,
        mimeType: req.file.mimetype,
        originalName: req.file.originalname,
      };
      await imageService.validate(image);

      const analysis = await visionService.analyze(image, form.data.query, abort.signal);

      const [medications, recommendations] = await Promise.all([
        openFdaService.findMedications(analysis, abort.signal),
        recommendationService.generate(analysis, abort.signal),
      ]);

      const body: AnalysisResponse = {
        analysis,
        recommendations: {
          ...recommendations.data,
          medications: medications.data,
        },
      };
      res.json(body);
    } catch (error) {
      if (abort.signal.aborted) {
        console.warn('Client disconnected before the analysis finished');
        return;
      }
      next(error);
    }
  };
};
