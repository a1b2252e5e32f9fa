import express from 'express';
import cors from 'cors';
import path from 'path';
import { AppConfig } from './config';
import { UploadServices } from './controllers/upload.controller';
import { errorHandler } from './middleware/error.middleware';
import { createUploadRouter } from './routes/upload.route';
import { ImageService } from './services/image.service';
import { createLlmClient } from './services/llm.client';
import { OpenFdaService } from './services/openfda.service';
import { RecommendationService } from './services/recommendation.service';
import { VisionService } from './services/vision.service';

const PUBLIC_DIR = path.join(__dirname, '..', 'public');

export const createServices = (config: AppConfig): UploadServices => {
  const llm = createLlmClient(config.llm);
  return {
    imageService: new ImageService(),
    visionService: new VisionService(llm, config.vision),
    openFdaService: new OpenFdaService(config.openFda),
    recommendationService: new RecommendationService(llm, config.recommendation),
  };
};

export const createApp = (
  config: AppConfig,
  services: UploadServices = createServices(config)
): express.Express => {
  const app = express();

  app.use(cors());

  app.get('/', (_req, res) => {
    res.sendFile(path.join(PUBLIC_DIR, 'index.html'));
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use(createUploadRouter(services, config.upload));

  app.use(errorHandler);

  return app;
};
