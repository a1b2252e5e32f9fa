import { VisionConfig } from '../config';
import { UpstreamUnavailableError, errorMessage } from '../errors/http.errors';
import { UploadedImage } from '../types/RecommendationTypes';
import { LlmClient } from './llm.client';

export class VisionService {
  constructor(
    private readonly llm: LlmClient,
    private readonly config: VisionConfig
  ) {}

  async analyze(image: UploadedImage, query: string, signal?: AbortSignal): Promise<string> {
    try {
      const text = await this.llm.describeImage(
        {
          image,
          text: query,
          maxTokens: this.config.maxTokens,
          timeoutMs: this.config.timeoutMs,
        },
        signal
      );
      return text.trim();
    } catch (error) {
      throw new UpstreamUnavailableError(
        `Vision analysis via ${this.llm.provider} failed: ${errorMessage(error)}`,
        error
      );
    }
  }
}
