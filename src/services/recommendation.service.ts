import { RecommendationConfig } from '../config';
import { errorMessage } from '../errors/http.errors';
import { emptyBundle, normalizeRecommendations } from '../schemas/recommendation.schema';
import { RecommendationBundle, ServiceResponse } from '../types/RecommendationTypes';
import { LlmClient } from './llm.client';

const SYSTEM_PROMPT = [
  'You are a clinical assistant turning an image analysis into a treatment plan.',
  'Respond with a single JSON object and nothing else.',
  'Use exactly these keys: "medications", "treatments", "precautions", "follow_up".',
  '"medications" is an array of objects with string fields "name", "dosage" and "purpose".',
  'The other three keys are arrays of short strings.',
  'Use an empty array when nothing applies.',
].join(' ');

const stripCodeFence = (content: string): string =>
  content.replace(/```json?\s*|\s*```/g, '').trim();

export class RecommendationService {
  constructor(
    private readonly llm: LlmClient,
    private readonly config: RecommendationConfig
  ) {}

  /** Never rejects; a failed call yields the empty bundle with `success: false`. */
  async generate(
    analysis: string,
    signal?: AbortSignal
  ): Promise<ServiceResponse<RecommendationBundle>> {
    try {
      const content = await this.llm.completeJson(
        {
          system: SYSTEM_PROMPT,
          user: analysis,
          maxTokens: this.config.maxTokens,
          temperature: this.config.temperature,
          timeoutMs: this.config.timeoutMs,
        },
        signal
      );
      return { success: true, data: normalizeRecommendations(this.parseObject(content)) };
    } catch (error) {
      const message = `Recommendation generation failed: ${errorMessage(error)}`;
      console.error(message);
      return { success: false, data: emptyBundle(), error: message };
    }
  }

  private parseObject(content: string): Record<string, unknown> {
    const parsed: unknown = JSON.parse(stripCodeFence(content));
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error('Recommendation content is not a JSON object.');
    }
    return Object.fromEntries(Object.entries(parsed));
  }
}
