import { LlmConfig } from '../config';
import { UploadedImage } from '../types/RecommendationTypes';
import { GeminiLlmClient } from './gemini.client';
import { OpenAiLlmClient } from './openai.client';

export interface ImagePrompt {
  image: UploadedImage;
  text: string;
  maxTokens: number;
  timeoutMs: number;
}

export interface JsonPrompt {
  system: string;
  user: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

/**
 * Minimal surface over a multimodal language model. Implementations return the
 * raw completion text and throw on any transport, status or shape failure.
 */
export interface LlmClient {
  readonly provider: LlmConfig['provider'];
  describeImage(prompt: ImagePrompt, signal?: AbortSignal): Promise<string>;
  completeJson(prompt: JsonPrompt, signal?: AbortSignal): Promise<string>;
}

export const createLlmClient = (config: LlmConfig): LlmClient =>
  config.provider === 'gemini' ? new GeminiLlmClient(config) : new OpenAiLlmClient(config);
