import { GenerativeModel, GoogleGenerativeAI, InlineDataPart } from '@google/generative-ai';
import { GeminiLlmConfig } from '../config';
import { UploadedImage } from '../types/RecommendationTypes';
import { ImagePrompt, JsonPrompt, LlmClient } from './llm.client';

export class GeminiLlmClient implements LlmClient {
  readonly provider = 'gemini';
  private client: GoogleGenerativeAI;

  constructor(private readonly config: GeminiLlmConfig) {
    this.client = new GoogleGenerativeAI(config.apiKey);
  }

  async describeImage(prompt: ImagePrompt, signal?: AbortSignal): Promise<string> {
    const response = await this.getModel(prompt.timeoutMs).generateContent(
      {
        contents: [
          {
            role: 'user',
            parts: [{ text: prompt.text }, this.toInlineData(prompt.image)],
          },
        ],
        generationConfig: { maxOutputTokens: prompt.maxTokens },
      },
      { signal }
    );

    return this.requireText(response.response.text());
  }

  async completeJson(prompt: JsonPrompt, signal?: AbortSignal): Promise<string> {
    const response = await this.getModel(prompt.timeoutMs, prompt.system).generateContent(
      {
        contents: [{ role: 'user', parts: [{ text: prompt.user }] }],
        generationConfig: {
          temperature: prompt.temperature,
          maxOutputTokens: prompt.maxTokens,
          responseMimeType: 'application/json',
        },
      },
      { signal }
    );

    return this.requireText(response.response.text());
  }

  private getModel(timeoutMs: number, systemInstruction?: string): GenerativeModel {
    return this.client.getGenerativeModel(
      {
        model: this.config.model,
        systemInstruction: systemInstruction
          ? { role: 'system', parts: [{ text: systemInstruction }] }
          : undefined,
      },
      { apiVersion: this.config.apiVersion, baseUrl: this.config.baseUrl, timeout: timeoutMs }
    );
  }

  private toInlineData(image: UploadedImage): InlineDataPart {
    return {
      inlineData: {
        data: image.buffer.toString('base64'),
        mimeType: image.mimeType,
      },
    };
  }

  private requireText(content: string): string {
    if (!content.trim()) {
      throw new Error('Gemini returned empty content.');
    }
    return content;
  }
}
