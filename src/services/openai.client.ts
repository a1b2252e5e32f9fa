import OpenAI from 'openai';
import { OpenAiLlmConfig } from '../config';
import { completionText } from '../schemas/completion.schema';
import { UploadedImage } from '../types/RecommendationTypes';
import { ImagePrompt, JsonPrompt, LlmClient } from './llm.client';

const toDataUrl = (image: UploadedImage): string =>
  `data:${image.mimeType};base64,${image.buffer.toString('base64')}`;

/** Chat-completions client; Groq by default, any OpenAI-compatible endpoint works. */
export class OpenAiLlmClient implements LlmClient {
  readonly provider = 'openai';
  private client: OpenAI;

  constructor(private readonly config: OpenAiLlmConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: config.maxRetries,
    });
  }

  async describeImage(prompt: ImagePrompt, signal?: AbortSignal): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.config.visionModel,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: prompt.text },
              { type: 'image_url', image_url: { url: toDataUrl(prompt.image) } },
            ],
          },
        ],
        max_tokens: prompt.maxTokens,
      },
      { timeout: prompt.timeoutMs, signal }
    );

    return completionText(response);
  }

  async completeJson(prompt: JsonPrompt, signal?: AbortSignal): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.config.recommendationModel,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
        response_format: { type: 'json_object' },
        temperature: prompt.temperature,
        max_tokens: prompt.maxTokens,
      },
      { timeout: prompt.timeoutMs, signal }
    );

    return completionText(response);
  }
}
