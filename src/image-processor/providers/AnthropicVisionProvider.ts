/**
 * Anthropic Vision Provider - Claude Messages API
 */

import { VisionExtractionResult, VisionModelConfig } from '../types.js';
import { BaseCloudVisionProvider, CloudVisionError } from './BaseCloudVisionProvider.js';

export const DEFAULT_ANTHROPIC_BASE_URL = 'https://api.anthropic.com/v1';
export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-20250514';
export const DEFAULT_ANTHROPIC_MAX_TOKENS = 4096;
export const ANTHROPIC_VERSION = '2023-06-01';

interface AnthropicContentBlock {
  type: string;
  text?: string;
}

interface AnthropicMessageResponse {
  content: AnthropicContentBlock[];
  model?: string;
  usage?: {
    input_tokens: number;
    output_tokens: number;
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toMessageResponse(value: unknown): AnthropicMessageResponse | null {
  if (!isRecord(value) || !Array.isArray(value.content)) {
    return null;
  }

  const content: AnthropicContentBlock[] = value.content
    .filter(isRecord)
    .map(block => ({
      type: typeof block.type === 'string' ? block.type : '',
      text: typeof block.text === 'string' ? block.text : undefined
    }));

  const usage = isRecord(value.usage)
    && typeof value.usage.input_tokens === 'number'
    && typeof value.usage.output_tokens === 'number'
    ? { input_tokens: value.usage.input_tokens, output_tokens: value.usage.output_tokens }
    : undefined;

  return {
    content,
    model: typeof value.model === 'string' ? value.model : undefined,
    usage
  };
}

export class AnthropicVisionProvider extends BaseCloudVisionProvider {
  name: string;
  private baseUrl: string;
  private model: string;

  constructor(config: VisionModelConfig) {
    super(config);
    this.model = config.model || DEFAULT_ANTHROPIC_MODEL;
    this.name = `${this.model}-anthropic`;
    this.baseUrl = (config.baseUrl || DEFAULT_ANTHROPIC_BASE_URL).replace(/\/+$/, '');

    if (!this.apiKey) {
      throw new CloudVisionError(
        'Anthropic API key is required. Set ANTHROPIC_API_KEY environment variable or provide apiKey in config.',
        'anthropic',
        401
      );
    }
  }

  async extractFromImage(image: Buffer, mimeType: string, prompt: string): Promise<VisionExtractionResult> {
    const startTime = Date.now();

    const requestBody = {
      model: this.model,
      max_tokens: this.config.options?.maxTokens || DEFAULT_ANTHROPIC_MAX_TOKENS,
      messages: [
        {
          role: 'user',
          content: [
            {
              type: 'image',
              source: {
                type: 'base64',
                media_type: mimeType,
                data: this.encodeImage(image)
              }
            },
            {
              type: 'text',
              text: prompt
            }
          ]
        }
      ]
    };

    const raw = await this.postJson(
      `${this.baseUrl}/messages`,
      {
        'x-api-key': this.apiKey,
        'anthropic-version': ANTHROPIC_VERSION
      },
      requestBody
    );

    const response = toMessageResponse(raw);
    if (!response) {
      throw new CloudVisionError('Anthropic response has no content array', 'anthropic', 200);
    }

    const textBlock = response.content.find(block => block.type === 'text' && block.text !== undefined);
    if (!textBlock || textBlock.text === undefined) {
      throw new CloudVisionError('Anthropic response contained no text content', 'anthropic', 200);
    }

    const usage = response.usage;

    return {
      extracted_text: textBlock.text,
      model: response.model || this.model,
      provider: 'anthropic',
      processing_time_ms: Date.now() - startTime,
      usage: usage
        ? {
            input_tokens: usage.input_tokens,
            output_tokens: usage.output_tokens,
            total_tokens: usage.input_tokens + usage.output_tokens
          }
        : undefined
    };
  }

  getModelInfo(): { name: string; provider: string } {
    return {
      name: this.model,
      provider: 'anthropic'
    };
  }
}
