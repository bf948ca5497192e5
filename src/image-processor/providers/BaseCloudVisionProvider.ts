/**
 * Base Cloud Vision Provider
 *
 * Shared functionality for hosted vision APIs:
 * - Image base64 encoding
 * - A single JSON POST with a request timeout
 * - Error normalization into CloudVisionError
 *
 * Calls are made exactly once. A failed call fails the extraction.
 */

import { VisionModelProvider, VisionExtractionResult, VisionModelConfig } from '../types.js';

/**
 * Cloud vision provider error
 */
export class CloudVisionError extends Error {
  constructor(
    message: string,
    public provider: string,
    public statusCode: number
  ) {
    super(message);
    this.name = 'CloudVisionError';
  }
}

export const DEFAULT_VISION_TIMEOUT_MS = 120000;

export abstract class BaseCloudVisionProvider implements VisionModelProvider {
  abstract name: string;
  protected config: VisionModelConfig;
  protected apiKey: string;
  protected timeout: number;

  constructor(config: VisionModelConfig) {
    this.config = config;
    this.apiKey = config.apiKey || '';
    this.timeout = config.options?.timeout || DEFAULT_VISION_TIMEOUT_MS;
  }

  abstract extractFromImage(image: Buffer, mimeType: string, prompt: string): Promise<VisionExtractionResult>;

  abstract getModelInfo(): { name: string; provider: string };

  protected encodeImage(image: Buffer): string {
    return image.toString('base64');
  }

  /**
   * POST a JSON body and parse the JSON reply
   */
  protected async postJson(
    url: string,
    headers: Record<string, string>,
    body: unknown
  ): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...headers
        },
        body: JSON.stringify(body),
        signal: controller.signal
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new CloudVisionError(
          `API error: ${response.status} - ${errorText}`,
          this.name,
          response.status
        );
      }

      const text = await response.text();
      try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
      } catch {
        throw new CloudVisionError(
          'API returned a response that is not valid JSON',
          this.name,
          response.status
        );
      }
    } catch (error) {
      if (error instanceof CloudVisionError) {
        throw error;
      }

      if (error instanceof Error && error.name === 'AbortError') {
        throw new CloudVisionError(
          `Request timeout after ${this.timeout}ms`,
          this.name,
          0
        );
      }

      throw new CloudVisionError(
        `Request failed: ${error instanceof Error ? error.message : String(error)}`,
        this.name,
        0
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
