/**
 * Vision Model Types for the lineup extractor
 */

export interface VisionExtractionResult {
  /** First text block returned by the model */
  extracted_text: string;
  model: string;
  provider: string;
  processing_time_ms: number;
  /** Token usage for cost tracking */
  usage?: {
    input_tokens?: number;
    output_tokens?: number;
    total_tokens?: number;
  };
}

export interface VisionModelProvider {
  name: string;
  extractFromImage(image: Buffer, mimeType: string, prompt: string): Promise<VisionExtractionResult>;
  getModelInfo(): { name: string; provider: string };
}

export interface VisionModelConfig {
  provider: 'anthropic';
  baseUrl?: string;
  model: string;
  apiKey?: string;
  options?: {
    maxTokens?: number;
    timeout?: number;       // Request timeout in ms
  };
}
