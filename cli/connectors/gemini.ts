import { z } from 'zod';
import {
  Connector, ConnectorOptionsSchema, getPath, parseConfig, MalformedPayloadError, type ConnectorDeps, type QueryParams,
} from './base/index.js';

export const GEMINI_MODELS = [
  'gemini-1.5-flash',
  'gemini-2.0-flash-lite',
  'gemini-2.0-flash',
  'gemini-2.5-flash',
  'gemini-2.5-flash-lite',
  'gemini-2.5-pro',
] as const;

export const GeminiConfigSchema = z.object({
  apiKey: z.string().min(1),
  model: z.enum(GEMINI_MODELS),
  options: ConnectorOptionsSchema.optional(),
}).strict();

export type GeminiConfig = z.input<typeof GeminiConfigSchema>;

export class GeminiConnector extends Connector {
  private readonly apiKey: string;
  readonly model: string;

  constructor(config: GeminiConfig, deps?: ConnectorDeps) {
    const { apiKey, model, options } = parseConfig(GeminiConfigSchema, config, 'Gemini');
    super({
      source: 'gemini',
      displayName: 'Gemini',
      baseUrl: 'https://generativelanguage.googleapis.com/v1beta',
      options,
      defaults: { maxRetries: 5, baseDelayMs: 2000 },
      secretParams: ['key'],
    }, deps);
    this.apiKey = apiKey;
    this.model = model;
  }

  protected authHeaders(): Record<string, string> {
    return {};
  }

  protected authParams(): QueryParams {
    return { key: this.apiKey };
  }

  /** Single-turn generation; returns the text of the first candidate. */
  async generateText(prompt: string): Promise<string> {
    const payload = await this.client.request(`models/${this.model}:generateContent`, {
      method: 'POST',
      body: { contents: [{ parts: [{ text: prompt }] }] },
    });
    const text = getPath(firstOf(getPath(firstOf(getPath(payload, 'candidates')), 'content.parts')), 'text');
    if (typeof text !== 'string') {
      throw new MalformedPayloadError(this.displayName, 'response has no candidates[0].content.parts[0].text', payload);
    }
    return text;
  }
}

function firstOf(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : undefined;
}
