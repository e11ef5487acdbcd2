/**
 * WhisperApiProvider
 *
 * Client for OpenAI-compatible `/audio/transcriptions` endpoints (Groq and
 * OpenAI). Uses native fetch + FormData; HTTP failures are classified into
 * ProviderError kinds so TranscriptionClient can decide whether to retry.
 */

import { z } from 'zod';
import { errorHandler } from '../../ErrorHandler';
import { ProviderError } from '../../errors';
import type { ProviderName, TranscriptionProvider, TranscriptionRequest } from '../types';

// =============================================================================
// Configuration
// =============================================================================

export interface WhisperApiConfig {
  name: string;
  baseUrl: string;
  apiKey: string;
  model: string;
}

export const PROVIDER_BASE_URLS: Record<ProviderName, string> = {
  groq: 'https://api.groq.com/openai/v1',
  openai: 'https://api.openai.com/v1',
};

export const DEFAULT_WHISPER_MODELS: Record<ProviderName, string> = {
  groq: 'whisper-large-v3',
  openai: 'whisper-1',
};

const MAX_ERROR_DETAIL_CHARS = 220;

const apiErrorSchema = z.object({
  error: z.object({ message: z.string().optional() }).passthrough().optional(),
});

// =============================================================================
// Helpers
// =============================================================================

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

/**
 * Extract a readable message from an OpenAI-style error body.
 */
export async function extractApiError(response: Response): Promise<string> {
  const raw = (await response.text().catch(() => '')).trim();
  if (raw.length === 0) {
    return `HTTP ${response.status}`;
  }

  const parsed = apiErrorSchema.safeParse(parseJson(raw));
  const message = parsed.success ? parsed.data.error?.message?.trim() : undefined;
  if (message) {
    return message;
  }
  return raw.length > MAX_ERROR_DETAIL_CHARS ? `${raw.slice(0, MAX_ERROR_DETAIL_CHARS)}...` : raw;
}

// =============================================================================
// Provider
// =============================================================================

export class WhisperApiProvider implements TranscriptionProvider {
  readonly name: string;
  private readonly config: WhisperApiConfig;

  constructor(config: WhisperApiConfig) {
    this.config = config;
    this.name = config.name;
  }

  async transcribe(request: TranscriptionRequest, signal: AbortSignal): Promise<string> {
    const form = new FormData();
    form.append('model', this.config.model);
    form.append('response_format', 'text');
    if (request.language) {
      form.append('language', request.language);
    }
    if (request.prompt) {
      form.append('prompt', request.prompt);
    }
    form.append(
      'file',
      new Blob([new Uint8Array(request.audio)], { type: request.mimeType }),
      request.fileName
    );

    let response: Response;
    try {
      response = await fetch(`${this.config.baseUrl}/audio/transcriptions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        body: form,
        signal,
      });
    } catch (error) {
      throw errorHandler.classifyProviderFailure(this.name, error);
    }

    if (!response.ok) {
      const detail = await extractApiError(response);
      throw errorHandler.classifyProviderFailure(
        this.name,
        new Error(`Transcription failed (${response.status}): ${detail}`),
        response.status
      );
    }

    const text = (await response.text()).trim();
    if (text.length === 0) {
      throw new ProviderError(this.name, 'server-error', 'Empty transcription returned');
    }
    return text;
  }
}

/**
 * Build a provider for one of the known endpoints.
 *
 * `model` only applies to Groq; OpenAI serves a single Whisper model.
 */
export function createWhisperProvider(
  name: ProviderName,
  apiKey: string,
  model?: string
): WhisperApiProvider {
  return new WhisperApiProvider({
    name,
    baseUrl: PROVIDER_BASE_URLS[name],
    apiKey,
    model: name === 'groq' && model ? model : DEFAULT_WHISPER_MODELS[name],
  });
}
