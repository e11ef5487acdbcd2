/**
 * PostProcessor.ts - Optional transcript cleanup
 *
 * Asks each cleanup provider in order to tidy the merged transcript and
 * accepts the first answer that still looks like the same text. Any
 * failure falls back to the raw transcript: cleanup never fails a session.
 */

import { PostProcessFailureError } from '../errors';
import { errorHandler } from '../ErrorHandler';
import type { CleanupProvider } from './ChatCleanupProvider';

// ============================================================================
// Types
// ============================================================================

export interface PostProcessOutcome {
  text: string;
  postProcessed: boolean;
  provider?: string;
}

export interface PostProcessorOptions {
  /** Deadline for each cleanup call */
  timeoutMs: number;
}

export interface CleanupCheck {
  valid: boolean;
  reason?: string;
}

const DEFAULT_OPTIONS: PostProcessorOptions = {
  timeoutMs: 30_000,
};

const MIN_LENGTH_RATIO = 0.15;
const MAX_LENGTH_RATIO = 3.0;
const MIN_WORD_OVERLAP = 0.3;

/** Openings that mark a chatty reply rather than a cleaned transcript */
const RESPONSE_PREFIXES = [
  'here is',
  "here's",
  'voici',
  'sure',
  'certainly',
  'of course',
  'bien sur',
  "i'd be happy",
  'je serais',
  'the text',
  'le texte',
  'this is',
  'ceci est',
  'based on',
  'en fonction',
];

// ============================================================================
// Validation
// ============================================================================

function wordSet(text: string): Set<string> {
  const words = text
    .replace(/[^\p{L}\p{N}_\s]/gu, '')
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 0);
  return new Set(words);
}

/**
 * Decide whether `cleaned` is a cleanup of `original` or a conversational reply.
 */
export function checkCleanup(original: string, cleaned: string): CleanupCheck {
  const ratio = cleaned.length / Math.max(original.length, 1);
  if (ratio > MAX_LENGTH_RATIO || ratio < MIN_LENGTH_RATIO) {
    return { valid: false, reason: `length ratio ${ratio.toFixed(2)}` };
  }

  const lowered = cleaned.toLowerCase().trimStart();
  const prefix = RESPONSE_PREFIXES.find((candidate) => lowered.startsWith(candidate));
  if (prefix) {
    return { valid: false, reason: `starts with "${prefix}"` };
  }

  const originalWords = wordSet(original);
  if (originalWords.size > 0) {
    const cleanedWords = wordSet(cleaned);
    let shared = 0;
    for (const word of originalWords) {
      if (cleanedWords.has(word)) shared++;
    }
    const overlap = shared / originalWords.size;
    if (overlap < MIN_WORD_OVERLAP) {
      return { valid: false, reason: `word overlap ${(overlap * 100).toFixed(1)}%` };
    }
  }

  return { valid: true };
}

// ============================================================================
// PostProcessor Class
// ============================================================================

export class PostProcessor {
  private readonly providers: readonly CleanupProvider[];
  private readonly options: PostProcessorOptions;

  constructor(providers: readonly CleanupProvider[], options: Partial<PostProcessorOptions> = {}) {
    this.providers = providers;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Clean up `rawText`, or return it unchanged when no provider succeeds.
   */
  async process(rawText: string, signal?: AbortSignal): Promise<PostProcessOutcome> {
    if (rawText.trim().length === 0 || this.providers.length === 0) {
      return { text: rawText, postProcessed: false };
    }

    const failures: string[] = [];
    for (const provider of this.providers) {
      if (signal?.aborted) break;
      try {
        const cleaned = await this.callWithDeadline(provider, rawText, signal);
        if (cleaned.length === 0) {
          failures.push(`${provider.name}: empty response`);
          continue;
        }
        const check = checkCleanup(rawText, cleaned);
        if (!check.valid) {
          failures.push(`${provider.name}: rejected (${check.reason})`);
          continue;
        }
        errorHandler.log('info', `Post-processed via ${provider.name} (${rawText.length} -> ${cleaned.length} chars)`, {
          component: 'PostProcessor',
          operation: 'process',
        });
        return { text: cleaned, postProcessed: true, provider: provider.name };
      } catch (error) {
        failures.push(error instanceof Error ? error.message : String(error));
      }
    }

    const failure = new PostProcessFailureError(
      `Cleanup unavailable, keeping raw transcript: ${failures.join('; ') || 'cancelled'}`
    );
    errorHandler.handle(failure, { component: 'PostProcessor', operation: 'process' });
    return { text: rawText, postProcessed: false };
  }

  private async callWithDeadline(
    provider: CleanupProvider,
    rawText: string,
    signal?: AbortSignal
  ): Promise<string> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      return (await provider.cleanup(rawText, controller.signal)).trim();
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
