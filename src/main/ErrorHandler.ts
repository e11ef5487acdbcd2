/**
 * ErrorHandler - Centralized Error Management for scribekey
 *
 * Provides:
 * - Structured logging with component/operation context
 * - Categorization of low-level errors (network, auth, audio, file)
 * - Classification of raw provider failures into ProviderError kinds
 *
 * The core never renders errors; observers receive them as structured
 * `result` events and decide how to present them.
 */

import { ProviderError, ScribekeyError } from './errors';
import { logger, type LogLevel } from './utils/logger';

// ============================================================================
// Types
// ============================================================================

export interface ErrorContext {
  component: string;
  operation: string;
  data?: Record<string, unknown>;
}

export type ErrorCategory =
  | 'permission'
  | 'api_key'
  | 'rate_limit'
  | 'network'
  | 'transcription'
  | 'audio'
  | 'file'
  | 'unknown';

// ============================================================================
// ErrorHandler Class
// ============================================================================

class ErrorHandler {
  /**
   * Log a message with context
   */
  log(
    level: LogLevel,
    message: string,
    context?: Partial<ErrorContext> & { error?: string; stack?: string }
  ): void {
    const componentStr = context?.component ? `[${context.component}] ` : '';
    const operationStr = context?.operation ? ` (${context.operation})` : '';
    const details: Record<string, unknown> = { ...context?.data };
    if (context?.error) details.error = context.error;
    if (context?.stack) details.stack = context.stack;

    const line = `${componentStr}${message}${operationStr}`;
    if (Object.keys(details).length > 0) {
      logger[level](line, details);
    } else {
      logger[level](line);
    }
  }

  /**
   * Log a failure with its category attached
   */
  handle(error: unknown, context: ErrorContext): void {
    const normalized = error instanceof Error ? error : new Error(String(error));
    const category = this.categorizeError(normalized);
    this.log(category === 'unknown' ? 'error' : 'warn', normalized.message, {
      component: context.component,
      operation: context.operation,
      data: { ...context.data, category },
      stack: category === 'unknown' ? normalized.stack : undefined,
    });
  }

  // ==========================================================================
  // Provider Error Classification
  // ==========================================================================

  /**
   * Turn whatever a provider call threw into a classified ProviderError.
   * HTTP statuses win over message heuristics.
   */
  classifyProviderFailure(provider: string, error: unknown, status?: number): ProviderError {
    if (error instanceof ProviderError) {
      return error;
    }

    const normalized = error instanceof Error ? error : new Error(String(error));

    if (status !== undefined) {
      return new ProviderError(provider, this.kindForStatus(status), normalized.message, status);
    }

    if (normalized.name === 'TimeoutError' || normalized.name === 'AbortError') {
      return new ProviderError(provider, 'transient-network', `Request timed out: ${normalized.message}`);
    }
    if (this.isAuthError(normalized)) {
      return new ProviderError(provider, 'auth', normalized.message);
    }
    if (this.isRateLimitError(normalized)) {
      return new ProviderError(provider, 'rate-limit', normalized.message);
    }
    if (this.isNetworkError(normalized)) {
      return new ProviderError(provider, 'transient-network', normalized.message);
    }

    return new ProviderError(provider, 'server-error', normalized.message);
  }

  kindForStatus(status: number): ProviderError['kind'] {
    if (status === 401 || status === 403) return 'auth';
    if (status === 429) return 'rate-limit';
    if (status === 413) return 'size-limit';
    if (status === 408) return 'transient-network';
    return 'server-error';
  }

  // ==========================================================================
  // Error Classification Helpers
  // ==========================================================================

  isAuthError(error: Error): boolean {
    const message = error.message.toLowerCase();
    return (
      message.includes('401') ||
      message.includes('unauthorized') ||
      message.includes('invalid api key') ||
      message.includes('authentication') ||
      message.includes('forbidden')
    );
  }

  isRateLimitError(error: Error): boolean {
    const message = error.message.toLowerCase();
    return (
      message.includes('429') || message.includes('rate limit') || message.includes('too many')
    );
  }

  isNetworkError(error: Error): boolean {
    const message = error.message.toLowerCase();
    return (
      message.includes('network') ||
      message.includes('connection') ||
      message.includes('timeout') ||
      message.includes('timed out') ||
      message.includes('econnrefused') ||
      message.includes('econnreset') ||
      message.includes('enotfound') ||
      message.includes('socket') ||
      message.includes('fetch failed')
    );
  }

  /**
   * Categorize an error for logging/reporting
   */
  categorizeError(error: Error): ErrorCategory {
    if (error instanceof ScribekeyError) {
      switch (error.code) {
        case 'ProviderAuthError':
          return 'api_key';
        case 'ProviderRateLimited':
          return 'rate_limit';
        case 'ProviderTransient':
          return 'network';
        case 'DeviceUnavailable':
        case 'RecordingTooShort':
        case 'CaptureState':
          return 'audio';
        case 'AllProvidersExhausted':
        case 'ProviderSizeLimit':
        case 'SegmentSizeExceeded':
        case 'PostProcessFailure':
        case 'MergeIntegrity':
          return 'transcription';
        default:
          break;
      }
    }

    const message = error.message.toLowerCase();

    if (message.includes('permission') || message.includes('denied')) {
      return 'permission';
    }
    if (this.isAuthError(error)) {
      return 'api_key';
    }
    if (this.isRateLimitError(error)) {
      return 'rate_limit';
    }
    if (this.isNetworkError(error)) {
      return 'network';
    }
    if (message.includes('transcri')) {
      return 'transcription';
    }
    if (
      message.includes('audio') ||
      message.includes('microphone') ||
      message.includes('device')
    ) {
      return 'audio';
    }
    if (
      message.includes('file') ||
      message.includes('directory') ||
      message.includes('enoent') ||
      message.includes('eacces')
    ) {
      return 'file';
    }

    return 'unknown';
  }
}

// ============================================================================
// Singleton Export
// ============================================================================

export const errorHandler = new ErrorHandler();
export default ErrorHandler;
