import { AbortedError, TimeoutError } from '../errors';
import { log } from '../log';
import type { ComposedPrompt } from './prompt';

export interface CompletionRequestOptions {
  signal?: AbortSignal;
  logContext?: Record<string, unknown>;
}

/** Text completion service. May time out; callers decide how to degrade. */
export interface CompletionService {
  complete(prompt: ComposedPrompt, options?: CompletionRequestOptions): Promise<string>;
}

async function readResponseText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '';
  }
}

function buildCompletionUrl(base: string): string {
  const trimmed = base.replace(/\/$/, '');
  if (trimmed.endsWith('/complete')) {
    return trimmed;
  }
  return `${trimmed}/complete`;
}

export interface HttpCompletionClientOptions {
  url: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

/**
 * POSTs `{ system, prompt, shape }` and expects `{ text }` back. The request is
 * aborted when the timeout elapses or the caller's signal fires.
 */
export class HttpCompletionClient implements CompletionService {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpCompletionClientOptions) {
    this.url = buildCompletionUrl(options.url);
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  public async complete(prompt: ComposedPrompt, options: CompletionRequestOptions = {}): Promise<string> {
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          system: prompt.system,
          prompt: prompt.user,
          shape: prompt.shape,
        }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await readResponseText(response);
        const preview = body.length > 500 ? `${body.slice(0, 500)}...` : body;
        throw new Error(`completion failed ${response.status}: ${preview}`);
      }

      const data = (await response.json()) as { text?: unknown };
      const text = typeof data.text === 'string' ? data.text.trim() : '';
      if (!text) {
        throw new Error('completion response missing text');
      }

      return text;
    } catch (error) {
      if (timedOut) {
        throw new TimeoutError('completion', this.timeoutMs);
      }
      if (options.signal?.aborted) {
        throw new AbortedError('completion aborted');
      }
      log.warn(
        { err: error, event: 'completion_request_failed', ...(options.logContext ?? {}) },
        'completion request failed',
      );
      throw error;
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}

/**
 * Used when no completion service is configured: every turn degrades to the
 * orchestrator's fallback reply.
 */
export class UnconfiguredCompletionService implements CompletionService {
  public async complete(): Promise<string> {
    throw new Error('completion service not configured');
  }
}
