import { log } from '../../log';
import type { STTOptions, STTTranscript, Transcriber } from '../types';

export class HttpTranscriber implements Transcriber {
  public readonly id = 'http';

  constructor(
    private readonly url: string,
    private readonly timeoutMs: number,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  public async transcribe(audio: Buffer, opts: STTOptions = {}): Promise<STTTranscript> {
    if (audio.length === 0) {
      return { text: '' };
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const onCallerAbort = (): void => controller.abort();
    opts.signal?.addEventListener('abort', onCallerAbort, { once: true });

    try {
      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/octet-stream',
        },
        body: new Uint8Array(audio),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text();
        const preview = body.length > 500 ? `${body.slice(0, 500)}...` : body;
        log.error(
          { event: 'stt_http_error', status: response.status, body_preview: preview, ...(opts.logContext ?? {}) },
          'stt request failed',
        );
        throw new Error(`stt http error ${response.status}: ${preview}`);
      }

      const data = (await response.json()) as { text?: unknown; confidence?: unknown };
      return {
        text: typeof data.text === 'string' ? data.text.trim() : '',
        confidence: typeof data.confidence === 'number' ? data.confidence : undefined,
      };
    } finally {
      clearTimeout(timeout);
      opts.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}
