import { log } from '../log';
import type { SpeechSynthesizer, TTSRequest } from './types';

export class HttpSpeechSynthesizer implements SpeechSynthesizer {
  constructor(
    private readonly url: string,
    private readonly defaultVoice?: string,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  public async *synthesize(request: TTSRequest): AsyncIterable<Buffer> {
    const response = await this.fetchImpl(this.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        text: request.text,
        voice: request.voice ?? this.defaultVoice,
      }),
      signal: request.signal,
    });

    if (!response.ok) {
      const body = await response.text();
      log.error(
        { event: 'tts_http_error', status: response.status, body_preview: body.slice(0, 200), ...request.logContext },
        'tts error',
      );
      throw new Error(`tts error ${response.status}`);
    }

    if (!response.body) {
      const arrayBuffer = await response.arrayBuffer();
      if (arrayBuffer.byteLength > 0) {
        yield Buffer.from(arrayBuffer);
      }
      return;
    }

    const reader = response.body.getReader();
    let finished = false;
    try {
      while (true) {
        const { value, done } = await reader.read();
        if (done) {
          finished = true;
          break;
        }
        if (value && value.byteLength > 0) {
          yield Buffer.from(value);
        }
      }
    } finally {
      // The consumer stopped early; stop downloading the rest of the reply.
      if (!finished) {
        await reader.cancel().catch((error: unknown) => {
          log.warn({ err: error, event: 'tts_stream_cancel_failed', ...request.logContext }, 'tts stream cancel failed');
        });
      }
      reader.releaseLock();
    }
  }
}

/** No TTS endpoint configured: replies produce no audio, only the completion marker. */
export class SilentSpeechSynthesizer implements SpeechSynthesizer {
  public async *synthesize(): AsyncIterable<Buffer> {
    // no audio
  }
}
