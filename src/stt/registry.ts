import { log } from '../log';
import { DisabledTranscriber } from './providers/disabled';
import { HttpTranscriber } from './providers/httpTranscriber';
import type { Transcriber } from './types';

/** Picks the transcriber for the configured STT endpoint; no endpoint means STT is disabled. */
export function createTranscriber(config: { url?: string; timeoutMs: number }): Transcriber {
  const transcriber: Transcriber = config.url
    ? new HttpTranscriber(config.url, config.timeoutMs)
    : new DisabledTranscriber();

  log.info({ event: 'stt_provider_selected', stt_mode: transcriber.id }, 'stt provider selected');
  return transcriber;
}
