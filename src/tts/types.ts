export interface TTSRequest {
  text: string;
  voice?: string;
  signal?: AbortSignal;
  logContext?: Record<string, unknown>;
}

/** Streams synthesized audio for one reply, in playback order. */
export interface SpeechSynthesizer {
  synthesize(request: TTSRequest): AsyncIterable<Buffer>;
}
