export type STTMode = 'http' | 'disabled';

export interface STTOptions {
  signal?: AbortSignal;
  logContext?: Record<string, unknown>;
}

export interface STTTranscript {
  text: string;
  confidence?: number;
}

/** Turns one utterance's audio into text. */
export interface Transcriber {
  readonly id: STTMode;
  transcribe(audio: Buffer, opts?: STTOptions): Promise<STTTranscript>;
}
