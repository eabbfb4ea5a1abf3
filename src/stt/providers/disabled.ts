import type { STTTranscript, Transcriber } from '../types';

export class DisabledTranscriber implements Transcriber {
  public readonly id = 'disabled';

  public async transcribe(): Promise<STTTranscript> {
    return { text: '', confidence: 0 };
  }
}
