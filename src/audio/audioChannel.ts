import { log } from '../log';
import { incInboundAudioChunks, incInboundAudioChunksDropped, incStageError } from '../metrics';
import type { CallId, Namespace } from '../calls/types';

export interface TtsCompleteMessage {
  type: 'tts_complete';
  utterance: number;
}

export type ChannelControlMessage = TtsCompleteMessage;

/** The transport side of one call's duplex media connection. */
export interface MediaConnection {
  sendAudio(chunk: Buffer): Promise<void> | void;
  sendControl(message: ChannelControlMessage): Promise<void> | void;
  close(code?: number, reason?: string): void;
}

export interface Utterance {
  /** 1-based position of the utterance on this channel. */
  index: number;
  audio: Buffer;
}

export type UtteranceHandler = (utterance: Utterance, channel: AudioChannel) => Promise<void>;

export interface AudioChannelOptions {
  callId: CallId;
  namespace: Namespace;
  connection: MediaConnection;
  onUtterance: UtteranceHandler;
  onClosed?: (reason: string) => void;
}

interface OutboundJob {
  utterance: number;
  audio: AsyncIterable<Buffer>;
}

/**
 * One call's duplex audio. Inbound chunks accumulate until a zero-length chunk
 * closes the utterance; closed utterances wait in their own queue and reach the
 * handler one at a time, so `receive` never waits on a turn. Replies wait in a
 * separate outbound queue and are relayed in order, each followed by a
 * `tts_complete` control message.
 */
export class AudioChannel {
  public readonly callId: CallId;
  public readonly namespace: Namespace;

  private readonly connection: MediaConnection;
  private readonly onUtterance: UtteranceHandler;
  private readonly onClosed?: (reason: string) => void;

  private current: Buffer[] = [];
  private readonly inbound: Utterance[] = [];
  private readonly outbound: OutboundJob[] = [];
  private inboundRunning = false;
  private outboundRunning = false;
  private utteranceCount = 0;
  private closedReason: string | null = null;
  private idleWaiters: Array<() => void> = [];

  constructor(options: AudioChannelOptions) {
    this.callId = options.callId;
    this.namespace = options.namespace;
    this.connection = options.connection;
    this.onUtterance = options.onUtterance;
    this.onClosed = options.onClosed;
  }

  public get closed(): boolean {
    return this.closedReason !== null;
  }

  public receive(chunk: Buffer): void {
    if (this.closed) {
      incInboundAudioChunksDropped('channel_closed');
      return;
    }

    if (chunk.length > 0) {
      incInboundAudioChunks();
      this.current.push(chunk);
      return;
    }

    if (this.current.length === 0) {
      return;
    }

    this.utteranceCount += 1;
    const utterance: Utterance = { index: this.utteranceCount, audio: Buffer.concat(this.current) };
    this.current = [];
    this.inbound.push(utterance);

    if (this.inboundRunning) {
      log.info(
        {
          event: 'utterance_queued',
          utterance: utterance.index,
          pending_utterances: this.inbound.length,
          ...this.logContext(),
        },
        'utterance queued behind unanswered turn',
      );
      return;
    }

    this.inboundRunning = true;
    setImmediate(() => {
      void this.runInbound();
    });
  }

  /** Queues a reply's audio for `utterance`. Playback order is enqueue order. */
  public play(utterance: number, audio: AsyncIterable<Buffer>): void {
    if (this.closed) {
      return;
    }

    this.outbound.push({ utterance, audio });
    if (this.outboundRunning) {
      return;
    }

    this.outboundRunning = true;
    setImmediate(() => {
      void this.runOutbound();
    });
  }

  public pendingUtterances(): number {
    return this.inbound.length;
  }

  public bufferedBytes(): number {
    return this.current.reduce((total, chunk) => total + chunk.length, 0);
  }

  /** Resolves once both directions have nothing queued or in progress. */
  public whenIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  public close(reason = 'closed', code = 1000): void {
    if (this.closedReason !== null) {
      return;
    }
    this.closedReason = reason;

    const dropped = this.inbound.length;
    this.current = [];
    this.inbound.length = 0;
    this.outbound.length = 0;

    try {
      this.connection.close(code, reason);
    } catch (error) {
      log.warn({ err: error, event: 'media_connection_close_failed', ...this.logContext() }, 'media connection close failed');
    }

    log.info(
      { event: 'audio_channel_closed', reason, dropped_utterances: dropped, ...this.logContext() },
      'audio channel closed',
    );

    this.onClosed?.(reason);
    this.notifyIdle();
  }

  private async runInbound(): Promise<void> {
    while (this.inbound.length > 0 && !this.closed) {
      const utterance = this.inbound.shift();
      if (!utterance) {
        continue;
      }

      try {
        await this.onUtterance(utterance, this);
      } catch (error) {
        log.error(
          { err: error, event: 'utterance_handler_failed', utterance: utterance.index, ...this.logContext() },
          'utterance handler failed',
        );
      }
    }

    this.inboundRunning = false;
    this.notifyIdle();
  }

  private async runOutbound(): Promise<void> {
    while (this.outbound.length > 0 && !this.closed) {
      const job = this.outbound.shift();
      if (!job) {
        continue;
      }

      try {
        await this.relay(job);
      } catch (error) {
        log.error(
          { err: error, event: 'media_connection_failed', utterance: job.utterance, ...this.logContext() },
          'media connection failed - closing channel',
        );
        this.close('connection_error', 1011);
      }
    }

    this.outboundRunning = false;
    this.notifyIdle();
  }

  private async relay(job: OutboundJob): Promise<void> {
    const iterator = job.audio[Symbol.asyncIterator]();
    let finished = false;
    let chunks = 0;

    try {
      while (!this.closed) {
        let next: IteratorResult<Buffer>;
        try {
          next = await iterator.next();
        } catch (error) {
          // A failed synthesis still ends the utterance for the remote end.
          incStageError('tts', this.namespace);
          log.error(
            { err: error, event: 'tts_stream_failed', utterance: job.utterance, chunks, ...this.logContext() },
            'reply audio stream failed',
          );
          finished = true;
          break;
        }
        if (next.done) {
          finished = true;
          break;
        }
        await this.connection.sendAudio(next.value);
        chunks += 1;
      }
    } finally {
      if (!finished && iterator.return) {
        await iterator.return().catch((error: unknown) => {
          log.warn({ err: error, event: 'tts_stream_release_failed', ...this.logContext() }, 'reply audio release failed');
        });
      }
    }

    if (this.closed) {
      return;
    }
    await this.connection.sendControl({ type: 'tts_complete', utterance: job.utterance });
  }

  private isIdle(): boolean {
    return (
      this.closed ||
      (!this.inboundRunning && !this.outboundRunning && this.inbound.length === 0 && this.outbound.length === 0)
    );
  }

  private notifyIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private logContext(): Record<string, unknown> {
    return { call_id: this.callId, namespace: this.namespace };
  }
}
