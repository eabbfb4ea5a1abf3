import { AbortedError } from '../errors';
import { log } from '../log';
import { incStageError, recordCallMetrics, startStageTimer } from '../metrics';
import { CalendarNotConfiguredError, type CalendarBooker } from '../calendar/calendarClient';
import type { AudioChannel, Utterance } from '../audio/audioChannel';
import { IDLE_TIMEOUT_REASON, type CallStateTracker, type TrackerOutcome } from '../calls/callStateTracker';
import type { SessionManager } from '../calls/sessionManager';
import type { CallId, Namespace, ScheduledAction, TranscriptEntry, TurnResponse } from '../calls/types';
import type { DurableLogger } from '../storage/durableLogger';
import type { Transcriber } from '../stt/types';
import { SilentSpeechSynthesizer } from '../tts/httpSpeechSynthesizer';
import type { SpeechSynthesizer } from '../tts/types';
import { DEFAULT_FALLBACK_TEXT, type TurnOrchestrator, type TurnResult } from '../turns/turnOrchestrator';
import { parseVoiceEvent, type TurnCompletedEvent, type VoiceEvent } from './types';

export interface DispatchResult {
  eventId: string;
  callId: CallId;
  outcome: TrackerOutcome;
  /** Present for a user turn that asked for a reply; repeated unchanged on redelivery. */
  response?: TurnResponse;
}

export interface EventDispatcherOptions {
  tracker: CallStateTracker;
  orchestrator: TurnOrchestrator;
  logger: DurableLogger;
  sessions: SessionManager;
  calendar?: CalendarBooker;
  transcriber?: Transcriber;
  synthesizer?: SpeechSynthesizer;
  voice?: string;
  fallbackText?: string;
}

/**
 * Routes tagged events by type: lifecycle events go to the tracker and the
 * durable log, user turns additionally go through the orchestrator. Every event
 * for one call runs on that call's session queue.
 */
export class EventDispatcher {
  private readonly tracker: CallStateTracker;
  private readonly orchestrator: TurnOrchestrator;
  private readonly logger: DurableLogger;
  private readonly sessions: SessionManager;
  private readonly calendar?: CalendarBooker;
  private readonly transcriber?: Transcriber;
  private readonly synthesizer: SpeechSynthesizer;
  private readonly voice?: string;
  private readonly fallbackText: string;
  private readonly background = new Set<Promise<void>>();

  constructor(options: EventDispatcherOptions) {
    this.tracker = options.tracker;
    this.orchestrator = options.orchestrator;
    this.logger = options.logger;
    this.sessions = options.sessions;
    this.calendar = options.calendar;
    this.transcriber = options.transcriber;
    this.synthesizer = options.synthesizer ?? new SilentSpeechSynthesizer();
    this.voice = options.voice;
    this.fallbackText = options.fallbackText ?? DEFAULT_FALLBACK_TEXT;
  }

  /** Validates and dispatches a raw event body. Throws ProtocolError when it is malformed. */
  public async dispatchRaw(input: unknown): Promise<DispatchResult> {
    return this.dispatch(parseVoiceEvent(input));
  }

  public dispatch(event: VoiceEvent): Promise<DispatchResult> {
    return this.sessions.run(event.callId, event.type, (signal) => this.apply(event, signal));
  }

  /**
   * One utterance from a media channel: transcribe, run it as a user turn, and
   * queue the spoken reply on the channel. An empty transcription is not a turn.
   */
  public handleUtterance(utterance: Utterance, channel: AudioChannel): Promise<void> {
    const { callId, namespace } = channel;
    const logContext = { call_id: callId, namespace, utterance: utterance.index };

    return this.sessions.run(callId, 'audio_turn', async (signal) => {
      let text: string;
      const endTimer = startStageTimer('stt', namespace);
      try {
        const transcript = this.transcriber
          ? await this.transcriber.transcribe(utterance.audio, { signal, logContext })
          : { text: '' };
        text = transcript.text;
      } catch (error) {
        if (signal.aborted) {
          return;
        }
        incStageError('stt', namespace);
        log.error({ err: error, event: 'stt_failed', ...logContext }, 'transcription failed - speaking fallback');
        this.speak(channel, utterance.index, this.fallbackText, signal);
        return;
      } finally {
        endTimer();
      }

      if (!text) {
        log.info({ event: 'utterance_empty', ...logContext }, 'empty transcription - no turn');
        return;
      }

      const event: TurnCompletedEvent = {
        type: 'turn-completed',
        eventId: `${callId}:utterance:${utterance.index}`,
        callId,
        namespace,
        receivedAt: new Date(),
        speaker: 'user',
        text,
        timestamp: new Date(),
        respond: true,
      };

      const result = await this.apply(event, signal);
      if (result.response) {
        this.speak(channel, utterance.index, result.response.responseText, signal);
      }
    });
  }

  /** Records a call-started event for a media connection unless the call is already known. */
  public async openMediaCall(namespace: Namespace, callId: CallId): Promise<void> {
    if (this.tracker.getCall(callId)) {
      return;
    }
    await this.dispatch({
      type: 'call-started',
      eventId: `${callId}:media-connected`,
      callId,
      namespace,
      receivedAt: new Date(),
      direction: 'inbound',
      timestamp: new Date(),
    });
  }

  public async endMediaCall(namespace: Namespace, callId: CallId, reason: string): Promise<DispatchResult> {
    return this.dispatch({
      type: 'end-of-call-report',
      eventId: `${callId}:media-ended`,
      callId,
      namespace,
      receivedAt: new Date(),
      timestamp: new Date(),
      endedReason: reason,
    });
  }

  /**
   * Ends calls that have seen no event for `idleTimeoutMs`, such as a media call
   * whose socket dropped without a hangup or one whose end report never came.
   */
  public async expireIdleCalls(nowMs: number, idleTimeoutMs: number): Promise<number> {
    const reports = this.tracker.idleCalls(nowMs, idleTimeoutMs);
    const results = await Promise.all(
      reports.map(async (report) => {
        log.warn(
          { event: 'call_idle_expired', call_id: report.callId, namespace: report.namespace },
          'call idle without an end report - ending it',
        );
        try {
          return await this.dispatch(report);
        } finally {
          this.sessions.teardown(report.callId, IDLE_TIMEOUT_REASON);
        }
      }),
    );
    return results.filter((result) => result.outcome === 'applied').length;
  }

  /** Resolves once background bookings and every queued durable write have settled. */
  public async settle(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all(Array.from(this.background));
    }
    await this.logger.flush();
  }

  private async apply(event: VoiceEvent, signal: AbortSignal): Promise<DispatchResult> {
    const result = this.tracker.ingest(event);
    this.logger.persistAll(result.writes);

    const base = { eventId: event.eventId, callId: event.callId, outcome: result.outcome };

    if (result.outcome === 'duplicate') {
      const cached = this.tracker.getReply(event.callId, event.eventId);
      log.info(
        {
          event: 'call_event_duplicate',
          event_type: event.type,
          event_id: event.eventId,
          call_id: event.callId,
          namespace: event.namespace,
          cached_reply: cached !== undefined,
        },
        'duplicate event ignored',
      );
      return cached ? { ...base, response: cached } : base;
    }

    if (result.outcome === 'rejected') {
      return base;
    }

    if (result.ended && result.call) {
      const call = result.call;
      recordCallMetrics({
        namespace: call.namespace,
        status: call.status,
        durationMs: call.durationSeconds !== undefined ? call.durationSeconds * 1000 : undefined,
        turns: call.turns,
      });
      log.info(
        {
          event: 'call_ended',
          call_id: call.callId,
          namespace: call.namespace,
          status: call.status,
          duration_s: call.durationSeconds,
          turns: call.turns,
          ended_reason: call.endedReason,
        },
        'call ended',
      );
    }

    if (event.type !== 'turn-completed' || !event.respond || !result.entry) {
      return base;
    }
    if (result.call?.phase === 'Ended') {
      log.info(
        { event: 'turn_after_call_ended', call_id: event.callId, namespace: event.namespace, event_id: event.eventId },
        'late user turn recorded without a reply',
      );
      return base;
    }

    const response = await this.respond(event, result.entry, signal);
    return response ? { ...base, response } : base;
  }

  private async respond(
    event: TurnCompletedEvent,
    entry: TranscriptEntry,
    signal: AbortSignal,
  ): Promise<TurnResponse | undefined> {
    let turn: TurnResult;
    try {
      turn = await this.orchestrator.handleTurn({
        namespace: event.namespace,
        callId: event.callId,
        turnId: event.eventId,
        utterance: event.text,
        signal,
      });
    } catch (error) {
      if (error instanceof AbortedError) {
        log.info(
          { event: 'turn_abandoned', call_id: event.callId, namespace: event.namespace, event_id: event.eventId },
          'call torn down mid-turn - result discarded',
        );
        return undefined;
      }
      throw error;
    }

    const agentTurn = this.tracker.buildAgentTurn(event, entry, turn.responseText);
    this.logger.persistAll(this.tracker.ingest(agentTurn).writes);

    const actionWrites = this.tracker.recordActions(event.callId, turn.actions);
    this.logger.persistAll(actionWrites);

    const response: TurnResponse = { responseText: turn.responseText, actions: turn.actions };
    this.tracker.recordReply(event.callId, event.eventId, response);

    for (const write of actionWrites) {
      if (write.kind === 'action') {
        this.track(this.book(write.action));
      }
    }

    return response;
  }

  private speak(channel: AudioChannel, utterance: number, text: string, signal: AbortSignal): void {
    const logContext = { call_id: channel.callId, namespace: channel.namespace, utterance };
    channel.play(utterance, this.synthesizer.synthesize({ text, voice: this.voice, signal, logContext }));
  }

  private async book(action: ScheduledAction): Promise<void> {
    if (!this.calendar) {
      return;
    }
    const logContext = { call_id: action.callId, namespace: action.namespace, action_id: action.actionId };
    const endTimer = startStageTimer('calendar', action.namespace);
    try {
      const calendarEventId = await this.calendar.book(action.namespace, action);
      this.logger.persistAll(
        this.tracker.attachExternalReferences(action.callId, action.actionId, { calendarEventId }),
      );
    } catch (error) {
      incStageError('calendar', action.namespace);
      if (error instanceof CalendarNotConfiguredError) {
        log.warn({ event: 'calendar_not_configured', ...logContext }, 'calendar not configured - action kept unbooked');
        return;
      }
      log.error({ err: error, event: 'calendar_booking_failed', ...logContext }, 'calendar booking failed');
    } finally {
      endTimer();
    }
  }

  private track(work: Promise<void>): void {
    this.background.add(work);
    void work.finally(() => {
      this.background.delete(work);
    });
  }
}
