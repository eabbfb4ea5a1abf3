import { raceWithAbort, withTimeout } from '../async';
import { AbortedError, TimeoutError } from '../errors';
import { log } from '../log';
import { incStageError, startStageTimer } from '../metrics';
import { composePrompt, type PromptShape } from '../ai/prompt';
import { parseCompletion, type ActionIntent } from '../ai/intents';
import type { CompletionService } from '../ai/completionClient';
import { retrieveWithDeadline, type RetrievalDegradation } from '../retrieval/retriever';
import type { Retriever } from '../retrieval/types';
import type { CallId, Namespace, ScheduledAction, TurnResponse } from '../calls/types';

export const DEFAULT_FALLBACK_TEXT = "Sorry - I'm having trouble answering right now. Could you say that again?";
const BOOKING_CONFIRMATION_TEXT = "You're all set - I've booked that appointment for you.";

export interface NamespaceTurnSettings {
  topK?: number;
  fallbackText?: string;
}

export interface TurnOrchestratorOptions {
  retriever: Retriever;
  completion: CompletionService;
  topK: number;
  retrievalTimeoutMs: number;
  completionTimeoutMs: number;
  fallbackText?: string;
  namespaceSettings?: (namespace: Namespace) => Promise<NamespaceTurnSettings | null>;
}

export interface TurnInput {
  namespace: Namespace;
  callId: CallId;
  /** Stable per turn; scheduled action ids derive from it so redelivery reproduces them. */
  turnId: string;
  utterance: string;
  signal?: AbortSignal;
}

export type ReplySource = 'completion' | 'fallback';

export interface TurnResult extends TurnResponse {
  source: ReplySource;
  promptShape: PromptShape;
  contextSnippets: number;
  retrievalDegraded?: RetrievalDegradation;
}

function previewText(text: string, max = 160): string {
  return text.length <= max ? text : `${text.slice(0, max - 3)}...`;
}

export function toScheduledActions(
  intents: readonly ActionIntent[],
  input: Pick<TurnInput, 'namespace' | 'callId' | 'turnId'>,
): ScheduledAction[] {
  return intents.map((intent, index) => ({
    callId: input.callId,
    actionId: `${input.turnId}:${index}`,
    namespace: input.namespace,
    kind: 'appointment',
    customerName: intent.params.customer_name,
    customerPhone: intent.params.customer_phone,
    customerAddress: intent.params.customer_address,
    issueType: intent.params.issue_type,
    scheduledTime: intent.params.scheduled_time,
  }));
}

/**
 * One dialogue turn: retrieve, compose, complete, extract actions. Holds no
 * per-call state. Retrieval and completion failures degrade (empty context,
 * fallback reply); only cancellation of the turn surfaces as an error.
 */
export class TurnOrchestrator {
  private readonly retriever: Retriever;
  private readonly completion: CompletionService;
  private readonly topK: number;
  private readonly retrievalTimeoutMs: number;
  private readonly completionTimeoutMs: number;
  private readonly fallbackText: string;
  private readonly namespaceSettings?: (namespace: Namespace) => Promise<NamespaceTurnSettings | null>;

  constructor(options: TurnOrchestratorOptions) {
    this.retriever = options.retriever;
    this.completion = options.completion;
    this.topK = options.topK;
    this.retrievalTimeoutMs = options.retrievalTimeoutMs;
    this.completionTimeoutMs = options.completionTimeoutMs;
    this.fallbackText = options.fallbackText ?? DEFAULT_FALLBACK_TEXT;
    this.namespaceSettings = options.namespaceSettings;
  }

  public async handleTurn(input: TurnInput): Promise<TurnResult> {
    const logContext = { call_id: input.callId, namespace: input.namespace, turn_id: input.turnId };
    const settings = await this.loadSettings(input.namespace, logContext);
    const fallbackText = settings?.fallbackText ?? this.fallbackText;

    const retrieval = await retrieveWithDeadline({
      retriever: this.retriever,
      namespace: input.namespace,
      query: input.utterance,
      k: settings?.topK ?? this.topK,
      timeoutMs: this.retrievalTimeoutMs,
      signal: input.signal,
      logContext,
    });
    const snippets = retrieval.context.snippets;

    const prompt = composePrompt(input.utterance, snippets);
    log.info(
      {
        event: 'turn_prompt_composed',
        prompt_shape: prompt.shape,
        context_snippets: snippets.length,
        retrieval_degraded: retrieval.degraded,
        ...logContext,
      },
      'turn prompt composed',
    );

    let completion: string;
    const endTimer = startStageTimer('completion', input.namespace);
    try {
      completion = await raceWithAbort(
        withTimeout(
          this.completion.complete(prompt, { signal: input.signal, logContext }),
          this.completionTimeoutMs,
          'completion',
        ),
        input.signal,
      );
    } catch (error) {
      if (error instanceof AbortedError) {
        throw error;
      }
      incStageError('completion', input.namespace);
      log.error(
        {
          err: error,
          event: error instanceof TimeoutError ? 'completion_timeout' : 'completion_failed',
          ...logContext,
        },
        'completion failed - using fallback reply',
      );
      return {
        responseText: fallbackText,
        actions: [],
        source: 'fallback',
        promptShape: prompt.shape,
        contextSnippets: snippets.length,
        retrievalDegraded: retrieval.degraded,
      };
    } finally {
      endTimer();
    }

    const parsed = parseCompletion(completion);
    const actions = toScheduledActions(parsed.intents, input);
    const responseText = parsed.text || (actions.length > 0 ? BOOKING_CONFIRMATION_TEXT : fallbackText);
    const source: ReplySource = parsed.text || actions.length > 0 ? 'completion' : 'fallback';

    log.info(
      {
        event: 'turn_completed',
        reply_source: source,
        reply_preview: previewText(responseText),
        reply_length: responseText.length,
        actions: actions.map((action) => action.kind),
        ...logContext,
      },
      'turn completed',
    );

    return {
      responseText,
      actions,
      source,
      promptShape: prompt.shape,
      contextSnippets: snippets.length,
      retrievalDegraded: retrieval.degraded,
    };
  }

  private async loadSettings(
    namespace: Namespace,
    logContext: Record<string, unknown>,
  ): Promise<NamespaceTurnSettings | null> {
    if (!this.namespaceSettings) {
      return null;
    }
    try {
      return await this.namespaceSettings(namespace);
    } catch (error) {
      log.warn({ err: error, event: 'namespace_settings_failed', ...logContext }, 'namespace settings unavailable');
      return null;
    }
  }
}
