import { log } from '../log';
import type { Namespace, ScheduledAction } from '../calls/types';
import type { NamespaceConfig } from '../namespaces/namespaceConfig';

/** Books a scheduled action with the namespace's calendar/CRM and returns its external id. */
export interface CalendarBooker {
  book(namespace: Namespace, action: ScheduledAction): Promise<string>;
}

export class CalendarNotConfiguredError extends Error {
  constructor(namespace: Namespace) {
    super(`calendar not configured for namespace: ${namespace}`);
    this.name = 'CalendarNotConfiguredError';
  }
}

const DEFAULT_APPOINTMENT_MINUTES = 60;
const DEFAULT_TIME_ZONE = 'America/Los_Angeles';

export interface HttpCalendarBookerOptions {
  /** Resolves the namespace's calendar settings; credentials never cross namespaces. */
  resolveConfig: (namespace: Namespace) => Promise<NamespaceConfig | null>;
  defaultUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export function buildCalendarEvent(action: ScheduledAction, timeZone: string): Record<string, unknown> {
  const end = new Date(action.scheduledTime.getTime() + DEFAULT_APPOINTMENT_MINUTES * 60_000);
  const description = [
    `Customer: ${action.customerName}`,
    `Phone: ${action.customerPhone}`,
    action.customerAddress ? `Address: ${action.customerAddress}` : undefined,
    `Issue: ${action.issueType}`,
    `Call: ${action.callId}`,
  ]
    .filter((line): line is string => line !== undefined)
    .join('\n');

  return {
    summary: `${action.issueType} - ${action.customerName}`,
    description,
    start: { dateTime: action.scheduledTime.toISOString(), timeZone },
    end: { dateTime: end.toISOString(), timeZone },
    external_key: `${action.callId}:${action.actionId}`,
  };
}

export class HttpCalendarBooker implements CalendarBooker {
  private readonly resolveConfig: HttpCalendarBookerOptions['resolveConfig'];
  private readonly defaultUrl?: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpCalendarBookerOptions) {
    this.resolveConfig = options.resolveConfig;
    this.defaultUrl = options.defaultUrl;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  public async book(namespace: Namespace, action: ScheduledAction): Promise<string> {
    if (action.namespace !== namespace) {
      throw new Error(`action ${action.actionId} belongs to namespace ${action.namespace}, not ${namespace}`);
    }

    const config = await this.resolveConfig(namespace);
    const calendar = config?.calendar;
    const url = calendar?.url ?? this.defaultUrl;
    if (!calendar || !url) {
      throw new CalendarNotConfiguredError(namespace);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(`${url.replace(/\/$/, '')}/events`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${calendar.credentialRef}`,
          'X-Namespace': namespace,
        },
        body: JSON.stringify(buildCalendarEvent(action, calendar.timeZone ?? DEFAULT_TIME_ZONE)),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text();
        const preview = body.length > 500 ? `${body.slice(0, 500)}...` : body;
        throw new Error(`calendar booking failed ${response.status}: ${preview}`);
      }

      const data = (await response.json()) as { id?: unknown; event_id?: unknown };
      const id = typeof data.id === 'string' ? data.id : typeof data.event_id === 'string' ? data.event_id : '';
      if (!id) {
        throw new Error('calendar booking response missing id');
      }

      log.info(
        {
          event: 'calendar_event_created',
          namespace,
          call_id: action.callId,
          action_id: action.actionId,
          calendar_event_id: id,
        },
        'calendar event created',
      );
      return id;
    } finally {
      clearTimeout(timeout);
    }
  }
}
