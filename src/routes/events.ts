import { NextFunction, Request, Response, Router } from 'express';
import { AbortedError, ProtocolError } from '../errors';
import { log } from '../log';
import type { ScheduledAction } from '../calls/types';
import type { DispatchResult, EventDispatcher } from '../events/eventDispatcher';

export interface SerializedAction {
  action_id: string;
  kind: ScheduledAction['kind'];
  customer_name: string;
  customer_phone: string;
  customer_address?: string;
  issue_type: string;
  scheduled_time: string;
  calendar_event_id?: string;
}

export type EventResponseBody =
  | { event_id: string; response_text: string; actions: SerializedAction[]; duplicate: boolean }
  | { event_id: string; accepted: boolean; duplicate: boolean };

export function serializeAction(action: ScheduledAction): SerializedAction {
  return {
    action_id: action.actionId,
    kind: action.kind,
    customer_name: action.customerName,
    customer_phone: action.customerPhone,
    customer_address: action.customerAddress,
    issue_type: action.issueType,
    scheduled_time: action.scheduledTime.toISOString(),
    calendar_event_id: action.calendarEventId,
  };
}

export function toResponseBody(result: DispatchResult): EventResponseBody {
  const duplicate = result.outcome === 'duplicate';
  if (result.response) {
    return {
      event_id: result.eventId,
      response_text: result.response.responseText,
      actions: result.response.actions.map(serializeAction),
      duplicate,
    };
  }
  return { event_id: result.eventId, accepted: result.outcome !== 'rejected', duplicate };
}

function errorBody(error: unknown): { error: string } | null {
  if (error instanceof ProtocolError) {
    return { error: error.message };
  }
  if (error instanceof AbortedError) {
    return { error: 'call_torn_down' };
  }
  return null;
}

function batchItems(body: unknown): unknown[] | null {
  if (typeof body !== 'object' || body === null || !('events' in body)) {
    return null;
  }
  return Array.isArray(body.events) ? body.events : null;
}

export function createEventsRouter(dispatcher: EventDispatcher): Router {
  const router = Router();

  router.post('/', (req: Request, res: Response, next: NextFunction) => {
    const requestId: unknown = res.locals.requestId;
    const items = batchItems(req.body);

    if (items) {
      // Dispatch enqueues synchronously, so events for one call keep their batch order.
      const settled = items.map(async (item) => {
        try {
          return toResponseBody(await dispatcher.dispatchRaw(item));
        } catch (error) {
          const body = errorBody(error);
          if (!body) {
            throw error;
          }
          log.warn({ requestId, err: error, event: 'event_dropped' }, 'event dropped');
          return body;
        }
      });

      Promise.all(settled)
        .then((results) => {
          res.status(200).json({ results });
        })
        .catch(next);
      return;
    }

    dispatcher
      .dispatchRaw(req.body)
      .then((result) => {
        res.status(200).json(toResponseBody(result));
      })
      .catch((error: unknown) => {
        if (error instanceof ProtocolError) {
          log.warn({ requestId, err: error, event: 'event_dropped' }, 'malformed event dropped');
          res.status(400).json({ error: error.message });
          return;
        }
        if (error instanceof AbortedError) {
          res.status(409).json({ error: 'call_torn_down' });
          return;
        }
        next(error);
      });
  });

  return router;
}
