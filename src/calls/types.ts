export type CallId = string;
export type Namespace = string;

export type CallDirection = 'inbound' | 'outbound';

export type CallPhase = 'Created' | 'InProgress' | 'Ended';

export type CallStatus = 'in-progress' | 'completed' | 'failed' | 'missed';

export type TerminalCallStatus = Exclude<CallStatus, 'in-progress'>;

export type Speaker = 'user' | 'agent' | 'system';

export interface CallRecord {
  callId: CallId;
  namespace: Namespace;
  direction?: CallDirection;
  phoneNumber?: string;
  phase: CallPhase;
  status: CallStatus;
  startedAt?: Date;
  endedAt?: Date;
  durationSeconds?: number;
  endedReason?: string;
  recordingUrl?: string;
  turns: number;
}

export interface TranscriptEntry {
  callId: CallId;
  /** Conversational position; entries sharing a sequence order user, agent, system. */
  sequence: number;
  speaker: Speaker;
  content: string;
  timestamp: Date | null;
  sentimentScore?: number;
}

export interface ScheduledAction {
  callId: CallId;
  actionId: string;
  namespace: Namespace;
  kind: 'appointment';
  customerName: string;
  customerPhone: string;
  customerAddress?: string;
  issueType: string;
  scheduledTime: Date;
  calendarEventId?: string;
  crmContactId?: string;
}

export interface ExternalReferences {
  calendarEventId?: string;
  crmContactId?: string;
}

export type PersistableEntity =
  | { kind: 'call'; call: CallRecord }
  | { kind: 'transcript'; entry: TranscriptEntry }
  | { kind: 'action'; action: ScheduledAction };

export interface TurnResponse {
  responseText: string;
  actions: ScheduledAction[];
}
