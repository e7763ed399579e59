/**
 * Engine event stream models
 */

export type EngineEventType =
  | 'ENGINE_STARTED'
  | 'ENGINE_STOPPED'
  | 'QUOTE_UPDATED'
  | 'ORDER_PLACED'
  | 'ORDER_REJECTED'
  | 'ORDER_CANCEL_REQUESTED'
  | 'ORDER_CANCEL_FAILED'
  | 'ORDER_CANCEL_RACED_FILL'
  | 'ORDER_CLOSED'
  | 'ORDER_STATUS_FAILED'
  | 'ORDER_LOST'
  | 'ORDER_FILLED'
  | 'RISK_REJECTED'
  | 'HEDGE_EXECUTED'
  | 'HEDGE_ATTEMPT_FAILED'
  | 'HEDGE_FAILED'
  | 'CYCLE_FAILED'
  | 'ENGINE_HALTED'
  | 'HALT_CLEARED'
  | 'HALT_CLEAR_FAILED'
  | 'CONFIG_LOAD';

export type EventDetails = Record<string, unknown>;

export interface AuditEvent {
  eventId: string;
  sequence: number;
  timestamp: Date;
  eventType: EngineEventType;
  venueId?: string;
  details: EventDetails;
  signature: string;
}
