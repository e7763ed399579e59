/**
 * Console output for the engine event stream
 */

import { AuditEvent, EngineEventType } from '../models/AuditEvent';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const EVENT_LEVELS: Record<EngineEventType, LogLevel> = {
  ENGINE_STARTED: 'info',
  ENGINE_STOPPED: 'info',
  QUOTE_UPDATED: 'debug',
  ORDER_PLACED: 'info',
  ORDER_REJECTED: 'warn',
  ORDER_CANCEL_REQUESTED: 'info',
  ORDER_CANCEL_FAILED: 'warn',
  ORDER_CANCEL_RACED_FILL: 'warn',
  ORDER_CLOSED: 'debug',
  ORDER_STATUS_FAILED: 'warn',
  ORDER_LOST: 'error',
  ORDER_FILLED: 'info',
  RISK_REJECTED: 'warn',
  HEDGE_EXECUTED: 'info',
  HEDGE_ATTEMPT_FAILED: 'warn',
  HEDGE_FAILED: 'error',
  CYCLE_FAILED: 'warn',
  ENGINE_HALTED: 'error',
  HALT_CLEARED: 'info',
  HALT_CLEAR_FAILED: 'error',
  CONFIG_LOAD: 'info'
};

export function eventLevel(eventType: EngineEventType): LogLevel {
  return EVENT_LEVELS[eventType];
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function formatEvent(event: AuditEvent): string {
  const venue = event.venueId ? ` [${event.venueId}]` : '';
  return `${event.timestamp.toISOString()} ${eventLevel(event.eventType).toUpperCase()} ${event.eventType}${venue} ${JSON.stringify(event.details)}`;
}

/**
 * Builds an AuditService listener that prints events at or above the given level
 */
export function createConsoleSink(minLevel: LogLevel, output: Pick<Console, LogLevel> = console): (event: AuditEvent) => void {
  return (event) => {
    const level = eventLevel(event.eventType);
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) {
      return;
    }
    output[level](formatEvent(event));
  };
}
