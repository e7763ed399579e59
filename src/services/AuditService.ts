import { createHmac, randomBytes } from 'crypto';
import { AuditEvent, EngineEventType, EventDetails } from '../models/AuditEvent';

export type EventListener = (event: AuditEvent) => void;

export interface AuditServiceOptions {
  signingKey?: Buffer;
  /** Oldest events are dropped once the log holds this many */
  maxEvents?: number;
}

const SENSITIVE_KEYS = ['apikey', 'secret', 'password', 'privatekey', 'credential', 'token', 'passphrase'];

/**
 * Audit Service is the engine's append-only event stream.
 * Events are redacted, HMAC-signed and then handed to subscribers.
 */
export class AuditService {
  private auditLog: AuditEvent[] = [];
  private readonly signingKey: Buffer;
  private readonly maxEvents: number;
  private listeners: EventListener[] = [];
  private sequence = 0;

  constructor(options: AuditServiceOptions = {}) {
    this.signingKey = options.signingKey ?? randomBytes(32);
    this.maxEvents = options.maxEvents ?? 10000;
  }

  /**
   * Records an engine event and notifies subscribers
   */
  logEvent(eventType: EngineEventType, details: EventDetails = {}, venueId?: string): AuditEvent {
    const redactedDetails = this.redactSensitiveData(details);
    const unsigned = {
      eventId: randomBytes(16).toString('hex'),
      sequence: ++this.sequence,
      timestamp: new Date(),
      eventType,
      venueId,
      details: redactedDetails
    };

    const auditEvent: AuditEvent = {
      ...unsigned,
      signature: this.generateSignature(unsigned)
    };

    this.auditLog.push(auditEvent);
    if (this.auditLog.length > this.maxEvents) {
      this.auditLog.splice(0, this.auditLog.length - this.maxEvents);
    }

    for (const listener of this.listeners) {
      try {
        listener(auditEvent);
      } catch (error) {
        // a broken subscriber must not break the engine
        console.error('Event listener error:', error);
      }
    }

    return auditEvent;
  }

  /**
   * Adds a listener; returns the function that removes it
   */
  subscribe(listener: EventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  /**
   * Exports events, optionally restricted to a time range
   */
  exportEvents(startDate?: Date, endDate?: Date): AuditEvent[] {
    return this.auditLog
      .filter(event => {
        if (startDate && event.timestamp < startDate) return false;
        if (endDate && event.timestamp > endDate) return false;
        return true;
      })
      .map(event => ({ ...event, details: { ...event.details } }));
  }

  getEventsByType(eventType: EngineEventType): AuditEvent[] {
    return this.auditLog.filter(event => event.eventType === eventType);
  }

  /**
   * Verifies every retained event still matches its signature
   */
  verifyLogIntegrity(): boolean {
    return this.auditLog.every(event => {
      const { signature, ...unsigned } = event;
      return signature === this.generateSignature(unsigned);
    });
  }

  getAllEvents(): AuditEvent[] {
    return [...this.auditLog];
  }

  /**
   * Clears the log (for testing purposes only)
   */
  clearLog(): void {
    this.auditLog = [];
  }

  private generateSignature(eventData: Omit<AuditEvent, 'signature'>): string {
    const signingData = {
      eventId: eventData.eventId,
      sequence: eventData.sequence,
      timestamp: eventData.timestamp.toISOString(),
      eventType: eventData.eventType,
      venueId: eventData.venueId ?? null,
      details: JSON.stringify(eventData.details, Object.keys(eventData.details).sort())
    };

    const dataString = JSON.stringify(signingData, Object.keys(signingData).sort());
    return createHmac('sha256', this.signingKey)
      .update(dataString)
      .digest('hex');
  }

  private redactSensitiveData(data: EventDetails): EventDetails {
    const redacted: EventDetails = {};

    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase();

      if (SENSITIVE_KEYS.some(sensitiveKey => lowerKey.includes(sensitiveKey))) {
        redacted[key] = '[REDACTED]';
      } else if (Array.isArray(value)) {
        redacted[key] = value.map(item => (isPlainObject(item) ? this.redactSensitiveData(item) : item));
      } else if (isPlainObject(value)) {
        redacted[key] = this.redactSensitiveData(value);
      } else {
        redacted[key] = value;
      }
    }

    return redacted;
  }
}

function isPlainObject(value: unknown): value is EventDetails {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}
