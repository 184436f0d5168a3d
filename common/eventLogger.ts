/**
 * Event Logger - JSONL format event logging system
 * Logs emulator events to daily JSONL files under events/YYYY-MM-DD/
 */

import * as fs from 'fs';
import * as path from 'path';
import { Event, EventSource, EventStatus, EventType } from './types';

function isEvent(value: unknown): value is Event {
  return (
    typeof value === 'object' &&
    value !== null &&
    'ts' in value &&
    typeof value.ts === 'string' &&
    'type' in value &&
    typeof value.type === 'string' &&
    'key' in value &&
    typeof value.key === 'string'
  );
}

export class EventLogger {
  private eventsDir: string;
  private enabled: boolean;

  constructor(
    eventsBaseDir: string = process.env.EMULATOR_EVENTS_DIR || './events',
    enabled: boolean = process.env.EMULATOR_EVENTS_DISABLED !== '1'
  ) {
    this.eventsDir = eventsBaseDir;
    this.enabled = enabled;
  }

  /**
   * Append an event to today's JSONL file
   */
  public appendEvent(event: Omit<Event, 'ts'>): void {
    if (!this.enabled) {
      return;
    }

    try {
      const fullEvent: Event = {
        ts: new Date().toISOString(),
        type: event.type,
        source: event.source,
        key: event.key,
        status: event.status,
        latency_ms: event.latency_ms,
        details: event.details,
        actor: event.actor || 'system'
      };

      const dailyDir = path.join(this.eventsDir, this.getTodayString());
      if (!fs.existsSync(dailyDir)) {
        fs.mkdirSync(dailyDir, { recursive: true });
      }

      const logFile = path.join(dailyDir, 'events.jsonl');
      fs.appendFileSync(logFile, JSON.stringify(fullEvent) + '\n', 'utf8');
    } catch (error) {
      console.error('Failed to append event:', error);
    }
  }

  /**
   * Helper: Record an orchestrator lifecycle transition
   */
  public recordLifecycle(
    sessionId: string,
    phase: string,
    status: EventStatus,
    details?: Record<string, unknown>
  ): void {
    this.appendEvent({
      type: 'emulator.lifecycle',
      source: 'orchestrator',
      key: `${sessionId}:${phase}`,
      status,
      details
    });
  }

  /**
   * Helper: Record a native tool invocation (probe or forwarding)
   */
  public recordNativeCommand(
    type: Extract<EventType, 'emulator.probe' | 'domain.forward'>,
    source: EventSource,
    command: string,
    status: EventStatus,
    latency_ms: number,
    details?: Record<string, unknown>
  ): void {
    this.appendEvent({
      type,
      source,
      key: command,
      status,
      latency_ms,
      details
    });
  }

  /**
   * Helper: Record a domain change coming from the mining loop or the API
   */
  public recordDomainChange(
    domain: string,
    actor: string,
    status: EventStatus,
    details?: Record<string, unknown>
  ): void {
    this.appendEvent({
      type: actor === 'system' ? 'domain.apply' : 'api.config',
      source: actor === 'system' ? 'domain' : 'api',
      key: domain,
      status,
      actor,
      details
    });
  }

  /**
   * Read events from a specific date
   */
  public readEvents(date: string): Event[] {
    const logFile = path.join(this.eventsDir, date, 'events.jsonl');

    if (!fs.existsSync(logFile)) {
      return [];
    }

    const content = fs.readFileSync(logFile, 'utf8');
    const lines = content.split('\n').filter(line => line.trim());

    const events: Event[] = [];
    for (const line of lines) {
      const parsed: unknown = JSON.parse(line);
      if (isEvent(parsed)) {
        events.push(parsed);
      }
    }
    return events;
  }

  private getTodayString(): string {
    const now = new Date();
    const year = now.getFullYear();
    const month = String(now.getMonth() + 1).padStart(2, '0');
    const day = String(now.getDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
  }
}

// Export singleton instance
export const eventLogger = new EventLogger();
