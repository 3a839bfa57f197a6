import fs from 'fs';
import path from 'path';

interface LogEvent {
  timestamp: string;
  event: string;
  correlation_id: string;
  payload: Record<string, unknown>;
}

export interface Logger {
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  event(event: string, correlationId: string, payload: Record<string, unknown>): void;
}

let eventLogPath: string | null = process.env.KNOWLEDGE_TREE_EVENT_LOG || null;
let quiet = false;

/** Point structured events at an NDJSON file, or pass null to stop writing them. */
export function setEventLogPath(filePath: string | null): void {
  eventLogPath = filePath;
}

export function getEventLogPath(): string | null {
  return eventLogPath;
}

/** Silences console output (the NDJSON file still receives events). */
export function setQuiet(value: boolean): void {
  quiet = value;
}

function appendEvent(row: LogEvent): void {
  if (!eventLogPath) return;
  try {
    fs.mkdirSync(path.dirname(eventLogPath), { recursive: true });
    fs.appendFileSync(eventLogPath, `${JSON.stringify(row)}\n`, 'utf8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error('[KnowledgeTree] Failed to append structured log:', message);
  }
}

export function createLogger(scope: string): Logger {
  const prefix = `[KnowledgeTree][${scope}]`;

  return {
    info(message, ...details) {
      if (!quiet) console.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (!quiet) console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      if (!quiet) console.error(`${prefix} ${message}`, ...details);
    },
    event(event, correlationId, payload) {
      const row: LogEvent = {
        timestamp: new Date().toISOString(),
        event,
        correlation_id: correlationId,
        payload,
      };
      if (!quiet) console.log(`${prefix} ${event}`, JSON.stringify(row));
      appendEvent(row);
    },
  };
}
