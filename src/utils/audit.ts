import type { AuditEvent, AuditEventType, AuditSink, Clock } from "../types";
import * as logger from "./logger";
import { nowIso, systemClock } from "./time";

export function recordAudit(event: AuditEvent): void {
  const line = `[AUDIT] ${event.at} [${event.type}] vendor=${event.vendorId} ${event.message}`;
  if (event.type.endsWith("_VIOLATION") || event.type === "CONCURRENCY_CONFLICT") {
    logger.error(line, event.meta);
  } else {
    logger.info(line, event.meta);
  }
}

/** Stdout-only sink; use the SQLite sink to keep events for reconciliation. */
export const consoleAuditSink: AuditSink = {
  async record(event) {
    recordAudit(event);
  },
};

export function auditEvent(
  type: AuditEventType,
  vendorId: string,
  message: string,
  meta?: Record<string, unknown>,
  clock: Clock = systemClock
): AuditEvent {
  return { type, vendorId, message, at: nowIso(clock), meta };
}

/** Fans one event out to several sinks, e.g. console + database. */
export function combineAuditSinks(...sinks: AuditSink[]): AuditSink {
  return {
    async record(event) {
      for (const sink of sinks) {
        await sink.record(event);
      }
    },
  };
}
