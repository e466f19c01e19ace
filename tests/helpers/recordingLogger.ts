import { StructuredLogger, type LogEntry, type LogLevel } from "../../src/logger.js";

/**
 * Logger capturing its entries in memory. Lines are written to a discarding
 * stream so test output stays clean, and timestamps are pinned to the epoch.
 */
export class RecordingLogger extends StructuredLogger {
  public readonly entries: LogEntry[];

  constructor() {
    const entries: LogEntry[] = [];
    super({
      logFile: null,
      stream: { write: () => true },
      onEntry: (entry) => entries.push(entry),
      now: () => new Date(0),
    });
    this.entries = entries;
  }

  /** Messages logged at {@link level}, or at any level when omitted. */
  messages(level?: LogLevel): string[] {
    return this.entries.filter((entry) => level === undefined || entry.level === level).map((entry) => entry.message);
  }
}
