export type DiagnosticLevel = "debug" | "info" | "warn" | "error";

export interface Diagnostic {
  ts: string; // ISO timestamp
  level: DiagnosticLevel;
  evt: string; // short event key
  msg: string;
  data?: Record<string, unknown>;
}

const LEVEL_RANK: Record<DiagnosticLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export function levelAtLeast(level: DiagnosticLevel, threshold: DiagnosticLevel) {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

/**
 * Collects the events an operation wants to report. Callers decide how (and
 * whether) to present them; nothing in here writes to the console.
 */
export class Diagnostics {
  private readonly records: Diagnostic[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  record(level: DiagnosticLevel, evt: string, msg: string, data?: Record<string, unknown>) {
    this.records.push({ ts: this.now().toISOString(), level, evt, msg, ...(data ? { data } : {}) });
  }

  debug(evt: string, msg: string, data?: Record<string, unknown>) {
    this.record("debug", evt, msg, data);
  }

  info(evt: string, msg: string, data?: Record<string, unknown>) {
    this.record("info", evt, msg, data);
  }

  warn(evt: string, msg: string, data?: Record<string, unknown>) {
    this.record("warn", evt, msg, data);
  }

  error(evt: string, msg: string, data?: Record<string, unknown>) {
    this.record("error", evt, msg, data);
  }

  /** Number of events recorded so far; pair with `since` to slice out one operation's events. */
  get size() {
    return this.records.length;
  }

  since(mark: number): Diagnostic[] {
    return this.records.slice(mark);
  }

  all(): Diagnostic[] {
    return this.records.slice();
  }

  filter(threshold: DiagnosticLevel): Diagnostic[] {
    return this.records.filter((entry) => levelAtLeast(entry.level, threshold));
  }

  byEvent(evt: string): Diagnostic[] {
    return this.records.filter((entry) => entry.evt === evt);
  }
}
