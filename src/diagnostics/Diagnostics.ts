/**
 * Diagnostics channel
 *
 * Degradation signals as structured records. Each component receives the
 * channel explicitly and records what it absorbed (unresolved fields,
 * timeouts, skipped items, challenges). Records are also logged.
 */

import { logger as rootLogger, type Logger } from "@/config/logger";
import { getTimestampWithTimezone } from "@/utils/timestamp";

export type DiagnosticKind =
  | "field_unresolved"
  | "selector_error"
  | "transport_timeout"
  | "navigation_error"
  | "challenge_detected"
  | "session_invalid"
  | "no_results"
  | "no_reviews"
  | "item_skipped"
  | "page_heuristic"
  | "auth_unverified"
  | "cookies_missing";

export type DiagnosticComponent = "resolver" | "auth" | "discovery" | "harvester" | "pipeline";

export interface Diagnostic {
  kind: DiagnosticKind;
  component: DiagnosticComponent;
  message: string;
  context: Record<string, unknown>;
  at: string;
}

type LogLevel = "debug" | "info" | "warn";

const LEVEL_BY_KIND: Record<DiagnosticKind, LogLevel> = {
  field_unresolved: "debug",
  selector_error: "debug",
  transport_timeout: "warn",
  navigation_error: "warn",
  challenge_detected: "warn",
  session_invalid: "warn",
  no_results: "warn",
  no_reviews: "info",
  item_skipped: "info",
  page_heuristic: "warn",
  auth_unverified: "warn",
  cookies_missing: "warn",
};

export class Diagnostics {
  private readonly records: Diagnostic[] = [];

  constructor(private readonly logger: Logger = rootLogger.child({ component: "diagnostics" })) {}

  record(
    kind: DiagnosticKind,
    component: DiagnosticComponent,
    message: string,
    context: Record<string, unknown> = {},
  ): Diagnostic {
    const diagnostic: Diagnostic = {
      kind,
      component,
      message,
      context,
      at: getTimestampWithTimezone(),
    };
    this.records.push(diagnostic);
    this.logger[LEVEL_BY_KIND[kind]]({ kind, component, ...context }, message);
    return diagnostic;
  }

  list(): readonly Diagnostic[] {
    return this.records;
  }

  byKind(kind: DiagnosticKind): Diagnostic[] {
    return this.records.filter((d) => d.kind === kind);
  }

  has(kind: DiagnosticKind): boolean {
    return this.records.some((d) => d.kind === kind);
  }

  /**
   * Count per kind, for the end-of-run summary
   */
  summary(): Partial<Record<DiagnosticKind, number>> {
    const counts: Partial<Record<DiagnosticKind, number>> = {};
    for (const { kind } of this.records) {
      counts[kind] = (counts[kind] ?? 0) + 1;
    }
    return counts;
  }
}
