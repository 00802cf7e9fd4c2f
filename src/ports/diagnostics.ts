// src/ports/diagnostics.ts
// Diagnostic sink port: where non-fatal warnings go

import { atLeast, type Diagnostic, type DiagnosticSeverity } from "../outcome/diagnostic";

/**
 * Sink port interface.
 * Receives diagnostics that do not abort the operation that produced them.
 */
export interface DiagnosticSink {
  report(diagnostic: Diagnostic): void;
}

export type LogLevel = DiagnosticSeverity | "silent";

function formatDiagnostic(d: Diagnostic): string {
  const where = d.span ? ` (${d.span.start}-${d.span.end} in ${JSON.stringify(d.span.source)})` : "";
  return `[tagmatch] ${d.code} ${d.severity}: ${d.message}${where}`;
}

/**
 * Writes diagnostics at or above `minSeverity` to the console.
 */
export function consoleSink(minSeverity: LogLevel = "warning"): DiagnosticSink {
  return {
    report(d) {
      if (minSeverity === "silent" || !atLeast(d.severity, minSeverity)) return;
      const line = formatDiagnostic(d);
      switch (d.severity) {
        case "error":
          console.error(line);
          break;
        case "warning":
          console.warn(line);
          break;
        default:
          console.info(line);
      }
    },
  };
}

export type CollectingSink = DiagnosticSink & {
  readonly diagnostics: readonly Diagnostic[];
  clear(): void;
};

/**
 * Keeps every reported diagnostic in memory.
 */
export function collectingSink(): CollectingSink {
  const diagnostics: Diagnostic[] = [];
  return {
    diagnostics,
    report(d) {
      diagnostics.push(d);
    },
    clear() {
      diagnostics.length = 0;
    },
  };
}

export const silentSink: DiagnosticSink = {
  report() {},
};
