import type { ProcessorDiagnosticCode } from "./codes.js";

/** Diagnostics never stop processing; severity only affects presentation */
export type DiagnosticSeverity = "error" | "note";

export interface ProcessorDiagnostic<N> {
  readonly code: ProcessorDiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  /** Declaration the diagnostic is attached to */
  readonly element: N;
}

/**
 * Process-wide, append-only diagnostic channel.
 * Implementations must not throw back into the engine.
 */
export interface DiagnosticReporter<N> {
  report(diagnostic: ProcessorDiagnostic<N>): void;
}

export interface CollectingReporter<N> extends DiagnosticReporter<N> {
  readonly diagnostics: readonly ProcessorDiagnostic<N>[];
  errors(): ProcessorDiagnostic<N>[];
}

/**
 * Reporter that keeps every diagnostic in arrival order.
 * Optionally forwards each one (e.g. to a logger).
 */
export function createCollectingReporter<N>(
  forward?: (diagnostic: ProcessorDiagnostic<N>) => void,
): CollectingReporter<N> {
  const diagnostics: ProcessorDiagnostic<N>[] = [];
  return {
    diagnostics,
    report(diagnostic) {
      diagnostics.push(diagnostic);
      forward?.(diagnostic);
    },
    errors() {
      return diagnostics.filter(d => d.severity === "error");
    },
  };
}
