/**
 * Processor Package - Declaration Kind Validation
 *
 * Kinds are compared by symbolic name. A host that has no value-type kind at
 * all simply never reports "RECORD", and builder directives then fail
 * validation instead of breaking the engine.
 */

import { VG0020_INVALID_DECLARATION_KIND } from "../diagnostics/codes.js";
import type { DiagnosticReporter } from "../diagnostics/reporter.js";
import type { DeclarationKind, DeclarationNode } from "../model/types.js";

/** Symbolic kind names understood by the engine */
export const KindName = {
  NAMESPACE: "NAMESPACE",
  RECORD: "RECORD",
  INTERFACE: "INTERFACE",
} as const;

export function classifyKind(kindName: string): DeclarationKind {
  switch (kindName) {
    case KindName.NAMESPACE:
      return "namespace";
    case KindName.RECORD:
      return "value-type";
    case KindName.INTERFACE:
      return "interface-like";
    default:
      return "other";
  }
}

export type GenerationPath = "builder" | "interface";

const REQUIREMENTS: Record<GenerationPath, { kind: DeclarationKind; message: string }> = {
  builder: {
    kind: "value-type",
    message: "RecordBuilder only valid for value types.",
  },
  interface: {
    kind: "interface-like",
    message: "RecordInterface only valid for interface-like declarations.",
  },
};

/**
 * Check that `node` has the kind `path` generates from.
 * Reports an error and returns false otherwise.
 */
export function validateDeclaration<N extends DeclarationNode<N>>(
  node: N,
  path: GenerationPath,
  reporter: DiagnosticReporter<N>,
): boolean {
  const requirement = REQUIREMENTS[path];
  if (classifyKind(node.kindName) === requirement.kind) {
    return true;
  }
  reporter.report({
    code: VG0020_INVALID_DECLARATION_KIND,
    severity: "error",
    message: requirement.message,
    element: node,
  });
  return false;
}
