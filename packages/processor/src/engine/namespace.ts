/**
 * Processor Package - Namespace Resolution
 *
 * Output namespaces of included targets come from a pattern:
 * - `*` → the target's enclosing namespace
 * - `@` → the namespace carrying the include directive
 *
 * e.g. "*" (next to the target), "@.impl" (next to the directive),
 * "*.generated".
 */

import { VG0011_NO_ENCLOSING_NAMESPACE } from "../diagnostics/codes.js";
import type { DiagnosticReporter } from "../diagnostics/reporter.js";
import type { DeclarationNode } from "../model/types.js";
import { classifyKind } from "./validate.js";

export const TARGET_NAMESPACE_TOKEN = "*";
export const HOST_NAMESPACE_TOKEN = "@";
const TOKEN_PATTERN = /[*@]/g;

/**
 * Nearest enclosing namespace of a node, or null when the chain ends first.
 * The node itself is not considered.
 */
export function findEnclosingNamespace<N extends DeclarationNode<N>>(node: N): N | null {
  let current = node.enclosing;
  while (current !== null) {
    if (classifyKind(current.kindName) === "namespace") {
      return current;
    }
    current = current.enclosing;
  }
  return null;
}

/**
 * Like `findEnclosingNamespace`, but reports an error at `originating` when no
 * namespace is found.
 */
export function resolveEnclosingNamespace<N extends DeclarationNode<N>>(
  node: N,
  reporter: DiagnosticReporter<N>,
  originating: N = node,
): N | undefined {
  const namespace = findEnclosingNamespace(node);
  if (namespace === null) {
    reporter.report({
      code: VG0011_NO_ENCLOSING_NAMESPACE,
      severity: "error",
      message: "Element has no enclosing namespace",
      element: originating,
    });
    return undefined;
  }
  return namespace;
}

/**
 * Render an output namespace from a pattern.
 *
 * Returns undefined when a needed namespace can't be resolved; the error has
 * already been reported.
 */
export function buildNamespaceName<N extends DeclarationNode<N>>(
  pattern: string,
  host: N,
  target: N,
  reporter: DiagnosticReporter<N>,
): string | undefined {
  const targetNamespace = resolveEnclosingNamespace(target, reporter);
  if (targetNamespace === undefined) {
    return undefined;
  }

  let hostName: string | undefined;
  if (pattern.includes(HOST_NAMESPACE_TOKEN)) {
    const hostNamespace = classifyKind(host.kindName) === "namespace"
      ? host
      : resolveEnclosingNamespace(host, reporter);
    if (hostNamespace === undefined) {
      return undefined;
    }
    hostName = hostNamespace.qualifiedName;
  }

  // One pass over the pattern; substituted names are never rescanned.
  const targetName = targetNamespace.qualifiedName;
  return pattern.replace(TOKEN_PATTERN, token =>
    token === TARGET_NAMESPACE_TOKEN ? targetName : hostName ?? token);
}
