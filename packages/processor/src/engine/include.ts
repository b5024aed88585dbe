/**
 * Processor Package - Include Directive Expansion
 *
 * An include directive applies generation to declarations listed in its
 * `targets` attribute. Targets are handled strictly in list order and
 * independently: one that fails never affects the next.
 */

import {
  VG0001_DIRECTIVE_UNRESOLVED,
  VG0002_TARGETS_UNRESOLVED,
  VG0010_UNRESOLVED_REFERENCE,
} from "../diagnostics/codes.js";
import type { DiagnosticReporter } from "../diagnostics/reporter.js";
import {
  DEFAULT_NAMESPACE_PATTERN,
  DirectiveAttribute,
  type IncludeDirective,
} from "../model/directives.js";
import type { DeclarationNode, DirectiveMirror, TypeReference } from "../model/types.js";
import { buildNamespaceName } from "./namespace.js";

/**
 * Called once per resolved target with its computed output namespace.
 */
export type IncludedTargetHandler<N> = (target: N, namespace: string, mirror: DirectiveMirror<N>) => void;

/**
 * Expand one include directive on `host`.
 */
export function expandInclude<N extends DeclarationNode<N>>(
  directive: IncludeDirective,
  host: N,
  reporter: DiagnosticReporter<N>,
  onTarget: IncludedTargetHandler<N>,
): void {
  const mirror = host.findDirective(directive.identity);
  if (mirror === null) {
    reporter.report({
      code: VG0001_DIRECTIVE_UNRESOLVED,
      severity: "error",
      message: `Could not resolve directive for: ${directive.identity}`,
      element: host,
    });
    return;
  }

  const targets = readTargets(mirror);
  if (targets.length === 0) {
    reporter.report({
      code: VG0002_TARGETS_UNRESOLVED,
      severity: "error",
      message: `Could not resolve target list for: ${directive.identity}`,
      element: host,
    });
    return;
  }

  const pattern = readStringAttribute(mirror, DirectiveAttribute.NAMESPACE_PATTERN) ?? DEFAULT_NAMESPACE_PATTERN;

  for (const reference of targets) {
    const target = reference.resolve();
    if (target === null) {
      reporter.report({
        code: VG0010_UNRESOLVED_REFERENCE,
        severity: "error",
        message: `Could not resolve declaration for: ${reference.text}`,
        element: host,
      });
      continue;
    }

    const namespace = buildNamespaceName(pattern, host, target, reporter);
    if (namespace === undefined) {
      continue;
    }

    onTarget(target, namespace, mirror);
  }
}

/* =============================================================================
 * ATTRIBUTE READERS
 * ============================================================================= */

export function readTargets<N>(mirror: DirectiveMirror<N>): readonly TypeReference<N>[] {
  const value = mirror.value(DirectiveAttribute.TARGETS);
  return value?.kind === "types" ? value.value : [];
}

export function readStringAttribute<N>(mirror: DirectiveMirror<N>, name: string): string | undefined {
  const value = mirror.value(name);
  return value?.kind === "string" ? value.value : undefined;
}

/**
 * `addBuilder`, defaulting to true when the directive or attribute is absent.
 */
export function readAddBuilder<N>(mirror: DirectiveMirror<N> | null): boolean {
  const value = mirror?.value(DirectiveAttribute.ADD_BUILDER);
  return value?.kind === "boolean" ? value.value : true;
}
