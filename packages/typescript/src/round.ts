/**
 * TypeScript Host - Round Collection
 *
 * One generation round: every decorated class in the project, grouped by the
 * directive it carries. A directive with an attribute that can't be evaluated
 * at compile time is reported and left out of the round.
 */

import ts from "typescript";
import {
  VG0003_ATTRIBUTE_NOT_CONSTANT,
  type DiagnosticReporter,
  type RoundInput,
} from "@valuegen/processor";
import type { TsDeclaration } from "./model/declaration.js";
import type { TsProject } from "./model/project.js";

export function collectRound(project: TsProject, reporter: DiagnosticReporter<TsDeclaration>): RoundInput<TsDeclaration> {
  const directives = new Map<string, TsDeclaration[]>();

  const visit = (node: ts.Node): void => {
    if (ts.isClassDeclaration(node)) {
      const declaration = project.declarationFor(node);
      for (const mirror of declaration.directives()) {
        if (mirror.nonConstant.length > 0) {
          for (const attribute of mirror.nonConstant) {
            reporter.report({
              code: VG0003_ATTRIBUTE_NOT_CONSTANT,
              severity: "error",
              message: `Attribute ${attribute} of ${mirror.identity} must be a constant`,
              element: declaration,
            });
          }
          continue;
        }
        const elements = directives.get(mirror.identity);
        if (elements === undefined) {
          directives.set(mirror.identity, [declaration]);
        } else if (!elements.includes(declaration)) {
          elements.push(declaration);
        }
      }
    }
    ts.forEachChild(node, visit);
  };

  for (const sourceFile of project.projectFiles()) {
    ts.forEachChild(sourceFile, visit);
  }
  return { directives };
}
