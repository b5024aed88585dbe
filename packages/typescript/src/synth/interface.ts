/**
 * TypeScript Host - Value Types from Interfaces
 *
 * `interface Person { name: string; age?: number }` becomes
 *
 *   export class PersonRecord implements Person {
 *       constructor(
 *           readonly name: Person["name"],
 *           readonly age?: Person["age"],
 *       ) {}
 *   }
 *
 * The synthesizer produces the class with one readonly field per component;
 * the rewriter moves the fields into the constructor.
 */

import ts from "typescript";
import {
  DirectiveIdentity,
  VG0021_INVALID_INTERFACE_MEMBER,
  block,
  escapeString,
  type GenerationConfiguration,
  type InterfaceSynthesis,
  type InterfaceSynthesizer,
  type SourceArtifact,
  type SynthesisContext,
} from "@valuegen/processor";
import type { TsDeclaration } from "../model/declaration.js";
import { generatedModulePath } from "../model/project.js";
import { synthesizeBuilderFor } from "./builder.js";
import { interfaceMembers, requiredFirst } from "./components.js";

export class TsInterfaceSynthesizer implements InterfaceSynthesizer<TsDeclaration> {
  synthesizeValueType(
    declaration: TsDeclaration,
    addBuilder: boolean,
    context: SynthesisContext<TsDeclaration>,
  ): InterfaceSynthesis | null {
    const { node, project } = declaration;
    if (!ts.isInterfaceDeclaration(node) && !ts.isClassDeclaration(node)) {
      return null;
    }

    const members = interfaceMembers(node, project.checker);
    if (members.invalid.length > 0 || members.unusableNames.length > 0) {
      for (const name of members.invalid) {
        context.reporter.report({
          code: VG0021_INVALID_INTERFACE_MEMBER,
          severity: "error",
          message: `RecordInterface declarations may only declare properties: ${name}`,
          element: declaration,
        });
      }
      for (const name of members.unusableNames) {
        context.reporter.report({
          code: VG0021_INVALID_INTERFACE_MEMBER,
          severity: "error",
          message: `RecordInterface property names must be usable as identifiers: ${name}`,
          element: declaration,
        });
      }
      return null;
    }

    const { config } = context;
    const sourceFile = declaration.sourceFile;
    const namespace = context.namespaceOverride ?? project.namespaceOf(sourceFile);
    const interfaceName = declaration.localPath;
    const simpleName = `${declaration.simpleName}${config.interfaceSuffix}`;
    const components = requiredFirst(members.components);

    const valueType: SourceArtifact = {
      namespace,
      simpleName,
      imports: [{
        names: [interfaceName.split(".")[0] ?? interfaceName],
        modulePath: project.modulePath(sourceFile),
        typeOnly: true,
      }],
      marker: DirectiveIdentity.INTERFACE,
      declaration: [
        block(
          `export class ${simpleName} implements ${interfaceName} {`,
          components.map(c =>
            `readonly ${c.name}${c.optional ? "?" : ""}: ${interfaceName}["${escapeString(c.name)}"];`),
        ),
      ],
    };

    const builder = addBuilder
      ? synthesizeBuilderFor({
          namespace,
          importName: simpleName,
          modulePath: generatedModulePath(namespace, simpleName),
          typeName: simpleName,
          simpleName,
          components,
        }, config)
      : null;

    return {
      valueType,
      rewrite: (source) => rewriteFieldsToConstructor(source, simpleName, config),
      builder,
    };
  }
}

/* =============================================================================
 * REWRITER
 * ============================================================================= */

/**
 * Replace the readonly instance fields of class `className` with a constructor
 * declaring them as parameter properties. Other text is kept as is.
 */
export function rewriteFieldsToConstructor(
  source: string,
  className: string,
  config: Pick<GenerationConfiguration, "fileIndent">,
): string {
  const sourceFile = ts.createSourceFile("rewrite.ts", source, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);
  const cls = sourceFile.statements.find(
    (s): s is ts.ClassDeclaration => ts.isClassDeclaration(s) && s.name?.text === className,
  );
  if (cls === undefined) return source;

  const fields = cls.members.filter((m): m is ts.PropertyDeclaration =>
    ts.isPropertyDeclaration(m) &&
    (ts.getModifiers(m) ?? []).some(mod => mod.kind === ts.SyntaxKind.ReadonlyKeyword) &&
    !(ts.getModifiers(m) ?? []).some(mod => mod.kind === ts.SyntaxKind.StaticKeyword));
  const first = fields[0];
  const last = fields[fields.length - 1];
  if (first === undefined || last === undefined) return source;

  const indent = config.fileIndent;
  const parameters = fields.map(f => {
    const optional = f.questionToken !== undefined ? "?" : "";
    const type = f.type !== undefined ? `: ${f.type.getText(sourceFile)}` : "";
    return `${indent}${indent}readonly ${f.name.getText(sourceFile)}${optional}${type},`;
  });
  const ctor = [`constructor(`, ...parameters, `${indent}) {}`].join("\n");

  return source.slice(0, first.getStart(sourceFile)) + ctor + source.slice(last.getEnd());
}
