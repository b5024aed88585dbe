/**
 * TypeScript Host - Builder Synthesis
 *
 * For a value type `Point(x, y)` in module "geo/point":
 *
 *   export class PointBuilder {
 *       #x: Point["x"] | undefined;
 *       static builder(): PointBuilder { ... }
 *       static from(source: Point): PointBuilder { ... }
 *       x(x: Point["x"]): this { ... }
 *       getX(): Point["x"] | undefined { ... }
 *       build(): Point { ... }
 *   }
 *
 * Component types are written as indexed accesses on the value type, so the
 * builder never imports component types of its own.
 */

import ts from "typescript";
import {
  DirectiveIdentity,
  block,
  capitalize,
  escapeString,
  type BuilderSynthesizer,
  type CodeNode,
  type GenerationConfiguration,
  type SourceArtifact,
  type SynthesisContext,
} from "@valuegen/processor";
import type { TsDeclaration } from "../model/declaration.js";
import { recordComponents, type Component } from "./components.js";

/**
 * A value type a builder is generated for.
 */
export interface BuilderTarget {
  /** Output namespace of the builder */
  readonly namespace: string;

  /** Binding imported from `modulePath` */
  readonly importName: string;

  /** Module declaring the value type, relative to the project root */
  readonly modulePath: string;

  /** Reference to the value type from the builder, e.g. "Point" or "Shapes.Point" */
  readonly typeName: string;

  /** Used for the builder's own name */
  readonly simpleName: string;

  /** Constructor parameters, in order */
  readonly components: readonly Component[];
}

export class TsBuilderSynthesizer implements BuilderSynthesizer<TsDeclaration> {
  synthesizeBuilder(valueType: TsDeclaration, context: SynthesisContext<TsDeclaration>): SourceArtifact {
    const { node, project } = valueType;
    const sourceFile = valueType.sourceFile;
    const typeName = valueType.localPath;
    return synthesizeBuilderFor({
      namespace: context.namespaceOverride ?? project.namespaceOf(sourceFile),
      importName: typeName.split(".")[0] ?? typeName,
      modulePath: project.modulePath(sourceFile),
      typeName,
      simpleName: valueType.simpleName,
      components: ts.isClassDeclaration(node) ? recordComponents(node) : [],
    }, context.config);
  }
}

/**
 * Builder artifact for any value type, generated or hand-written.
 */
export function synthesizeBuilderFor(target: BuilderTarget, config: GenerationConfiguration): SourceArtifact {
  const builderName = `${target.simpleName}${config.suffix}`;
  const value = target.typeName;
  const componentType = (c: Component) => `${value}["${escapeString(c.name)}"]`;

  const fields: CodeNode[] = target.components.map(c => `#${c.name}: ${componentType(c)} | undefined;`);

  const factories: CodeNode[] = [
    block(`static ${config.builderMethodName}(): ${builderName} {`, [
      `return new ${builderName}();`,
    ]),
    "",
    block(`static ${config.fromMethodName}(source: ${value}): ${builderName} {`, [
      `const builder = new ${builderName}();`,
      ...target.components.map(c => `builder.#${c.name} = source.${c.name};`),
      "return builder;",
    ]),
  ];

  const accessors: CodeNode[] = target.components.flatMap(c => [
    "",
    block(`${c.name}(${c.name}: ${componentType(c)}): this {`, [
      `this.#${c.name} = ${c.name};`,
      "return this;",
    ]),
    "",
    block(`get${capitalize(c.name)}(): ${componentType(c)} | undefined {`, [
      `return this.#${c.name};`,
    ]),
  ]);

  const build = block(`${config.buildMethodName}(): ${value} {`, [
    ...target.components.flatMap(c => [
      `const ${c.name} = this.#${c.name};`,
      ...(c.optional ? [] : [
        block(`if (${c.name} === undefined) {`, [
          `throw new Error("${escapeString(`${builderName}: ${c.name} is not set`)}");`,
        ]),
      ]),
    ]),
    `return new ${value}(${target.components.map(c => c.name).join(", ")});`,
  ]);

  const body: CodeNode[] = [
    ...fields,
    ...(fields.length > 0 ? [""] : []),
    ...factories,
    ...accessors,
    "",
    build,
  ];

  return {
    namespace: target.namespace,
    simpleName: builderName,
    imports: [{ names: [target.importName], modulePath: target.modulePath }],
    marker: DirectiveIdentity.BUILDER,
    declaration: [block(`export class ${builderName} {`, body)],
  };
}
