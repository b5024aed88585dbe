/**
 * @valuegen/typescript
 *
 * Runs the valuegen engine over a TypeScript program: decorated classes are
 * read as directives and generated builders and value types are written as
 * `.ts` files.
 *
 * @example
 * ```typescript
 * // src/geo/point.ts
 * import { RecordBuilder } from "@valuegen/processor";
 *
 * @RecordBuilder()
 * export class Point {
 *   constructor(readonly x: number, readonly y: number) {}
 * }
 *
 * // build script
 * import { generate } from "@valuegen/typescript";
 * generate({ rootDir: "src" }); // writes src/geo/PointBuilder.ts
 * ```
 */

// Facade
export { generate, formatDiagnostic } from "./generate.js";
export type { GenerateOptions, GenerateResult } from "./generate.js";
export { createProjectProgram } from "./program.js";
export { loadConfigFile, mergeOptions, CONFIG_FILE_NAME } from "./config.js";
export { collectRound } from "./round.js";

// Model
export { TsProject, generatedModulePath, normalizePath } from "./model/project.js";
export { TsDeclaration, isDeclarationSyntax } from "./model/declaration.js";
export type { DeclarationSyntax } from "./model/declaration.js";
export {
  TsKindName,
  declarationKindName,
  isRecordClass,
  isAbstractInterfaceClass,
} from "./model/kinds.js";
export type { TsKindNameType } from "./model/kinds.js";

// Directives
export {
  DECORATOR_IDENTITIES,
  identityForCallee,
  readDirectives,
  resolveTypeNode,
} from "./directives/read.js";
export type { TsDirectiveMirror } from "./directives/read.js";

// Synthesis
export { TsBuilderSynthesizer, synthesizeBuilderFor } from "./synth/builder.js";
export type { BuilderTarget } from "./synth/builder.js";
export { TsInterfaceSynthesizer, rewriteFieldsToConstructor } from "./synth/interface.js";
export { recordComponents, interfaceMembers, isBindingName, requiredFirst } from "./synth/components.js";
export type { Component, InterfaceMembers } from "./synth/components.js";

// Sinks
export { FileSystemSink } from "./sink/file-system.js";
