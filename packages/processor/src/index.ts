/**
 * @valuegen/processor
 *
 * Host-agnostic engine that turns generation directives into builder and
 * value-type source files.
 *
 * @example
 * ```typescript
 * import { createRecordProcessor, createCollectingReporter, MemorySink } from "@valuegen/processor";
 *
 * const reporter = createCollectingReporter<MyNode>();
 * const sink = new MemorySink<MyNode>();
 * const processor = createRecordProcessor({ reporter, sink, options: {}, builders, interfaces });
 *
 * processor.processRound({ directives: new Map([["valuegen.RecordBuilder", [point]]]) });
 * console.log(sink.files.get("geometry.PointBuilder"));
 * ```
 */

// Engine
export { RecordProcessor, createRecordProcessor } from "./engine/processor.js";
export { expandInclude, readTargets, readStringAttribute, readAddBuilder } from "./engine/include.js";
export type { IncludedTargetHandler } from "./engine/include.js";
export {
  findEnclosingNamespace,
  resolveEnclosingNamespace,
  buildNamespaceName,
  TARGET_NAMESPACE_TOKEN,
  HOST_NAMESPACE_TOKEN,
} from "./engine/namespace.js";
export { classifyKind, validateDeclaration, KindName } from "./engine/validate.js";
export type { GenerationPath } from "./engine/validate.js";
export { emitArtifact, emitValueType, emissionFailureMessage } from "./engine/emit.js";
export type { EmitContext } from "./engine/emit.js";
export type {
  ProcessingEnvironment,
  SynthesisContext,
  BuilderSynthesizer,
  InterfaceSynthesizer,
  InterfaceSynthesis,
} from "./engine/types.js";

// Model
export {
  DirectiveIdentity,
  DirectiveAttribute,
  DEFAULT_NAMESPACE_PATTERN,
  identifyDirective,
  supportedDirectives,
  directiveDisplayName,
} from "./model/directives.js";
export type { DirectiveIdentityType, GenerationDirective, IncludeDirective } from "./model/directives.js";
export type {
  DeclarationKind,
  DeclarationNode,
  DirectiveMirror,
  AttributeValue,
  TypeReference,
  RoundInput,
} from "./model/types.js";

// Directive decorators (imported by user code)
export { RecordBuilder, RecordInterface } from "./decorators.js";
export type {
  DecoratedClass,
  DirectiveDecorator,
  IncludeOptions,
  RecordInterfaceOptions,
} from "./decorators.js";

// Configuration
export {
  loadConfiguration,
  isOptionName,
  DEFAULT_CONFIGURATION,
  OPTION_PREFIX,
} from "./config/loader.js";
export type { GenerationConfiguration, ConfigurationOptionName, ProcessorOptions } from "./config/loader.js";

// Artifacts
export { block } from "./artifact/types.js";
export type { CodeNode, CodeBlock, ArtifactImport, SourceArtifact } from "./artifact/types.js";
export { renderArtifact, stripGeneratedMarker, markerLine, GENERATED_MARKER_PREFIX } from "./artifact/render.js";
export {
  indent,
  escapeString,
  capitalize,
  qualifiedName,
  relativeModuleSpecifier,
} from "./artifact/format.js";

// Sinks
export type { EmissionSink, SourceWriter } from "./sink/types.js";
export { MemorySink } from "./sink/memory.js";

// Diagnostics
export * from "./diagnostics/codes.js";
export { createCollectingReporter } from "./diagnostics/reporter.js";
export type {
  DiagnosticSeverity,
  ProcessorDiagnostic,
  DiagnosticReporter,
  CollectingReporter,
} from "./diagnostics/reporter.js";

// Errors + logging
export { ProcessorError, ProcessorErrorCode, UnknownDirectiveError } from "./errors.js";
export type { ProcessorErrorCodeType } from "./errors.js";
export { SILENT_LOGGER, createConsoleLogger } from "./logger.js";
export type { Logger } from "./logger.js";
