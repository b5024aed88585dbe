/**
 * Processor Package - Engine Collaborators
 *
 * The engine orchestrates; the shape of generated types comes from these
 * host-provided collaborators.
 */

import type { SourceArtifact } from "../artifact/types.js";
import type { GenerationConfiguration, ProcessorOptions } from "../config/loader.js";
import type { DiagnosticReporter } from "../diagnostics/reporter.js";
import type { Logger } from "../logger.js";
import type { EmissionSink } from "../sink/types.js";

export interface SynthesisContext<N> {
  readonly config: GenerationConfiguration;
  readonly reporter: DiagnosticReporter<N>;

  /** Output namespace computed for an included target; undefined for direct directives */
  readonly namespaceOverride: string | undefined;
}

/**
 * Builds the shape of a builder type for a value-type declaration.
 */
export interface BuilderSynthesizer<N> {
  synthesizeBuilder(valueType: N, context: SynthesisContext<N>): SourceArtifact;
}

export interface InterfaceSynthesis {
  /** Interface-replacement artifact, rendered then rewritten */
  readonly valueType: SourceArtifact;

  /** Declaration rewriter: rendered replacement source → value-type source */
  rewrite(source: string): string;

  /** Builder for the generated value type, when one was requested */
  readonly builder: SourceArtifact | null;
}

/**
 * Builds a value type from an interface-like declaration.
 * Returns null (after reporting) when the declaration can't be converted.
 */
export interface InterfaceSynthesizer<N> {
  synthesizeValueType(
    declaration: N,
    addBuilder: boolean,
    context: SynthesisContext<N>,
  ): InterfaceSynthesis | null;
}

export interface ProcessingEnvironment<N> {
  readonly reporter: DiagnosticReporter<N>;
  readonly sink: EmissionSink<N>;

  /** Host processor options (`valuegen.*` keys are read) */
  readonly options: ProcessorOptions;

  readonly builders: BuilderSynthesizer<N>;
  readonly interfaces: InterfaceSynthesizer<N>;

  readonly logger?: Logger;
}
