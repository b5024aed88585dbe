/**
 * Processor Package - Artifact Emission
 *
 * Renders artifacts and commits them to the sink exactly once. Sink failures
 * become an error diagnostic on the originating element.
 */

import { qualifiedName } from "../artifact/format.js";
import { renderArtifact, stripGeneratedMarker } from "../artifact/render.js";
import type { SourceArtifact } from "../artifact/types.js";
import type { GenerationConfiguration } from "../config/loader.js";
import { VG0030_EMISSION_FAILED } from "../diagnostics/codes.js";
import type { DiagnosticReporter } from "../diagnostics/reporter.js";
import type { EmissionSink } from "../sink/types.js";
import type { InterfaceSynthesis } from "./types.js";

export interface EmitContext<N> {
  readonly config: GenerationConfiguration;
  readonly sink: EmissionSink<N>;
  readonly reporter: DiagnosticReporter<N>;
}

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Render and commit a builder (or any plain) artifact.
 * Returns whether the file was written.
 */
export function emitArtifact<N>(artifact: SourceArtifact, element: N, ctx: EmitContext<N>): boolean {
  const source = renderArtifact(artifact, ctx.config);
  return commitSource(qualifiedName(artifact.namespace, artifact.simpleName), source, element, ctx);
}

/**
 * Render the interface replacement, strip its generated marker, rewrite it
 * into the value type and commit the rewritten text.
 */
export function emitValueType<N>(synthesis: InterfaceSynthesis, element: N, ctx: EmitContext<N>): boolean {
  const { valueType } = synthesis;
  const rendered = renderArtifact(valueType, ctx.config);
  const source = synthesis.rewrite(stripGeneratedMarker(rendered, valueType.marker));
  return commitSource(qualifiedName(valueType.namespace, valueType.simpleName), source, element, ctx);
}

export function emissionFailureMessage(error: unknown): string {
  const message = "Could not create source file";
  const detail = error instanceof Error ? error.message : typeof error === "string" ? error : "";
  return detail.length > 0 ? `${message}: ${detail}` : message;
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

function commitSource<N>(name: string, source: string, element: N, ctx: EmitContext<N>): boolean {
  try {
    const writer = ctx.sink.createSourceFile(name, element);
    try {
      writer.write(source);
    } finally {
      writer.close();
    }
    return true;
  } catch (error) {
    ctx.reporter.report({
      code: VG0030_EMISSION_FAILED,
      severity: "error",
      message: emissionFailureMessage(error),
      element,
    });
    return false;
  }
}
