/**
 * Processor Package - Artifact Rendering
 *
 * Turns a SourceArtifact into file text:
 *
 *   // file comment
 *
 *   import { A } from "../a.js";
 *
 *   // @generated by valuegen.RecordBuilder
 *   export class ...
 */

import type { GenerationConfiguration } from "../config/loader.js";
import { indent, relativeModuleSpecifier } from "./format.js";
import type { ArtifactImport, CodeBlock, CodeNode, SourceArtifact } from "./types.js";

export const GENERATED_MARKER_PREFIX = "// @generated by ";

/* =============================================================================
 * PUBLIC API
 * ============================================================================= */

/**
 * Render an artifact with the configured indent and file comment.
 */
export function renderArtifact(
  artifact: SourceArtifact,
  config: Pick<GenerationConfiguration, "fileIndent" | "fileComment">,
): string {
  const sections: string[] = [];

  if (config.fileComment.length > 0) {
    sections.push(renderFileComment(config.fileComment));
  }

  if (artifact.imports.length > 0) {
    sections.push(artifact.imports.map(i => renderImport(i, artifact.namespace)).join("\n"));
  }

  const declaration = renderNodes(artifact.declaration, config.fileIndent);
  sections.push(
    artifact.marker !== null ? `${markerLine(artifact.marker)}\n${declaration}` : declaration,
  );

  return `${sections.join("\n\n")}\n`;
}

export function markerLine(identity: string): string {
  return `${GENERATED_MARKER_PREFIX}${identity}`;
}

/**
 * Remove the marker line `renderArtifact` wrote for `identity`. The marker
 * directly precedes the declaration, so the last matching line is taken.
 */
export function stripGeneratedMarker(source: string, identity: string | null): string {
  if (identity === null) {
    return source;
  }
  const lines = source.split("\n");
  const index = lines.lastIndexOf(markerLine(identity));
  if (index < 0) {
    return source;
  }
  lines.splice(index, 1);
  return lines.join("\n");
}

/* =============================================================================
 * HELPERS
 * ============================================================================= */

function renderFileComment(comment: string): string {
  return comment
    .split("\n")
    .map(line => line.length > 0 ? `// ${line}` : "//")
    .join("\n");
}

function renderImport(imp: ArtifactImport, fromNamespace: string): string {
  const keyword = imp.typeOnly ? "import type" : "import";
  const specifier = relativeModuleSpecifier(fromNamespace, imp.modulePath);
  return `${keyword} { ${imp.names.join(", ")} } from "${specifier}";`;
}

function renderNodes(nodes: readonly CodeNode[], indentStr: string): string {
  return nodes
    .map(node => typeof node === "string" ? node : renderBlock(node, indentStr))
    .join("\n");
}

function renderBlock(node: CodeBlock, indentStr: string): string {
  if (node.body.length === 0) {
    return `${node.header}${node.footer}`;
  }
  return `${node.header}\n${indent(renderNodes(node.body, indentStr), indentStr)}\n${node.footer}`;
}
