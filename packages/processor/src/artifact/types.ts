/**
 * Processor Package - Artifact Model
 *
 * In-memory model of one generated source file. Synthesizers build it, the
 * emitter renders and commits it, nothing keeps it afterwards.
 */

/**
 * A line of code, or a nested block.
 * The empty string renders as a blank line.
 */
export type CodeNode = string | CodeBlock;

/**
 * `header`, then `body` one indent level deeper, then `footer`.
 */
export interface CodeBlock {
  readonly header: string;
  readonly body: readonly CodeNode[];
  readonly footer: string;
}

export interface ArtifactImport {
  /** Imported binding names */
  readonly names: readonly string[];

  /** Module path relative to the source root, "/"-separated, no extension */
  readonly modulePath: string;

  /** Emit as `import type` */
  readonly typeOnly?: boolean;
}

export interface SourceArtifact {
  /** Output namespace, "" for the root namespace */
  readonly namespace: string;

  /** Name of the generated declaration (and of the file) */
  readonly simpleName: string;

  readonly imports: readonly ArtifactImport[];

  /** Identity of the generating directive, rendered as the generated marker */
  readonly marker: string | null;

  readonly declaration: readonly CodeNode[];
}

export function block(header: string, body: readonly CodeNode[], footer = "}"): CodeBlock {
  return { header, body, footer };
}
