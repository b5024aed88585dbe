import type { EmissionSink, SourceWriter } from "./types.js";

/**
 * In-process sink. Files become visible in `files` when their writer closes.
 */
export class MemorySink<N> implements EmissionSink<N> {
  readonly #files = new Map<string, string>();
  readonly #created = new Set<string>();

  get files(): ReadonlyMap<string, string> {
    return this.#files;
  }

  createSourceFile(qualifiedName: string, _originating: N): SourceWriter {
    if (this.#created.has(qualifiedName)) {
      throw new Error(`Attempt to recreate a file for type ${qualifiedName}`);
    }
    this.#created.add(qualifiedName);

    const chunks: string[] = [];
    let closed = false;
    return {
      write: (text) => {
        if (closed) throw new Error(`Writer for ${qualifiedName} is closed`);
        chunks.push(text);
      },
      close: () => {
        if (closed) return;
        closed = true;
        this.#files.set(qualifiedName, chunks.join(""));
      },
    };
  }
}
