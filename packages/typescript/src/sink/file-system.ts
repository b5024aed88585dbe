/**
 * TypeScript Host - File System Sink
 *
 * `a.b.Name` is written to `<outDir>/a/b/Name.ts`. A name can be created once
 * per sink.
 */

import { closeSync, mkdirSync, openSync, unlinkSync, writeSync } from "node:fs";
import { dirname, join } from "node:path";
import type { EmissionSink, SourceWriter } from "@valuegen/processor";

export class FileSystemSink<N = unknown> implements EmissionSink<N> {
  readonly #created = new Set<string>();
  readonly #written: string[] = [];

  constructor(readonly outDir: string) {}

  /** Qualified names whose files were written and closed, in order */
  get written(): readonly string[] {
    return this.#written;
  }

  pathFor(qualifiedName: string): string {
    const segments = qualifiedName.split(".");
    const simpleName = segments.pop() ?? qualifiedName;
    return join(this.outDir, ...segments, `${simpleName}.ts`);
  }

  createSourceFile(qualifiedName: string, _originating: N): SourceWriter {
    if (this.#created.has(qualifiedName)) {
      throw new Error(`Attempt to recreate a file for type ${qualifiedName}`);
    }
    this.#created.add(qualifiedName);

    const path = this.pathFor(qualifiedName);
    mkdirSync(dirname(path), { recursive: true });
    const fd = openSync(path, "w");
    let closed = false;
    let failed = false;
    return {
      write: (text) => {
        try {
          writeSync(fd, text);
        } catch (error) {
          failed = true;
          throw error;
        }
      },
      close: () => {
        if (closed) return;
        closed = true;
        closeSync(fd);
        if (failed) {
          unlinkSync(path);
        } else {
          this.#written.push(qualifiedName);
        }
      },
    };
  }
}
