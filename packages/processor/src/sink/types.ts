/**
 * A writable, scoped text target for one generated file.
 * The engine writes the full text and always closes it.
 */
export interface SourceWriter {
  write(text: string): void;
  close(): void;
}

/**
 * Process-wide emission sink. Each qualified name may be created once;
 * failures surface as thrown errors and become diagnostics in the emitter.
 */
export interface EmissionSink<N> {
  createSourceFile(qualifiedName: string, originating: N): SourceWriter;
}
