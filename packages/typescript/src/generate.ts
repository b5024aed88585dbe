/**
 * TypeScript Host - Generation Facade
 *
 * Runs one round over a project directory and writes the generated files.
 *
 * @example
 * ```typescript
 * import { generate } from "@valuegen/typescript";
 *
 * const result = generate({ rootDir: "src" });
 * for (const d of result.diagnostics) console.error(formatDiagnostic(d));
 * ```
 */

import type ts from "typescript";
import {
  SILENT_LOGGER,
  createCollectingReporter,
  createRecordProcessor,
  type EmissionSink,
  type Logger,
  type ProcessorDiagnostic,
  type ProcessorOptions,
} from "@valuegen/processor";
import { loadConfigFile, mergeOptions } from "./config.js";
import type { TsDeclaration } from "./model/declaration.js";
import { TsProject } from "./model/project.js";
import { createProjectProgram } from "./program.js";
import { collectRound } from "./round.js";
import { FileSystemSink } from "./sink/file-system.js";
import { TsBuilderSynthesizer } from "./synth/builder.js";
import { TsInterfaceSynthesizer } from "./synth/interface.js";

export interface GenerateOptions {
  /** Project root; namespaces are directories relative to it */
  rootDir: string;

  /** Where generated files go. Default: `rootDir` */
  outDir?: string;

  /** `valuegen.*` options, overriding valuegen.config.json */
  options?: ProcessorOptions;

  /** Use this program instead of loading one from `rootDir` */
  program?: ts.Program;

  /** Use this sink instead of writing to `outDir` */
  sink?: EmissionSink<TsDeclaration>;

  logger?: Logger;
}

export interface GenerateResult {
  diagnostics: readonly ProcessorDiagnostic<TsDeclaration>[];

  /** Qualified names of written files (file-system sink only) */
  emitted: readonly string[];
}

/**
 * @throws ProcessorError (VALUEGEN_PROJECT_LOAD) when the project can't be loaded
 */
export function generate(options: GenerateOptions): GenerateResult {
  const logger = options.logger ?? SILENT_LOGGER;
  const program = options.program ?? createProjectProgram(options.rootDir, logger);
  const project = new TsProject(program, options.rootDir);

  const fileSink = new FileSystemSink<TsDeclaration>(options.outDir ?? options.rootDir);
  const sink = options.sink ?? fileSink;
  const reporter = createCollectingReporter<TsDeclaration>((d) => {
    const message = formatDiagnostic(d);
    if (d.severity === "error") logger.error(message);
    else logger.log(message);
  });

  const processor = createRecordProcessor<TsDeclaration>({
    reporter,
    sink,
    options: mergeOptions(loadConfigFile(options.rootDir), options.options),
    builders: new TsBuilderSynthesizer(),
    interfaces: new TsInterfaceSynthesizer(),
    logger,
  });

  const round = collectRound(project, reporter);
  logger.info(`Processing ${round.directives.size} directive kinds`);
  processor.processRound(round);

  return {
    diagnostics: reporter.diagnostics,
    emitted: sink === fileSink ? fileSink.written : [],
  };
}

/**
 * `file:line:col - error VG0020: message`
 */
export function formatDiagnostic(diagnostic: ProcessorDiagnostic<TsDeclaration>): string {
  const node = diagnostic.element.node;
  const sourceFile = node.getSourceFile();
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile));
  return `${sourceFile.fileName}:${line + 1}:${character + 1} - ${diagnostic.severity} ${diagnostic.code}: ${diagnostic.message}`;
}
