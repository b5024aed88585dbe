/**
 * TypeScript Host - Program Loading
 *
 * Creates the program for a project root from its `tsconfig.json`, or from
 * every TypeScript file under the root when there is none.
 */

import ts from "typescript";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { ProcessorError, ProcessorErrorCode, SILENT_LOGGER, type Logger } from "@valuegen/processor";

const DEFAULT_COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.NodeNext,
  moduleResolution: ts.ModuleResolutionKind.NodeNext,
  strict: true,
  noEmit: true,
  experimentalDecorators: true,
};

/**
 * @throws ProcessorError (VALUEGEN_PROJECT_LOAD) when tsconfig.json can't be read
 */
export function createProjectProgram(rootDir: string, logger: Logger = SILENT_LOGGER): ts.Program {
  const tsconfigPath = join(rootDir, "tsconfig.json");

  if (!existsSync(tsconfigPath)) {
    const fileNames = ts.sys.readDirectory(rootDir, [".ts", ".tsx"], ["**/node_modules"], undefined);
    logger.info(`No tsconfig.json in ${rootDir}, using ${fileNames.length} files`);
    return ts.createProgram(fileNames, DEFAULT_COMPILER_OPTIONS);
  }

  logger.info(`Loading tsconfig: ${tsconfigPath}`);
  const configFile = ts.readConfigFile(tsconfigPath, (path) => readFileSync(path, "utf-8"));
  if (configFile.error) {
    throw new ProcessorError(
      `Failed to parse tsconfig: ${ts.flattenDiagnosticMessageText(configFile.error.messageText, "\n")}`,
      ProcessorErrorCode.PROJECT_LOAD,
    );
  }

  const parsedConfig = ts.parseJsonConfigFileContent(configFile.config, ts.sys, rootDir);
  for (const error of parsedConfig.errors) {
    logger.warn(`tsconfig warning: ${ts.flattenDiagnosticMessageText(error.messageText, "\n")}`);
  }

  logger.info(`Creating TypeScript program (${parsedConfig.fileNames.length} files)`);
  return ts.createProgram(parsedConfig.fileNames, { ...parsedConfig.options, noEmit: true });
}
