/**
 * TypeScript Host - Configuration File
 *
 * Optional `valuegen.config.json` at the project root:
 *
 *   { "suffix": "Maker", "fileIndent": "\t" }
 *
 * Keys are option names without the `valuegen.` prefix; values are strings.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import {
  OPTION_PREFIX,
  ProcessorError,
  ProcessorErrorCode,
  type ProcessorOptions,
} from "@valuegen/processor";

export const CONFIG_FILE_NAME = "valuegen.config.json";

/**
 * Read the config file in `rootDir` as processor options.
 * Returns no options when the file does not exist.
 *
 * @throws ProcessorError (VALUEGEN_PROJECT_LOAD) when the file can't be parsed
 */
export function loadConfigFile(rootDir: string): ProcessorOptions {
  const path = join(rootDir, CONFIG_FILE_NAME);
  if (!existsSync(path)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ProcessorError(`Failed to parse ${path}: ${detail}`, ProcessorErrorCode.PROJECT_LOAD);
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ProcessorError(`${path} must contain a JSON object`, ProcessorErrorCode.PROJECT_LOAD);
  }

  const options: Record<string, string> = {};
  for (const [name, value] of Object.entries(parsed)) {
    if (typeof value !== "string") {
      throw new ProcessorError(`${path}: option "${name}" must be a string`, ProcessorErrorCode.PROJECT_LOAD);
    }
    options[`${OPTION_PREFIX}${name}`] = value;
  }
  return options;
}

/**
 * Config file options overridden by explicit ones.
 */
export function mergeOptions(fromFile: ProcessorOptions, explicit: ProcessorOptions = {}): ProcessorOptions {
  return { ...fromFile, ...explicit };
}
