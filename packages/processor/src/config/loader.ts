/**
 * Processor Package - Generation Configuration
 *
 * Options arrive as flat `valuegen.<name>` strings from the host. A
 * configuration is built fresh for every processed element and never shared.
 */

/* =============================================================================
 * TYPES + DEFAULTS
 * ============================================================================= */

export interface GenerationConfiguration {
  /** Indentation unit for generated files */
  readonly fileIndent: string;

  /** Comment placed at the top of each generated file (empty: none) */
  readonly fileComment: string;

  /** Suffix of generated builder types */
  readonly suffix: string;

  /** Suffix of value types generated from interface-like declarations */
  readonly interfaceSuffix: string;

  /** Static factory creating an empty builder */
  readonly builderMethodName: string;

  /** Builder method producing the value */
  readonly buildMethodName: string;

  /** Static factory copying an existing value into a builder */
  readonly fromMethodName: string;
}

export type ConfigurationOptionName = keyof GenerationConfiguration;

export const DEFAULT_CONFIGURATION: GenerationConfiguration = Object.freeze({
  fileIndent: "    ",
  fileComment: "Auto generated by valuegen. Do not edit.",
  suffix: "Builder",
  interfaceSuffix: "Record",
  builderMethodName: "builder",
  buildMethodName: "build",
  fromMethodName: "from",
});

export const OPTION_PREFIX = "valuegen.";

/** Host processor options: flat string map, possibly sparse */
export type ProcessorOptions = Readonly<Record<string, string | undefined>>;

/* =============================================================================
 * LOADING
 * ============================================================================= */

/**
 * Build a configuration from processor options.
 *
 * Every recognized option that is set produces a note, as does every key under
 * the valuegen prefix that names no option.
 */
export function loadConfiguration(
  options: ProcessorOptions,
  onNote: (message: string) => void = () => {},
): GenerationConfiguration {
  const resolved: Record<ConfigurationOptionName, string> = { ...DEFAULT_CONFIGURATION };

  for (const [key, value] of Object.entries(options)) {
    if (!key.startsWith(OPTION_PREFIX) || value === undefined) continue;
    const name = key.slice(OPTION_PREFIX.length);
    if (!isOptionName(name)) {
      onNote(`Unknown valuegen option: ${name}`);
      continue;
    }
    resolved[name] = unescapeOption(value);
    onNote(`valuegen option ${name} = ${JSON.stringify(resolved[name])}`);
  }

  return Object.freeze(resolved);
}

export function isOptionName(name: string): name is ConfigurationOptionName {
  return Object.prototype.hasOwnProperty.call(DEFAULT_CONFIGURATION, name);
}

/** Accepts `\t` and `\n` escapes */
function unescapeOption(value: string): string {
  return value.replace(/\\t/g, "\t").replace(/\\n/g, "\n");
}
