/**
 * Processor Package - Directive Identities
 *
 * Directives are identified by their qualified identity string, never by
 * shape. Anything else that reaches the dispatcher is an engine defect.
 */

export const DirectiveIdentity = {
  BUILDER: "valuegen.RecordBuilder",
  BUILDER_INCLUDE: "valuegen.RecordBuilder.Include",
  INTERFACE: "valuegen.RecordInterface",
  INTERFACE_INCLUDE: "valuegen.RecordInterface.Include",
} as const;

export type DirectiveIdentityType = (typeof DirectiveIdentity)[keyof typeof DirectiveIdentity];

/** Attribute names read from directive mirrors */
export const DirectiveAttribute = {
  TARGETS: "targets",
  NAMESPACE_PATTERN: "namespacePattern",
  ADD_BUILDER: "addBuilder",
} as const;

export const DEFAULT_NAMESPACE_PATTERN = "*";

export type GenerationDirective =
  | { readonly kind: "builder"; readonly identity: typeof DirectiveIdentity.BUILDER }
  | { readonly kind: "builder-include"; readonly identity: typeof DirectiveIdentity.BUILDER_INCLUDE }
  | { readonly kind: "interface"; readonly identity: typeof DirectiveIdentity.INTERFACE }
  | { readonly kind: "interface-include"; readonly identity: typeof DirectiveIdentity.INTERFACE_INCLUDE }
  | { readonly kind: "unknown"; readonly identity: string };

export type IncludeDirective = Extract<GenerationDirective, { kind: "builder-include" | "interface-include" }>;

/**
 * Identify a directive by exact identity match.
 */
export function identifyDirective(identity: string): GenerationDirective {
  switch (identity) {
    case DirectiveIdentity.BUILDER:
      return { kind: "builder", identity };
    case DirectiveIdentity.BUILDER_INCLUDE:
      return { kind: "builder-include", identity };
    case DirectiveIdentity.INTERFACE:
      return { kind: "interface", identity };
    case DirectiveIdentity.INTERFACE_INCLUDE:
      return { kind: "interface-include", identity };
    default:
      return { kind: "unknown", identity };
  }
}

/**
 * Identities the engine claims from the host.
 */
export function supportedDirectives(): ReadonlySet<DirectiveIdentityType> {
  return new Set(Object.values(DirectiveIdentity));
}

/**
 * Short display name for messages ("valuegen.RecordBuilder" → "RecordBuilder").
 */
export function directiveDisplayName(identity: string): string {
  const prefix = "valuegen.";
  return identity.startsWith(prefix) ? identity.slice(prefix.length) : identity;
}
