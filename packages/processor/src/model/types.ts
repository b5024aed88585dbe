/**
 * Processor Package - Symbol Model Types
 *
 * The narrow view of a host symbol table that the engine works against.
 * Hosts wrap their own declaration objects behind these interfaces.
 */

/* =============================================================================
 * DECLARATIONS
 * ============================================================================= */

/**
 * Classified declaration kind.
 *
 * Hosts never report this directly: they report a symbolic kind name and the
 * engine classifies it (see `classifyKind`).
 */
export type DeclarationKind = "namespace" | "value-type" | "interface-like" | "other";

/**
 * A handle into the host's symbol model.
 *
 * `Self` is the host's concrete node type, so collaborators that need more
 * than this narrow view (components, source positions) get the host type back
 * from every traversal.
 */
export interface DeclarationNode<Self extends DeclarationNode<Self>> {
  /** Host symbolic kind name, e.g. "RECORD", "INTERFACE", "NAMESPACE" */
  readonly kindName: string;

  /** Unqualified declaration name */
  readonly simpleName: string;

  /** Fully qualified name (namespaces: dotted namespace name, may be "") */
  readonly qualifiedName: string;

  /** Enclosing node; the chain is finite and acyclic, ending at null */
  readonly enclosing: Self | null;

  /** Look up a directive attached to this declaration by identity */
  findDirective(identity: string): DirectiveMirror<Self> | null;
}

/* =============================================================================
 * DIRECTIVE ATTRIBUTES
 * ============================================================================= */

/**
 * A reference to a type named in a directive attribute.
 */
export interface TypeReference<N> {
  /** Source text of the reference, for diagnostics */
  readonly text: string;

  /** Resolve to a declaration, or null when the host cannot */
  resolve(): N | null;
}

export type AttributeValue<N> =
  | { readonly kind: "boolean"; readonly value: boolean }
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "types"; readonly value: readonly TypeReference<N>[] };

/**
 * Attribute values of one directive occurrence on one declaration.
 */
export interface DirectiveMirror<N> {
  /** Qualified identity of the directive */
  readonly identity: string;

  /** Attribute value by name, or undefined when not written */
  value(name: string): AttributeValue<N> | undefined;
}

/* =============================================================================
 * ROUNDS
 * ============================================================================= */

/**
 * Directives that fired in one round, each with the elements carrying it.
 */
export interface RoundInput<N> {
  readonly directives: ReadonlyMap<string, Iterable<N>>;
}
