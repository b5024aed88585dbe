/**
 * Processor Diagnostic Codes
 *
 * Codes follow the pattern VGxxxx where:
 * - VG0001-VG0009: Directive attributes that could not be read
 * - VG0010-VG0019: Include targets that could not be resolved
 * - VG0020-VG0029: Declarations of the wrong kind
 * - VG0030-VG0039: Emission failures
 * - VG0090-VG0099: Informational notes
 *
 * Every code except the notes is reported as an error: the affected element
 * gets no generated artifact, everything else in the round proceeds.
 */

// =============================================================================
// Directive Attributes (VG0001-VG0009)
// =============================================================================

/** The directive occurrence could not be found on the element */
export const VG0001_DIRECTIVE_UNRESOLVED = "VG0001";

/** An include directive has no (or an empty) target list */
export const VG0002_TARGETS_UNRESOLVED = "VG0002";

/** A directive attribute is written with a value that is not a constant */
export const VG0003_ATTRIBUTE_NOT_CONSTANT = "VG0003";

// =============================================================================
// Include Targets (VG0010-VG0019)
// =============================================================================

/** An included type reference does not resolve to a declaration */
export const VG0010_UNRESOLVED_REFERENCE = "VG0010";

/** The enclosing chain of a declaration ends without a namespace */
export const VG0011_NO_ENCLOSING_NAMESPACE = "VG0011";

// =============================================================================
// Declaration Kinds (VG0020-VG0029)
// =============================================================================

/** Directive applied to a declaration of the wrong kind */
export const VG0020_INVALID_DECLARATION_KIND = "VG0020";

/** Interface-like declaration has a member that cannot become a component */
export const VG0021_INVALID_INTERFACE_MEMBER = "VG0021";

// =============================================================================
// Emission (VG0030-VG0039)
// =============================================================================

/** The emission sink failed to open or write a source file */
export const VG0030_EMISSION_FAILED = "VG0030";

// =============================================================================
// Notes (VG0090-VG0099)
// =============================================================================

/** A generation option was read from the processor options */
export const VG0090_OPTION_NOTE = "VG0090";

export type ProcessorDiagnosticCode =
  | typeof VG0001_DIRECTIVE_UNRESOLVED
  | typeof VG0002_TARGETS_UNRESOLVED
  | typeof VG0003_ATTRIBUTE_NOT_CONSTANT
  | typeof VG0010_UNRESOLVED_REFERENCE
  | typeof VG0011_NO_ENCLOSING_NAMESPACE
  | typeof VG0020_INVALID_DECLARATION_KIND
  | typeof VG0021_INVALID_INTERFACE_MEMBER
  | typeof VG0030_EMISSION_FAILED
  | typeof VG0090_OPTION_NOTE;
