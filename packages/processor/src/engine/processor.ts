/**
 * Processor Package - Directive Dispatch
 *
 * Entry point invoked by the host once per round. Every fired directive is
 * claimed; per-element problems are diagnostics and never stop the round.
 */

import type { SourceArtifact } from "../artifact/types.js";
import { loadConfiguration, type GenerationConfiguration } from "../config/loader.js";
import { VG0090_OPTION_NOTE } from "../diagnostics/codes.js";
import { UnknownDirectiveError } from "../errors.js";
import { SILENT_LOGGER, type Logger } from "../logger.js";
import {
  directiveDisplayName,
  identifyDirective,
  supportedDirectives,
  type DirectiveIdentityType,
} from "../model/directives.js";
import type { DeclarationNode, RoundInput } from "../model/types.js";
import { emitArtifact, emitValueType, type EmitContext } from "./emit.js";
import { expandInclude, readAddBuilder } from "./include.js";
import type { ProcessingEnvironment, SynthesisContext } from "./types.js";
import { validateDeclaration } from "./validate.js";

export class RecordProcessor<N extends DeclarationNode<N>> {
  readonly #env: ProcessingEnvironment<N>;
  readonly #logger: Logger;

  constructor(env: ProcessingEnvironment<N>) {
    this.#env = env;
    this.#logger = env.logger ?? SILENT_LOGGER;
  }

  supportedDirectives(): ReadonlySet<DirectiveIdentityType> {
    return supportedDirectives();
  }

  /**
   * Process every (directive, element) pair of a round.
   * Always returns true: the directives are claimed whatever was reported.
   */
  processRound(round: RoundInput<N>): boolean {
    for (const [identity, elements] of round.directives) {
      for (const element of elements) {
        this.process(identity, element);
      }
    }
    return true;
  }

  /**
   * Process one directive on one element.
   *
   * @throws UnknownDirectiveError when `identity` is not a supported directive
   */
  process(identity: string, element: N): void {
    const config = loadConfiguration(this.#env.options, message => {
      this.#env.reporter.report({ code: VG0090_OPTION_NOTE, severity: "note", message, element });
    });
    const directive = identifyDirective(identity);
    this.#logger.log(`${directiveDisplayName(identity)} on ${element.qualifiedName}`);

    switch (directive.kind) {
      case "builder":
        this.#processBuilder(element, config, undefined);
        return;
      case "interface":
        this.#processInterface(element, readAddBuilder(element.findDirective(identity)), config, undefined);
        return;
      case "builder-include":
        expandInclude(directive, element, this.#env.reporter, (target, namespace) => {
          this.#processBuilder(target, config, namespace);
        });
        return;
      case "interface-include":
        expandInclude(directive, element, this.#env.reporter, (target, namespace, mirror) => {
          this.#processInterface(target, readAddBuilder(mirror), config, namespace);
        });
        return;
      case "unknown":
        throw new UnknownDirectiveError(directive.identity);
    }
  }

  /* ---------------------------------------------------------------------------
   * Generation paths
   * ------------------------------------------------------------------------- */

  #processBuilder(valueType: N, config: GenerationConfiguration, namespaceOverride: string | undefined): void {
    if (!validateDeclaration(valueType, "builder", this.#env.reporter)) {
      return;
    }
    const artifact = this.#env.builders.synthesizeBuilder(valueType, this.#synthesisContext(config, namespaceOverride));
    this.#emit(artifact, valueType, config);
  }

  #processInterface(
    declaration: N,
    addBuilder: boolean,
    config: GenerationConfiguration,
    namespaceOverride: string | undefined,
  ): void {
    if (!validateDeclaration(declaration, "interface", this.#env.reporter)) {
      return;
    }
    const synthesis = this.#env.interfaces.synthesizeValueType(
      declaration,
      addBuilder,
      this.#synthesisContext(config, namespaceOverride),
    );
    if (synthesis === null) {
      return;
    }

    const ctx = this.#emitContext(config);
    if (!emitValueType(synthesis, declaration, ctx)) {
      return;
    }
    this.#logger.log(`Wrote ${synthesis.valueType.simpleName}`);
    if (synthesis.builder !== null) {
      this.#emit(synthesis.builder, declaration, config);
    }
  }

  #emit(artifact: SourceArtifact, element: N, config: GenerationConfiguration): void {
    if (emitArtifact(artifact, element, this.#emitContext(config))) {
      this.#logger.log(`Wrote ${artifact.simpleName}`);
    }
  }

  #synthesisContext(config: GenerationConfiguration, namespaceOverride: string | undefined): SynthesisContext<N> {
    return { config, reporter: this.#env.reporter, namespaceOverride };
  }

  #emitContext(config: GenerationConfiguration): EmitContext<N> {
    return { config, sink: this.#env.sink, reporter: this.#env.reporter };
  }
}

/**
 * Create a processor bound to a host environment.
 */
export function createRecordProcessor<N extends DeclarationNode<N>>(env: ProcessingEnvironment<N>): RecordProcessor<N> {
  return new RecordProcessor(env);
}
