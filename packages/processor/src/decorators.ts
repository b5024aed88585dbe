/**
 * Processor Package - Directive Decorators
 *
 * Runtime no-ops that mark declarations for generation. The generator reads
 * them from source; nothing happens when they run.
 *
 * @example
 * ```typescript
 * import { RecordBuilder } from "@valuegen/processor";
 *
 * @RecordBuilder()
 * export class Point {
 *   constructor(readonly x: number, readonly y: number) {}
 * }
 *
 * // Builders for declarations you don't own, next to this file:
 * @RecordBuilder.Include<[Point, Line]>({ namespacePattern: "@.builders" })
 * export class Builders {}
 * ```
 */

/** Anything a class decorator may be applied to, abstract classes included */
export type DecoratedClass = abstract new (...args: never[]) => unknown;

export type DirectiveDecorator = (target: DecoratedClass, context?: unknown) => void;

export interface IncludeOptions {
  /**
   * Output namespace pattern. `*` is the included declaration's namespace,
   * `@` the namespace of the declaration carrying the directive.
   * Default: "*".
   */
  namespacePattern?: string;
}

export interface RecordInterfaceOptions {
  /** Also generate a builder for the generated value type (default: true) */
  addBuilder?: boolean;
}

export interface RecordBuilderDirective {
  (): DirectiveDecorator;

  /** Generate builders for the value types listed in `Targets` */
  Include<Targets extends readonly unknown[]>(options?: IncludeOptions): DirectiveDecorator;
}

export interface RecordInterfaceDirective {
  (options?: RecordInterfaceOptions): DirectiveDecorator;

  /** Generate value types for the interface-like declarations listed in `Targets` */
  Include<Targets extends readonly unknown[]>(
    options?: IncludeOptions & RecordInterfaceOptions,
  ): DirectiveDecorator;
}

const mark: DirectiveDecorator = () => undefined;

export const RecordBuilder: RecordBuilderDirective = Object.assign(() => mark, {
  Include: () => mark,
});

export const RecordInterface: RecordInterfaceDirective = Object.assign(
  (_options?: RecordInterfaceOptions) => mark,
  { Include: () => mark },
);
