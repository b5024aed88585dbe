import ts from "typescript";

/**
 * Get decorators from a node.
 */
export function decoratorsOf(node: ts.Node): readonly ts.Decorator[] {
  return (ts.canHaveDecorators(node) ? ts.getDecorators(node) : undefined) ?? [];
}

/**
 * Unwrap a decorator into its dotted callee name, arguments and type arguments.
 * Handles `@a`, `@a()`, `@a.b()` and `@ns.a.b<T>()`.
 */
export function unwrapDecorator(dec: ts.Decorator): {
  name: string;
  args: readonly ts.Expression[];
  typeArgs: readonly ts.TypeNode[];
} | null {
  const expr = dec.expression;
  if (ts.isCallExpression(expr)) {
    const name = dottedName(expr.expression);
    return name === null ? null : { name, args: expr.arguments, typeArgs: expr.typeArguments ?? [] };
  }
  const name = dottedName(expr);
  return name === null ? null : { name, args: [], typeArgs: [] };
}

function dottedName(expr: ts.Expression): string | null {
  if (ts.isIdentifier(expr)) return expr.text;
  if (ts.isPropertyAccessExpression(expr) && ts.isIdentifier(expr.name)) {
    const left = dottedName(expr.expression);
    return left === null ? null : `${left}.${expr.name.text}`;
  }
  return null;
}

/**
 * Get a property from an object literal by name, written as `name: value` or
 * as the shorthand `name`.
 */
export function getProp(
  obj: ts.ObjectLiteralExpression,
  name: string,
): ts.PropertyAssignment | ts.ShorthandPropertyAssignment | undefined {
  return obj.properties.find(
    (p): p is ts.PropertyAssignment | ts.ShorthandPropertyAssignment =>
      (ts.isPropertyAssignment(p) || ts.isShorthandPropertyAssignment(p)) &&
      ((ts.isIdentifier(p.name) && p.name.text === name) || (ts.isStringLiteralLike(p.name) && p.name.text === name)),
  );
}

/**
 * Type of a property's value, as the checker sees it at the property.
 */
export function propValueType(
  prop: ts.PropertyAssignment | ts.ShorthandPropertyAssignment,
  checker: ts.TypeChecker,
): ts.Type | undefined {
  if (ts.isPropertyAssignment(prop)) {
    return checker.getTypeAtLocation(prop.initializer);
  }
  const symbol = checker.getShorthandAssignmentValueSymbol(prop);
  return symbol === undefined ? undefined : checker.getTypeOfSymbolAtLocation(symbol, prop);
}

/**
 * String value of a property, when it is a literal or a reference to a
 * string constant.
 */
export function readStringProp(
  prop: ts.PropertyAssignment | ts.ShorthandPropertyAssignment,
  checker: ts.TypeChecker,
): string | undefined {
  if (ts.isPropertyAssignment(prop) && ts.isStringLiteralLike(prop.initializer)) {
    return prop.initializer.text;
  }
  const type = propValueType(prop, checker);
  return type?.isStringLiteral() ? type.value : undefined;
}

/**
 * Boolean value of a property, when it is `true`, `false` or a reference to a
 * boolean constant.
 */
export function readBooleanProp(
  prop: ts.PropertyAssignment | ts.ShorthandPropertyAssignment,
  checker: ts.TypeChecker,
): boolean | undefined {
  if (ts.isPropertyAssignment(prop)) {
    const init = prop.initializer;
    if (init.kind === ts.SyntaxKind.TrueKeyword) return true;
    if (init.kind === ts.SyntaxKind.FalseKeyword) return false;
  }
  const type = propValueType(prop, checker);
  if (type === undefined || (type.flags & ts.TypeFlags.BooleanLiteral) === 0) return undefined;
  return checker.typeToString(type) === "true";
}
