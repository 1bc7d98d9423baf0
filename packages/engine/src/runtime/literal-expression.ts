/**
 * Literal expression evaluation
 *
 * Parses console input such as `{ name: "x", size: 3 }` or `[1, 2, 3]` with
 * the TypeScript parser and folds it into plain values. Only literals are
 * accepted: objects, arrays, strings, numbers (optionally signed), bigints,
 * booleans and null. Anything that would need evaluation (identifiers,
 * calls, operators, spreads) is rejected.
 */

import * as ts from "typescript";
import type { Result } from "../types/result.js";

export type LiteralValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | readonly LiteralValue[]
  | { readonly [key: string]: LiteralValue };

const describeNode = (node: ts.Node): string =>
  ts.SyntaxKind[node.kind] ?? "expression";

const propertyKey = (name: ts.PropertyName): string | undefined => {
  if (
    ts.isIdentifier(name) ||
    ts.isStringLiteral(name) ||
    ts.isNumericLiteral(name) ||
    ts.isNoSubstitutionTemplateLiteral(name)
  ) {
    return name.text;
  }
  return undefined;
};

const foldSigned = (
  node: ts.PrefixUnaryExpression
): Result<LiteralValue, string> => {
  const negate = node.operator === ts.SyntaxKind.MinusToken;
  if (!negate && node.operator !== ts.SyntaxKind.PlusToken) {
    return { ok: false, error: `Unsupported operator in '${node.getText()}'` };
  }

  const operand = node.operand;
  if (ts.isNumericLiteral(operand)) {
    const value = Number(operand.text);
    return { ok: true, value: negate ? -value : value };
  }
  if (ts.isBigIntLiteral(operand)) {
    const value = BigInt(operand.text.slice(0, -1));
    return { ok: true, value: negate ? -value : value };
  }
  return {
    ok: false,
    error: `Sign applies to numbers only, got '${operand.getText()}'`,
  };
};

const fold = (node: ts.Expression): Result<LiteralValue, string> => {
  if (ts.isParenthesizedExpression(node)) return fold(node.expression);

  if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) {
    return { ok: true, value: node.text };
  }
  if (ts.isNumericLiteral(node)) {
    return { ok: true, value: Number(node.text) };
  }
  if (ts.isBigIntLiteral(node)) {
    return { ok: true, value: BigInt(node.text.slice(0, -1)) };
  }
  if (ts.isPrefixUnaryExpression(node)) return foldSigned(node);

  switch (node.kind) {
    case ts.SyntaxKind.TrueKeyword:
      return { ok: true, value: true };
    case ts.SyntaxKind.FalseKeyword:
      return { ok: true, value: false };
    case ts.SyntaxKind.NullKeyword:
      return { ok: true, value: null };
  }

  if (ts.isArrayLiteralExpression(node)) {
    const items: LiteralValue[] = [];
    for (const element of node.elements) {
      if (ts.isOmittedExpression(element) || ts.isSpreadElement(element)) {
        return { ok: false, error: "Array holes and spreads are not literals" };
      }
      const folded = fold(element);
      if (!folded.ok) return folded;
      items.push(folded.value);
    }
    return { ok: true, value: items };
  }

  if (ts.isObjectLiteralExpression(node)) {
    const fields: [string, LiteralValue][] = [];
    for (const property of node.properties) {
      if (!ts.isPropertyAssignment(property)) {
        return {
          ok: false,
          error: `Only 'key: value' properties are allowed, got '${property.getText()}'`,
        };
      }
      const key = propertyKey(property.name);
      if (key === undefined) {
        return {
          ok: false,
          error: `Computed property names are not literals: '${property.name.getText()}'`,
        };
      }
      const folded = fold(property.initializer);
      if (!folded.ok) return folded;
      fields.push([key, folded.value]);
    }
    return { ok: true, value: Object.fromEntries(fields) };
  }

  return {
    ok: false,
    error: `Not a literal: ${describeNode(node)} '${node.getText()}'`,
  };
};

/**
 * Evaluate the text of a literal expression.
 */
export const evaluateLiteralExpression = (
  text: string
): Result<LiteralValue, string> => {
  const wrapped = `(${text}\n);`;

  const syntax = ts.transpileModule(wrapped, {
    reportDiagnostics: true,
    compilerOptions: { target: ts.ScriptTarget.ES2022 },
  });
  const [problem] = syntax.diagnostics ?? [];
  if (problem) {
    return {
      ok: false,
      error: `Invalid literal '${text}': ${ts.flattenDiagnosticMessageText(problem.messageText, " ")}`,
    };
  }

  const source = ts.createSourceFile(
    "literal.ts",
    wrapped,
    ts.ScriptTarget.ES2022,
    true,
    ts.ScriptKind.TS
  );
  const [statement, ...rest] = source.statements;
  if (!statement || rest.length > 0 || !ts.isExpressionStatement(statement)) {
    return { ok: false, error: `Invalid literal '${text}'` };
  }

  return fold(statement.expression);
};

/**
 * Input delimited by braces or brackets is read as a literal expression.
 */
export const isLiteralExpressionText = (text: string): boolean => {
  const trimmed = text.trim();
  return (
    (trimmed.startsWith("{") && trimmed.endsWith("}")) ||
    (trimmed.startsWith("[") && trimmed.endsWith("]"))
  );
};

const NUMBER_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const BIGINT_TEXT = /^[+-]?\d+n$/;

/**
 * Read a command-line style value: literal expressions, quoted strings,
 * numbers, true/false and null are typed; anything else stays text.
 */
export const parseInputValue = (text: string): Result<LiteralValue, string> => {
  const trimmed = text.trim();
  if (isLiteralExpressionText(trimmed)) return evaluateLiteralExpression(trimmed);

  if (
    trimmed.length >= 2 &&
    (trimmed.startsWith('"') || trimmed.startsWith("'")) &&
    trimmed.endsWith(trimmed.charAt(0))
  ) {
    return evaluateLiteralExpression(trimmed);
  }

  switch (trimmed) {
    case "null":
      return { ok: true, value: null };
    case "true":
      return { ok: true, value: true };
    case "false":
      return { ok: true, value: false };
  }

  if (BIGINT_TEXT.test(trimmed)) {
    return { ok: true, value: BigInt(trimmed.slice(0, -1)) };
  }
  if (NUMBER_TEXT.test(trimmed)) return { ok: true, value: Number(trimmed) };

  return { ok: true, value: text };
};
