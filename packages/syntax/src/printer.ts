/**
 * Printing host expressions back to source text
 */

import * as ts from "typescript";

const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed, removeComments: true });

// Synthetic nodes have no source file of their own; the printer only needs one
// for language-variant and line-map lookups.
const emptyFile = ts.createSourceFile("hostmark.ts", "", ts.ScriptTarget.Latest, false, ts.ScriptKind.TS);

/**
 * Print an expression, synthetic or parsed, as JavaScript source.
 */
export function printExpression(expression: ts.Expression): string {
  return printer.printNode(ts.EmitHint.Expression, expression, emptyFile);
}
