import * as ts from "typescript";

const SYNTHETIC: ts.TextRange = { pos: -1, end: -1 };

/**
 * Recursively mark AST nodes as synthetic by setting positions to -1.
 *
 * Nodes parsed from a scratch source file would otherwise make the printer
 * read their text from whatever file it is printing against.
 */
export function stripPositions<T extends ts.Node>(node: T): T {
  ts.setTextRange(node, SYNTHETIC);
  ts.forEachChild(
    node,
    (child) => {
      stripPositions(child);
    },
    (children) => {
      ts.setTextRange(children, SYNTHETIC);
      children.forEach((child) => stripPositions(child));
    }
  );
  return node;
}

/**
 * Syntax errors `ts.createSourceFile` recorded while parsing. It never throws;
 * it produces error nodes and keeps the diagnostics on the file.
 */
export function parseDiagnostics(file: ts.SourceFile): readonly ts.DiagnosticWithLocation[] {
  return (file as unknown as { parseDiagnostics?: ts.DiagnosticWithLocation[] }).parseDiagnostics ?? [];
}
