import { describe, it, expect } from "vitest";
import * as ts from "typescript";
import { MarkupSyntaxError, parseExpression, printExpression, startsExpression } from "../src/index.js";

function roundTrip(source: string): string {
  return printExpression(parseExpression(source));
}

function syntaxError(source: string): MarkupSyntaxError {
  try {
    parseExpression(source);
  } catch (error) {
    if (error instanceof MarkupSyntaxError) return error;
    throw error;
  }
  throw new Error(`expected a syntax error for ${source}`);
}

describe("ExpressionParser", () => {
  describe("operators", () => {
    it.each([
      "a + b * c",
      "(a + b) * c",
      "a ? b : c",
      "a ?? b",
      "(a || b) ?? c",
      "a < b",
      "x >> 2",
      "x >>> 1",
      "a >= b",
      "typeof x === \"string\"",
      "!done && -n < ~m",
      "key in obj",
      "err instanceof Error",
      "void 0",
      "a = b",
      "x += 1",
      "(a, b)",
      "i++",
      "--i",
      "delete o.x",
    ])("reads %s", (source) => {
      expect(roundTrip(source)).toBe(source);
    });

    it("binds ** to the right", () => {
      const expr = parseExpression("a ** b ** c");
      if (!ts.isBinaryExpression(expr)) throw new Error("expected a binary expression");
      expect(ts.isIdentifier(expr.left)).toBe(true);
      expect(ts.isBinaryExpression(expr.right)).toBe(true);
    });

    it("binds - to the left", () => {
      const expr = parseExpression("a - b - c");
      if (!ts.isBinaryExpression(expr)) throw new Error("expected a binary expression");
      expect(ts.isBinaryExpression(expr.left)).toBe(true);
      expect(ts.isIdentifier(expr.right)).toBe(true);
    });
  });

  describe("primaries and calls", () => {
    it.each([
      "obj?.a.b",
      "obj?.[k]",
      "fn?.(1)",
      "fn(...args, 1)",
      "new Date(0)",
      "items[0].name",
      "/ab+c/g.test(s)",
      "`plain`",
      "tag`x${y}z`",
      "`a${b}c${d}e`",
      "this.props",
      "10n",
      "[1, 2, ...rest]",
      "{ a: 1, \"b\": 2, [k]: 3, c, ...rest }",
      "'single'",
    ])("reads %s", (source) => {
      expect(roundTrip(source)).toBe(source);
    });

    it("reads array holes", () => {
      const expr = parseExpression("[1, , 3]");
      if (!ts.isArrayLiteralExpression(expr)) throw new Error("expected an array literal");
      expect(expr.elements.map((e) => e.kind)).toEqual([
        ts.SyntaxKind.NumericLiteral,
        ts.SyntaxKind.OmittedExpression,
        ts.SyntaxKind.NumericLiteral,
      ]);
    });

    it("treats contextual keywords as identifiers", () => {
      expect(roundTrip("type.of")).toBe("type.of");
    });
  });

  describe("arrow functions", () => {
    it("reads parenthesized parameters", () => {
      expect(roundTrip("(a, b) => a + b")).toBe("(a, b) => a + b");
      expect(roundTrip("(...xs) => xs")).toBe("(...xs) => xs");
      expect(roundTrip("() => 1")).toBe("() => 1");
    });

    it("reads a single bare parameter", () => {
      const expr = parseExpression("x => x * 2");
      if (!ts.isArrowFunction(expr)) throw new Error("expected an arrow function");
      expect(expr.parameters).toHaveLength(1);
      expect(ts.isIdentifier(expr.parameters[0].name)).toBe(true);
      expect(ts.isBinaryExpression(expr.body)).toBe(true);
    });

    it("does not mistake a parenthesized expression for parameters", () => {
      expect(roundTrip("(a)")).toBe("(a)");
      expect(roundTrip("(a) + b")).toBe("(a) + b");
    });

    it("reads block bodies", () => {
      const expr = parseExpression("() => { count++; }");
      if (!ts.isArrowFunction(expr)) throw new Error("expected an arrow function");
      if (!ts.isBlock(expr.body)) throw new Error("expected a block body");
      expect(expr.body.statements).toHaveLength(1);
      expect(ts.isExpressionStatement(expr.body.statements[0])).toBe(true);
    });

    it.each(["e => state.value = e", "async () => x", "(a = 1) => a", "({ a }) => a"])("reads %s", (source) => {
      expect(roundTrip(source)).toBe(source);
    });

    it("reads destructured parameters", () => {
      const expr = parseExpression("({ a }) => a");
      if (!ts.isArrowFunction(expr)) throw new Error("expected an arrow function");
      expect(ts.isObjectBindingPattern(expr.parameters[0].name)).toBe(true);
    });
  });

  describe("functions and methods", () => {
    it("reads function expressions", () => {
      const expr = parseExpression("function () { go(); }");
      if (!ts.isFunctionExpression(expr)) throw new Error("expected a function expression");
      expect(expr.body.statements).toHaveLength(1);
    });

    it("reads object methods", () => {
      const expr = parseExpression("{ m() {} }");
      if (!ts.isObjectLiteralExpression(expr)) throw new Error("expected an object literal");
      expect(ts.isMethodDeclaration(expr.properties[0])).toBe(true);
    });
  });

  describe("markup in expressions", () => {
    it("lowers markup returned from an arrow function", () => {
      const expr = parseExpression(`items.map(i => <li>{i}</li>)`);
      const f = ts.factory;
      const expected = f.createCallExpression(
        f.createPropertyAccessExpression(f.createIdentifier("items"), "map"),
        undefined,
        [
          f.createArrowFunction(
            undefined,
            undefined,
            [f.createParameterDeclaration(undefined, undefined, "i")],
            undefined,
            f.createToken(ts.SyntaxKind.EqualsGreaterThanToken),
            f.createCallExpression(f.createIdentifier("h"), undefined, [
              f.createStringLiteral("li"),
              f.createObjectLiteralExpression([]),
              f.createArrayLiteralExpression([f.createIdentifier("i")]),
            ])
          ),
        ]
      );
      expect(printExpression(expr)).toBe(printExpression(expected));
    });

    it("reads '<' after an operand as less-than", () => {
      expect(roundTrip("a < <b />")).toBe(`a < h("b", {}, [])`);
    });

    it("lowers markup on both branches of a conditional", () => {
      expect(roundTrip(`ok ? <b>"yes"</b> : <i>"no"</i>`)).toBe(
        `ok ? h("b", {}, ["yes"]) : h("i", {}, ["no"])`
      );
    });
  });

  describe("errors", () => {
    it("reports a missing operand at the end of input", () => {
      const error = syntaxError("a +");
      expect(error.reason).toBe("Expression expected.");
      expect(error.pos).toBe(3);
      expect(error.phase).toBe("parse");
    });

    it("reports trailing input", () => {
      const error = syntaxError("a b");
      expect(error.reason).toBe("')' expected.");
      expect(error.pos).toBe(2);
    });

    it("reports an unclosed call at the end of input", () => {
      const error = syntaxError("f(a");
      expect(error.reason).toBe("')' expected.");
      expect(error.pos).toBe(3);
    });

    it("rejects a unary operand of **", () => {
      const error = syntaxError("-2 ** 2");
      expect(error.reason).toMatch(/^An unary expression with the '-' operator is not allowed/);
      expect(error.pos).toBe(0);
      expect(error.phase).toBe("parse");
    });

    it("rejects ?? mixed with || on the right", () => {
      const error = syntaxError("a ?? b || c");
      expect(error.reason).toBe("'||' and '??' operations cannot be mixed without parentheses.");
      expect(error.pos).toBe(5);
    });

    it("rejects && mixed with ?? on the left", () => {
      const error = syntaxError("a && b ?? c");
      expect(error.reason).toBe("'&&' and '??' operations cannot be mixed without parentheses.");
      expect(error.pos).toBe(0);
    });

    it("does not accept a statement", () => {
      const error = syntaxError("a; b");
      expect(error.reason).toBe("')' expected.");
      expect(error.pos).toBe(1);
    });
  });
});

describe("startsExpression", () => {
  it.each([
    [ts.SyntaxKind.Unknown, true],
    [ts.SyntaxKind.EqualsToken, true],
    [ts.SyntaxKind.OpenParenToken, true],
    [ts.SyntaxKind.EqualsGreaterThanToken, true],
    [ts.SyntaxKind.ReturnKeyword, true],
    [ts.SyntaxKind.AwaitKeyword, true],
    [ts.SyntaxKind.Identifier, false],
    [ts.SyntaxKind.CloseParenToken, false],
    [ts.SyntaxKind.CloseBracketToken, false],
    [ts.SyntaxKind.ThisKeyword, false],
    [ts.SyntaxKind.NumericLiteral, false],
    [ts.SyntaxKind.TypeKeyword, false],
  ])("kind %i → %s", (kind, expected) => {
    expect(startsExpression(kind)).toBe(expected);
  });
});
