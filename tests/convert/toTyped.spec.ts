import { describe, expect, it } from "vitest";

import {
  ConversionError,
  ConversionErrorCode,
  ParseError,
  TypedBranch,
  loadGrammar,
  synthesize,
  toText,
  toTyped,
  type TypedNode,
  type UntypedNode,
} from "../../src/index.js";
import { readGrammar } from "../fixtures/grammars.js";
import { TreeBuilder } from "../fixtures/trees.js";

const sumTypes = synthesize(loadGrammar(readGrammar("sum")));
const calcTypes = synthesize(loadGrammar(readGrammar("calc"), { extras: ["comment"] }));

function conversionError(run: () => unknown): ConversionError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConversionError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a ConversionError");
}

function branch(node: TypedNode | null | readonly TypedNode[] | undefined): TypedBranch {
  if (node instanceof TypedBranch) {
    return node;
  }
  throw new Error("expected a branch");
}

/** `1+2+3` as a left-associative chain of `add` nodes. */
function sumTree(): UntypedNode {
  const b = new TreeBuilder("1+2+3");
  const inner = b.node(
    "add",
    [b.leaf("number", 0, 1, "left"), b.token("+", 1), b.leaf("number", 2, 3, "right")],
    "left"
  );
  return b.node("add", [inner, b.token("+", 3), b.leaf("number", 4, 5, "right")]);
}

/** `f(1, x) - 2;` inside a program. */
function callTree(): UntypedNode {
  const b = new TreeBuilder("f(1, x) - 2;");
  const argumentList = b.node(
    "argument_list",
    [b.token("(", 1), b.leaf("number", 2, 3), b.token(",", 3), b.leaf("identifier", 5, 6), b.token(")", 6)],
    "arguments"
  );
  const call = b.node("call", [b.leaf("identifier", 0, 1, "function"), argumentList], "left");
  const binary = b.node(
    "binary_expression",
    [call, b.token("-", 8, "operator"), b.leaf("number", 10, 11, "right")],
    "value"
  );
  return b.node("program", [b.node("statement", [binary, b.token(";", 11)])]);
}

describe("toTyped", () => {
  it("converts a nested sum into typed fields", () => {
    const root = branch(toTyped(sumTree(), sumTypes));
    const left = branch(root.fields.left);

    expect(root.type).toBe("add");
    expect(left.type).toBe("add");
    expect(left.fields.left).toMatchObject({ shape: "leaf", type: "number", text: "1" });
    expect(left.fields.right).toMatchObject({ shape: "leaf", type: "number", text: "2" });
    expect(root.fields.right).toMatchObject({ shape: "leaf", type: "number", text: "3" });
    expect(root.children).toEqual([]);
  });

  it("keeps tokens no field retains as trivia", () => {
    const root = branch(toTyped(sumTree(), sumTypes));

    expect(root.trivia).toEqual([{ offset: 3, text: "+" }]);
    expect(branch(root.fields.left).trivia).toEqual([{ offset: 1, text: "+" }]);
    expect(toText(root)).toBe("1+2+3");
  });

  it("retains operator tokens when a field admits them", () => {
    const operand = [
      { type: "add", named: true },
      { type: "number", named: true },
    ];
    const withOperator = synthesize(
      loadGrammar([
        {
          type: "add",
          named: true,
          fields: {
            left: { required: true, types: operand },
            operator: { required: true, types: [{ type: "+", named: false }] },
            right: { required: true, types: operand },
          },
        },
        { type: "number", named: true },
        { type: "+", named: false },
      ])
    );
    const b = new TreeBuilder("1+2+3");
    const inner = b.node(
      "add",
      [b.leaf("number", 0, 1, "left"), b.token("+", 1, "operator"), b.leaf("number", 2, 3, "right")],
      "left"
    );
    const root = branch(
      toTyped(b.node("add", [inner, b.token("+", 3, "operator"), b.leaf("number", 4, 5, "right")]), withOperator)
    );

    expect(branch(root.fields.left).fields.operator).toMatchObject({ shape: "token", text: "+" });
    expect(root.fields.operator).toMatchObject({ shape: "token", range: { start: 3, end: 4 } });
    expect(root.trivia).toEqual([]);
    expect(toText(root)).toBe("1+2+3");
  });

  it("retains tokens a field admits and unwraps nested records", () => {
    const program = branch(toTyped(callTree(), calcTypes));
    const statement = branch(program.children[0]);
    const binary = branch(statement.fields.value);
    const call = branch(binary.fields.left);
    const argumentList = branch(call.fields.arguments);

    expect(program.children).toHaveLength(1);
    expect(binary.fields.operator).toMatchObject({ shape: "token", type: "-", text: "-" });
    expect(call.fields.function).toMatchObject({ shape: "leaf", type: "identifier", text: "f" });
    expect(argumentList.children.map((child) => [child.type, child.text])).toEqual([
      ["number", "1"],
      ["identifier", "x"],
    ]);
    expect(argumentList.trivia?.map((segment) => segment.text)).toEqual(["(", ",", " ", ")"]);
    expect(toText(program)).toBe("f(1, x) - 2;");
  });

  it("sets absent optional fields to null", () => {
    const b = new TreeBuilder("f");
    const call = branch(toTyped(b.node("call", [b.leaf("identifier", 0, 1, "function")]), calcTypes));

    expect(call.fields.arguments).toBeNull();
    expect(Object.keys(call.fields)).toEqual(["arguments", "function"]);
  });

  it("places extras among unfielded children", () => {
    const b = new TreeBuilder("x; # note");
    const tree = b.node(
      "program",
      [
        b.node("statement", [b.leaf("identifier", 0, 1, "value"), b.token(";", 1)]),
        b.leaf("comment", 3, 9),
      ],
      undefined,
      { start: 0, end: 9 }
    );
    const program = branch(toTyped(tree, calcTypes));

    expect(program.children.map((child) => child.type)).toEqual(["statement", "comment"]);
    expect(program.trivia).toEqual([{ offset: 2, text: " " }]);
    expect(toText(program)).toBe("x; # note");
  });

  it("unwraps union nodes around a single alternative", () => {
    const b = new TreeBuilder("7;");
    const tree = b.node("statement", [
      b.node("expression", [b.leaf("number", 0, 1)], "value"),
      b.token(";", 1),
    ]);
    const statement = branch(toTyped(tree, calcTypes));

    expect(statement.fields.value).toMatchObject({ shape: "leaf", type: "number", text: "7" });
  });

  it("rejects union nodes that wrap something other than one alternative", () => {
    const b = new TreeBuilder("f()");
    const notAnAlternative = b.node("expression", [b.node("argument_list", [b.token("(", 1), b.token(")", 2)])], undefined, {
      start: 1,
      end: 3,
    });
    const twoAlternatives = b.node("expression", [b.leaf("identifier", 0, 1), b.leaf("number", 1, 2)]);

    expect(conversionError(() => toTyped(notAnAlternative, calcTypes))).toMatchObject({
      code: ConversionErrorCode.KindMismatch,
      kind: "argument_list",
      parentKind: "expression",
    });
    expect(conversionError(() => toTyped(twoAlternatives, calcTypes)).message).toBe(
      'Union node "expression" at 0..2 must wrap exactly one alternative, found 2'
    );
  });

  it("reports two children in a single-valued field", () => {
    const b = new TreeBuilder("1+2+3");
    const tree = b.node("add", [
      b.leaf("number", 0, 1, "left"),
      b.leaf("number", 2, 3, "left"),
      b.leaf("number", 4, 5, "right"),
    ]);
    const error = conversionError(() => toTyped(tree, sumTypes));

    expect(error.code).toBe(ConversionErrorCode.FieldArityMismatch);
    expect(error.field).toBe("left");
    expect(error.message).toBe('Field "left" of "add" expects exactly one child but found 2');
    expect(error.range).toEqual({ start: 0, end: 5 });
  });

  it("reports a missing required field", () => {
    const b = new TreeBuilder("1");
    const error = conversionError(() => toTyped(b.node("add", [b.leaf("number", 0, 1, "left")]), sumTypes));

    expect(error.code).toBe(ConversionErrorCode.FieldArityMismatch);
    expect(error.field).toBe("right");
  });

  it("reports children a field does not admit", () => {
    const b = new TreeBuilder("();");
    const tree = b.node("statement", [
      b.node("argument_list", [b.token("(", 0), b.token(")", 1)], "value"),
      b.token(";", 2),
    ]);
    const error = conversionError(() => toTyped(tree, calcTypes));

    expect(error.code).toBe(ConversionErrorCode.KindMismatch);
    expect(error.message).toBe('Field "value" of "statement" does not admit "argument_list" at 0..2');
  });

  it("reports labels for fields the kind does not have", () => {
    const b = new TreeBuilder("1+2");
    const tree = b.node("add", [b.leaf("number", 0, 1, "lhs"), b.token("+", 1), b.leaf("number", 2, 3, "right")]);

    expect(conversionError(() => toTyped(tree, sumTypes))).toMatchObject({
      code: ConversionErrorCode.KindMismatch,
      field: "lhs",
      parentKind: "add",
    });
  });

  it("reports unknown kinds at the root and below it", () => {
    const b = new TreeBuilder("1?2");
    const mystery = b.leaf("mystery", 0, 3);
    const nested = b.node("add", [b.leaf("number", 0, 1, "left"), b.leaf("question", 1, 2), b.leaf("number", 2, 3, "right")]);

    expect(conversionError(() => toTyped(mystery, sumTypes))).toMatchObject({
      code: ConversionErrorCode.UnknownKind,
      kind: "mystery",
    });
    expect(conversionError(() => toTyped(nested, sumTypes))).toMatchObject({
      code: ConversionErrorCode.UnknownKind,
      kind: "question",
      parentKind: "add",
      range: { start: 1, end: 2 },
    });
  });

  it("refuses to convert an anonymous root", () => {
    const b = new TreeBuilder("+");

    expect(conversionError(() => toTyped(b.token("+", 0), sumTypes)).code).toBe(
      ConversionErrorCode.KindMismatch
    );
  });

  describe("leaf kinds", () => {
    const b = new TreeBuilder("a@b");
    const withError = b.node("identifier", [b.node("ERROR", [], undefined, { start: 1, end: 2 })], undefined, {
      start: 0,
      end: 3,
    });

    it("keep the whole text when an ERROR node sits inside them", () => {
      expect(toTyped(withError, calcTypes)).toMatchObject({ shape: "leaf", type: "identifier", text: "a@b" });
    });

    it("raise a parse error for a nested ERROR node when asked to", () => {
      let raised: unknown;
      try {
        toTyped(withError, calcTypes, { raiseParseError: true });
      } catch (error) {
        raised = error;
      }

      expect(raised).toBeInstanceOf(ParseError);
      expect(raised instanceof ParseError && raised.message).toBe(
        "Parse error on line 1 between column 1 and 2:\na@b\n ^"
      );
    });

    it("reject named children that are not extras", () => {
      const tree = b.node("identifier", [b.leaf("number", 1, 2)], undefined, { start: 0, end: 3 });

      expect(conversionError(() => toTyped(tree, calcTypes))).toMatchObject({
        code: ConversionErrorCode.KindMismatch,
        kind: "number",
        parentKind: "identifier",
      });
    });
  });

  describe("ERROR nodes", () => {
    const source = "x;\n@@ y;";
    const b = new TreeBuilder(source);
    const tree = b.node("program", [
      b.node("statement", [b.leaf("identifier", 0, 1, "value"), b.token(";", 1)]),
      b.node("ERROR", [], undefined, { start: 3, end: 5 }),
      b.node("statement", [b.leaf("identifier", 6, 7, "value"), b.token(";", 7)]),
    ]);

    it("converts them as extras by default", () => {
      const program = branch(toTyped(tree, calcTypes));

      expect(program.children.map((child) => child.type)).toEqual(["statement", "ERROR", "statement"]);
      expect(branch(program.children[1]).trivia).toEqual([{ offset: 3, text: "@@" }]);
      expect(toText(program)).toBe(source);
    });

    it("raises a located parse error when asked to", () => {
      let raised: unknown;
      try {
        toTyped(tree, calcTypes, { raiseParseError: true, filename: "demo.calc" });
      } catch (error) {
        raised = error;
      }

      expect(raised).toBeInstanceOf(ParseError);
      expect(raised instanceof ParseError && raised.message).toBe(
        "Parse error in demo.calc on line 2 between column 0 and 2:\n@@ y;\n^^"
      );
    });

    it("ignores field labels inside them", () => {
      const labelled = new TreeBuilder("1 +");
      const error = labelled.node("ERROR", [labelled.leaf("number", 0, 1, "left"), labelled.token("+", 2)]);
      const converted = branch(toTyped(error, sumTypes));

      expect(converted.children.map((child) => child.type)).toEqual(["number"]);
      expect(toText(converted)).toBe("1 +");
    });
  });

  describe("positional field assignment", () => {
    const positional = { fieldAssignment: "positional" } as const;

    it("fills fields in declaration order", () => {
      const b = new TreeBuilder("1+2");
      const tree = b.node("add", [b.leaf("number", 0, 1), b.token("+", 1), b.leaf("number", 2, 3)]);
      const add = branch(toTyped(tree, sumTypes, positional));

      expect(add.fields.left).toMatchObject({ text: "1" });
      expect(add.fields.right).toMatchObject({ text: "2" });
      expect(toText(add)).toBe("1+2");
    });

    it("fills a token field from an anonymous child", () => {
      const b = new TreeBuilder("a - 1");
      const tree = b.node("binary_expression", [b.leaf("identifier", 0, 1), b.token("-", 2), b.leaf("number", 4, 5)]);
      const binary = branch(toTyped(tree, calcTypes, positional));

      expect(binary.fields.operator).toMatchObject({ shape: "token", text: "-" });
      expect(binary.fields.right).toMatchObject({ type: "number", text: "1" });
      expect(toText(binary)).toBe("a - 1");
    });

    it("reports a required field skipped by a later match", () => {
      const b = new TreeBuilder("a 1");
      const tree = b.node("binary_expression", [b.leaf("identifier", 0, 1), b.leaf("number", 2, 3)]);

      expect(conversionError(() => toTyped(tree, calcTypes, positional))).toMatchObject({
        code: ConversionErrorCode.FieldArityMismatch,
        field: "operator",
      });
    });

    it("reports surplus children for a filled field", () => {
      const b = new TreeBuilder("1 2 3");
      const tree = b.node("add", [b.leaf("number", 0, 1), b.leaf("number", 2, 3), b.leaf("number", 4, 5)]);
      const error = conversionError(() => toTyped(tree, sumTypes, positional));

      expect(error.code).toBe(ConversionErrorCode.FieldArityMismatch);
      expect(error.message).toBe('Field "left" of "add" expects exactly one child but found 2');
    });

    it("does not revisit optional fields it moved past", () => {
      const b = new TreeBuilder("f()");
      const tree = b.node("call", [
        b.leaf("identifier", 0, 1),
        b.node("argument_list", [b.token("(", 1), b.token(")", 2)]),
      ]);

      expect(conversionError(() => toTyped(tree, calcTypes, positional))).toMatchObject({
        code: ConversionErrorCode.KindMismatch,
        kind: "argument_list",
        parentKind: "call",
      });
    });

    describe("with an optional field before a token field", () => {
      const assignTypes = synthesize(
        loadGrammar([
          {
            type: "assign",
            named: true,
            fields: {
              modifier: { types: [{ type: "identifier", named: true }] },
              operator: { required: true, types: [{ type: "=", named: false }] },
              value: { required: true, types: [{ type: "number", named: true }] },
            },
          },
          { type: "identifier", named: true },
          { type: "number", named: true },
          { type: "=", named: false },
        ])
      );

      it("moves past the absent optional field to place the token", () => {
        const b = new TreeBuilder("= 1");
        const assign = branch(
          toTyped(b.node("assign", [b.token("=", 0), b.leaf("number", 2, 3)]), assignTypes, positional)
        );

        expect(assign.fields.modifier).toBeNull();
        expect(assign.fields.operator).toMatchObject({ shape: "token", text: "=" });
        expect(assign.fields.value).toMatchObject({ type: "number", text: "1" });
        expect(toText(assign)).toBe("= 1");
      });

      it("still fills the optional field when it is present", () => {
        const b = new TreeBuilder("x = 1");
        const assign = branch(
          toTyped(
            b.node("assign", [b.leaf("identifier", 0, 1), b.token("=", 2), b.leaf("number", 4, 5)]),
            assignTypes,
            positional
          )
        );

        expect(assign.fields.modifier).toMatchObject({ type: "identifier", text: "x" });
        expect(assign.fields.operator).toMatchObject({ shape: "token", text: "=" });
        expect(toText(assign)).toBe("x = 1");
      });
    });

    it("sends unfielded named children to the children slot", () => {
      const b = new TreeBuilder("(1, x)");
      const tree = b.node("argument_list", [
        b.token("(", 0),
        b.leaf("number", 1, 2),
        b.token(",", 2),
        b.leaf("identifier", 4, 5),
        b.token(")", 5),
      ]);
      const argumentList = branch(toTyped(tree, calcTypes, positional));

      expect(argumentList.children.map((child) => child.text)).toEqual(["1", "x"]);
      expect(toText(argumentList)).toBe("(1, x)");
    });
  });
});
