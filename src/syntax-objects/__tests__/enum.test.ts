import { describe, test } from "vitest";
import { DiagnosticsContext } from "../../diagnostics/index.js";
import { TypeNames } from "../../semantics/typenames.js";
import type { Annotation } from "../annotation.js";
import { ConstantValue } from "../const-expr.js";
import { EnumDeclaration, Enumerator } from "../enum.js";
import { constantValueDecorator } from "../type-specifier.js";
import { VariableDeclaration } from "../variable.js";
import { annotation, check, int, loc, str, typeSpec } from "./helpers.js";

const enumerator = (name: string, value?: ConstantValue) =>
  new Enumerator({ location: loc(), name, value });

const makeEnum = (
  enumerators: Enumerator[],
  annotations: Annotation[] = [],
  name = "Level"
) => new EnumDeclaration({ location: loc(), name, enumerators, annotations });

const values = (decl: EnumDeclaration) => {
  const backingType = decl.backingType;
  if (!backingType) throw new Error("not autofilled");
  return decl.enumerators.map((e) => e.valueString(backingType, constantValueDecorator));
};

describe("enum autofill", () => {
  test("numbers enumerators from zero", (t) => {
    const level = makeEnum([enumerator("A"), enumerator("B"), enumerator("C")]);
    const result = check([level]);
    t.expect(result.diagnostics).toEqual([]);
    t.expect(values(level)).toEqual(["0", "1", "2"]);
    t.expect(level.backingType?.name).toBe("byte");
  });

  test("continues from the last written value", (t) => {
    const level = makeEnum([enumerator("A", int("5")), enumerator("B"), enumerator("C")]);
    const result = check([level]);
    t.expect(result.ok).toBe(true);
    t.expect(values(level)).toEqual(["5", "6", "7"]);
    t.expect(result.messages).toEqual(["The first enumerator 'A' should be 0, but it is 5."]);
  });

  test("a failing value is reported once for the enumerators after it", (t) => {
    const level = makeEnum([
      enumerator("A", ConstantValue.binary(loc(), int("1"), "/", int("0"))),
      enumerator("B"),
      enumerator("C"),
    ]);
    const result = check([level]);
    t.expect(result.ok).toBe(false);
    t.expect(result.codes).toEqual(["CV0001"]);
    t.expect(result.messages).toEqual(["Cannot divide by 0: 1 / 0"]);
  });

  test("long autofilled enums check cleanly", (t) => {
    const names = Array.from({ length: 300 }, (_, i) => `V${i}`);
    const level = makeEnum(
      names.map((name) => enumerator(name)),
      [annotation("Backing", { type: str("int") })]
    );
    t.expect(check([level]).diagnostics).toEqual([]);
    t.expect(values(level).slice(-2)).toEqual(["298", "299"]);
  });

  test("filled values refer to the previous enumerator", (t) => {
    const level = makeEnum([enumerator("A"), enumerator("B", int("10")), enumerator("C")]);
    t.expect(level.enumerators.map((e) => e.value?.toString())).toEqual(["0", "10", "B + 1"]);
    t.expect(level.enumerators.map((e) => e.toString())).toEqual(["A", "B = 10", "C"]);
    t.expect(level.enumerators[2].parent).toBe(level);
    t.expect(level.enumerators[2].enumCanonicalName).toBe("Level");
  });
});

describe("@Backing", () => {
  test("sets the backing type", (t) => {
    const level = makeEnum(
      [enumerator("LOW", int("0")), enumerator("HIGH", int("300"))],
      [annotation("Backing", { type: str("int") })]
    );
    t.expect(check([level]).ok).toBe(true);
    t.expect(level.backingType?.name).toBe("int");
    t.expect(level.backingTypeName()).toBe("int");
    t.expect(values(level)).toEqual(["0", "300"]);
  });

  test("byte is the default and bounds the values", (t) => {
    const level = makeEnum([enumerator("LOW", int("0")), enumerator("HIGH", int("300"))]);
    const result = check([level]);
    t.expect(result.ok).toBe(false);
    t.expect(result.codes).toEqual(["CV0001", "DC0010"]);
    t.expect(result.messages[1]).toBe("Enumerator type differs from enum backing type: HIGH");
  });

  test("rejects non-integral backing types", (t) => {
    const level = makeEnum([enumerator("A")], [annotation("Backing", { type: str("String") })]);
    const result = check([level]);
    t.expect(result.ok).toBe(false);
    t.expect(result.messages).toEqual(["Invalid backing type: String"]);
  });

  test("autofill runs once", (t) => {
    const level = makeEnum([enumerator("A")]);
    const diagnostics = new DiagnosticsContext();
    t.expect(level.autofill(new TypeNames(), diagnostics)).toBe(true);
    const first = level.backingType;
    t.expect(level.autofill(new TypeNames(), diagnostics)).toBe(true);
    t.expect(level.backingType).toBe(first);
  });
});

test("enums can't have members", (t) => {
  const level = new EnumDeclaration({
    location: loc(),
    name: "Level",
    enumerators: [enumerator("A")],
    members: [new VariableDeclaration({ location: loc(), type: typeSpec("int"), name: "x" })],
  });
  t.expect(check([level]).messages).toEqual(["Enum doesn't support fields/constants/methods."]);
});

test("validation without autofill is reported", (t) => {
  const diagnostics = new DiagnosticsContext();
  const level = makeEnum([enumerator("A")]);
  t.expect(level.checkValid(new TypeNames(), diagnostics)).toBe(false);
  t.expect(diagnostics.diagnostics.map((d) => d.message)).toEqual([
    "Enum declaration missing backing type.",
  ]);
});

test("dump renders evaluated values", (t) => {
  const level = makeEnum(
    [enumerator("A"), enumerator("B")],
    [annotation("Backing", { type: str("long") })]
  );
  check([level]);
  t.expect(level.toString()).toBe('@Backing(type="long")\nenum Level {\n  A = 0,\n  B = 1,\n}\n');
});

test("adopting an enumerator twice is a contract violation", (t) => {
  const shared = enumerator("A");
  makeEnum([shared]);
  t.expect(() => makeEnum([shared])).toThrow("Enumerator A already belongs to an enum");
});
