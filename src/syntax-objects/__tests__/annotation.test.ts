import { describe, test } from "vitest";
import { DiagnosticsContext } from "../../diagnostics/index.js";
import { Annotation, annotationName, annotationSchemas } from "../annotation.js";
import { ConstantValue } from "../const-expr.js";
import { annotation, bool, int, loc, ref, str } from "./helpers.js";

const identity = (_type: unknown, raw: string) => raw;

describe("Annotation.parse", () => {
  test("binds known names to their schema", (t) => {
    const parsed = annotation("Backing", { type: str("int") });
    t.expect(parsed.kind).toBe("backing");
    t.expect(parsed.repeatable).toBe(false);
    t.expect(annotationName("javaStableParcelable")).toBe("JavaOnlyStableParcelable");
  });

  test("reports unknown names with the valid ones", (t) => {
    const diagnostics = new DiagnosticsContext();
    const parsed = Annotation.parse(loc(), "Frobnicate", undefined, diagnostics);
    t.expect(parsed).toBeUndefined();
    t.expect(diagnostics.diagnostics[0].code).toBe("AN0001");
    t.expect(diagnostics.diagnostics[0].message).toBe(
      `'Frobnicate' is not a recognized annotation. It must be one of: ${annotationSchemas
        .map((s) => s.name)
        .join(" ")}.`
    );
  });
});

describe("Annotation.checkValid", () => {
  test("accepts well-typed parameters", (t) => {
    const diagnostics = new DiagnosticsContext();
    const parsed = annotation("JavaDerive", { toString: bool(true), equals: bool(false) });
    t.expect(parsed.checkValid(diagnostics)).toBe(true);
    t.expect(diagnostics.size).toBe(0);
    t.expect(parsed.paramValue("toString", "boolean")).toBe(true);
  });

  test("reports missing required parameters", (t) => {
    const diagnostics = new DiagnosticsContext();
    t.expect(annotation("Backing").checkValid(diagnostics)).toBe(false);
    t.expect(diagnostics.diagnostics.map((d) => d.message)).toEqual([
      "Missing 'type' on @Backing.",
    ]);
  });

  test("reports unsupported parameters and keeps going", (t) => {
    const diagnostics = new DiagnosticsContext();
    t.expect(annotation("Backing", { size: int("1") }).checkValid(diagnostics)).toBe(false);
    t.expect(diagnostics.diagnostics.map((d) => d.code)).toEqual(["AN0002", "AN0005"]);
    t.expect(diagnostics.diagnostics[0].message).toBe(
      "Parameter size not supported for annotation Backing. It must be one of: type"
    );
  });

  test("reports values of the wrong type", (t) => {
    const diagnostics = new DiagnosticsContext();
    t.expect(annotation("JavaDerive", { toString: int("1") }).checkValid(diagnostics)).toBe(
      false
    );
    t.expect(diagnostics.diagnostics.map((d) => d.code)).toEqual(["CV0001", "AN0004"]);
    t.expect(diagnostics.diagnostics[1].message).toBe(
      "Invalid value for parameter toString on annotation JavaDerive."
    );
  });

  test("rejects references in parameter values", (t) => {
    const diagnostics = new DiagnosticsContext();
    const value = ConstantValue.binary(loc(), str("a"), "+", ref("Names.FOO"));
    t.expect(annotation("Descriptor", { value }).checkValid(diagnostics)).toBe(false);
    t.expect(diagnostics.diagnostics.map((d) => d.message)).toEqual([
      "Value must be a constant expression but contains reference to FOO.",
    ]);
  });
});

test("annotationParams renders usable parameters only", (t) => {
  const diagnostics = new DiagnosticsContext();
  const parsed = annotation("UnsupportedAppUsage", {
    maxTargetSdk: int("28"),
    trackingBug: int("1L"),
    bogus: int("1"),
  });
  const params = parsed.annotationParams(identity, diagnostics);
  t.expect([...params]).toEqual([
    ["maxTargetSdk", "28"],
    ["trackingBug", "1"],
  ]);
  t.expect(diagnostics.diagnostics.map((d) => d.code)).toEqual(["AN0002"]);
});

test("paramValue returns undefined for absent or mistyped values", (t) => {
  const parsed = annotation("Backing", { type: str("long") });
  t.expect(parsed.paramValue("type", "string")).toBe("long");
  t.expect(parsed.paramValue("type", "boolean")).toBeUndefined();
  t.expect(parsed.paramValue("missing", "string")).toBeUndefined();
});

test("toString renders parameters in name order", (t) => {
  t.expect(annotation("nullable").toString()).toBe("@nullable");
  t.expect(
    annotation("JavaDerive", { toString: bool(true), equals: bool(false) }).toString()
  ).toBe("@JavaDerive(equals=false, toString=true)");
});
