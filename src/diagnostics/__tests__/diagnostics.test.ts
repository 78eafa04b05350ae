import { describe, expect, it } from "vitest";
import {
  DiagnosticsContext,
  diagnosticFromCode,
  formatDiagnostic,
  formatSpan,
} from "../index.js";

const span = {
  file: "test.aidl",
  begin: { line: 3, column: 5 },
  end: { line: 3, column: 9 },
};

describe("diagnostics", () => {
  it("builds diagnostics from registry codes", () => {
    const diagnostic = diagnosticFromCode({
      code: "RS0001",
      params: { kind: "unresolved-type", name: "Foo" },
      span,
    });

    expect(diagnostic.message).toBe("Failed to resolve 'Foo'");
    expect(diagnostic.severity).toBe("error");
    expect(diagnostic.phase).toBe("resolution");
    expect(formatDiagnostic(diagnostic)).toBe(
      "test.aidl:3.5-9 ERROR [resolution] RS0001: Failed to resolve 'Foo'"
    );
  });

  it("formats spans across lines and synthesized spans", () => {
    expect(
      formatSpan({ file: "a.aidl", begin: { line: 1, column: 1 }, end: { line: 3, column: 4 } })
    ).toBe("a.aidl:1.1-3.4");
    expect(
      formatSpan({
        file: "<builtin>",
        begin: { line: 0, column: 0 },
        end: { line: 0, column: 0 },
        source: "synthesized",
      })
    ).toBe("<builtin>");
  });

  it("renders every variant of a multi-kind code", () => {
    const duplicate = diagnosticFromCode({
      code: "IF0007",
      params: { kind: "duplicate-method", signature: "foo(int)" },
      span,
    });
    const previous = diagnosticFromCode({
      code: "IF0007",
      params: { kind: "previous-method", signature: "foo(int)" },
      span,
    });

    expect(duplicate.message).toBe("attempt to redefine method foo(int)");
    expect(previous.message).toBe("foo(int) previously defined here");
  });

  it("reports advisories as warnings by default", () => {
    const diagnostics = new DiagnosticsContext();
    const reported = diagnostics.report({
      code: "WN0002",
      params: { kind: "interface-name", name: "Foo" },
      span,
    });

    expect(reported?.severity).toBe("warning");
    expect(diagnostics.warnings).toHaveLength(1);
    expect(diagnostics.hasErrors).toBe(false);
    expect(formatDiagnostic(diagnostics.diagnostics[0])).toBe(
      "test.aidl:3.5-9 WARNING [interface] WN0002: Interface names should start with I: Foo [-Winterface-name]"
    );
  });

  it("promotes advisories with warningsAsErrors", () => {
    const diagnostics = new DiagnosticsContext({ warningsAsErrors: true });
    diagnostics.report({
      code: "WN0003",
      params: { kind: "inout-parameter", argument: "data" },
      span,
    });

    expect(diagnostics.errors).toHaveLength(1);
    expect(diagnostics.hasErrors).toBe(true);
    expect(diagnostics.errors[0].hints).toHaveLength(1);
  });

  it("drops disabled advisories but keeps hard errors", () => {
    const diagnostics = new DiagnosticsContext({
      warningsAsErrors: true,
      disabledWarnings: ["enum-zero"],
    });

    const dropped = diagnostics.report({
      code: "WN0001",
      params: { kind: "enum-zero", enumerator: "A", value: "1" },
      span,
    });
    diagnostics.report({
      code: "DC0004",
      params: { kind: "duplicate-constant", name: "X" },
      span,
    });

    expect(dropped).toBeUndefined();
    expect(diagnostics.size).toBe(1);
    expect(diagnostics.diagnostics[0].message).toBe("Found duplicate constant name 'X'");

    diagnostics.clear();
    expect(diagnostics.size).toBe(0);
  });
});
