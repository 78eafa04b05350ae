import { describe, test } from "vitest";
import type { Annotation } from "../annotation.js";
import { ConstantDeclaration } from "../constant-declaration.js";
import { EnumDeclaration, Enumerator } from "../enum.js";
import { ParcelableDeclaration } from "../parcelable.js";
import { StructuredParcelableDeclaration } from "../structured-parcelable.js";
import { UnionDeclaration } from "../union.js";
import type { Member } from "../defined-type.js";
import { annotation, check, field, int, loc, ref, str, typeSpec } from "./helpers.js";

const structured = (
  name: string,
  members: Member[],
  annotations: Annotation[] = []
) => new StructuredParcelableDeclaration({ location: loc(), name, members, annotations });

const union = (name: string, members: Member[]) =>
  new UnionDeclaration({ location: loc(), name, members });

const color = () =>
  new EnumDeclaration({
    location: loc(),
    name: "Color",
    enumerators: [
      new Enumerator({ location: loc(), name: "RED" }),
      new Enumerator({ location: loc(), name: "GREEN" }),
    ],
  });

describe("unstructured parcelables", () => {
  test("native backends need a header", (t) => {
    const parcelable = () => new ParcelableDeclaration({ location: loc(), name: "Opaque" });
    t.expect(check([parcelable()], { config: { language: "java" } }).ok).toBe(true);

    const result = check([parcelable()], { config: { language: "cpp" } });
    t.expect(result.ok).toBe(false);
    t.expect(result.messages).toEqual(["Unstructured parcelable must have C++ header defined."]);
  });

  test("header quotes are stripped", (t) => {
    const parcelable = new ParcelableDeclaration({
      location: loc(),
      name: "Opaque",
      cppHeader: '"opaque.h"',
    });
    t.expect(parcelable.cppHeader).toBe("opaque.h");
    t.expect(check([parcelable], { config: { language: "ndk" } }).ok).toBe(true);
  });

  test("type parameters must be unique", (t) => {
    const box = new ParcelableDeclaration({
      location: loc(),
      name: "Box",
      typeParameters: ["T", "T"],
    });
    t.expect(check([box]).messages).toEqual(["Every type parameter should be unique."]);
  });
});

describe("structured parcelables", () => {
  test("fields must have unique names", (t) => {
    const data = structured("Data", [
      field(typeSpec("int"), "x"),
      field(typeSpec("long"), "x"),
    ]);
    t.expect(check([data]).messages).toEqual(["'Data' has duplicate field name 'x'"]);
  });

  test("constants must have unique names", (t) => {
    const constant = (value: string) =>
      new ConstantDeclaration({ location: loc(), type: typeSpec("int"), name: "MAX", value: int(value) });
    const data = structured("Data", [constant("1"), constant("2")]);
    t.expect(check([data]).messages).toEqual(["Found duplicate constant name 'MAX'"]);
  });

  test("unresolved field types stop validation", (t) => {
    const data = structured("Data", [field(typeSpec("Missing"), "m")]);
    const result = check([data]);
    t.expect(result.ok).toBe(false);
    t.expect(result.messages).toEqual(["Failed to resolve 'Missing'"]);
  });

  test("field defaults may refer to the type's constants", (t) => {
    const data = structured("Data", [
      new ConstantDeclaration({ location: loc(), type: typeSpec("int"), name: "BASE", value: int("8") }),
      field(typeSpec("int"), "size", ref("BASE")),
    ]);
    const result = check([data]);
    t.expect(result.ok).toBe(true);
    t.expect(data.fields[0].valueString((_type, raw) => raw)).toBe("8");
  });

  test("@FixedSize fields need a fixed size", (t) => {
    const data = structured(
      "Data",
      [field(typeSpec("int"), "count"), field(typeSpec("String"), "name")],
      [annotation("FixedSize")]
    );
    t.expect(check([data]).messages).toEqual([
      "The @FixedSize parcelable 'Data' has a non-fixed size field named name (String).",
    ]);
  });

  test("@FixedSize accepts nested fixed-size parcelables", (t) => {
    const inner = structured("Inner", [field(typeSpec("long"), "v")], [annotation("FixedSize")]);
    const outer = structured(
      "Outer",
      [field(typeSpec("Inner"), "inner"), field(typeSpec("Color"), "color", ref("Color.RED"))],
      [annotation("FixedSize")]
    );
    t.expect(check([inner, outer, color()]).diagnostics).toEqual([]);
  });

  test("@JavaOnlyImmutable fields must be immutable", (t) => {
    const mutable = structured("Mutable", []);
    const data = structured(
      "Data",
      [
        field(typeSpec("Mutable"), "inner"),
        field(typeSpec("List", { typeParameters: [typeSpec("String")] }), "names"),
      ],
      [annotation("JavaOnlyImmutable")]
    );
    t.expect(check([mutable, data]).messages).toEqual([
      "The @JavaOnlyImmutable 'Data' has a non-immutable field named 'inner' (not @JavaOnlyImmutable).",
    ]);
  });

  test("@JavaOnlyImmutable getter names must not collide", (t) => {
    const data = structured(
      "Data",
      [field(typeSpec("int"), "size"), field(typeSpec("int"), "Size")],
      [annotation("JavaOnlyImmutable")]
    );
    t.expect(check([data]).messages).toEqual([
      "'Data' has duplicate field name 'Size' after capitalizing the first letter",
    ]);
  });

  test("dump writes the declaration back", (t) => {
    const data = structured(
      "Data",
      [
        field(typeSpec("int"), "count", int("3")),
        new ConstantDeclaration({ location: loc(), type: typeSpec("String"), name: "TAG", value: str("data") }),
      ],
      [annotation("FixedSize")]
    );
    check([data]);
    t.expect(data.toString()).toBe(
      '@FixedSize\nparcelable Data {\n  int count = 3;\n  const String TAG = "data";\n}\n'
    );
  });
});

describe("unions", () => {
  test("need at least one field", (t) => {
    t.expect(check([union("Empty", [])]).messages).toEqual(["The union 'Empty' has no fields."]);
  });

  test("the first enum field needs a default", (t) => {
    const result = check([color(), union("U", [field(typeSpec("Color"), "c")])]);
    t.expect(result.codes).toEqual(["DC0009"]);
    t.expect(result.messages[0]).toMatch(/^The union's first member should have a useful default value\. Enum types/);
  });

  test("an enum default satisfies the first field", (t) => {
    const u = union("U", [field(typeSpec("Color"), "c", ref("Color.GREEN"))]);
    t.expect(check([color(), u]).ok).toBe(true);
    t.expect(u.toString()).toBe("union U {\n  Color c = Color.GREEN;\n}\n");
  });

  test("the first array field needs a default", (t) => {
    const result = check([union("U", [field(typeSpec("int", { isArray: true }), "values")])]);
    t.expect(result.codes).toEqual(["DC0009"]);
    t.expect(result.messages[0]).toMatch(/Arrays can be initialized with values/);
  });

  test("a nullable array satisfies the first field", (t) => {
    const values = field(
      typeSpec("int", { isArray: true, annotations: [annotation("nullable")] }),
      "values"
    );
    t.expect(check([union("U", [values])]).ok).toBe(true);
  });

  test("can't hold a ParcelableHolder", (t) => {
    const result = check([
      union("U", [field(typeSpec("int"), "n"), field(typeSpec("ParcelableHolder"), "extension")]),
    ]);
    t.expect(result.messages).toEqual(["A union can't have a member of ParcelableHolder 'extension'"]);
  });

  test("getter names always matter", (t) => {
    const result = check([union("U", [field(typeSpec("int"), "a"), field(typeSpec("long"), "A")])]);
    t.expect(result.messages).toEqual([
      "'U' has duplicate field name 'A' after capitalizing the first letter",
    ]);
  });
});
