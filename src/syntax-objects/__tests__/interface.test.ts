import { describe, test } from "vitest";
import type { Annotation } from "../annotation.js";
import { Argument, type Direction } from "../argument.js";
import { ConstantDeclaration } from "../constant-declaration.js";
import { InterfaceDeclaration } from "../interface.js";
import { Method } from "../method.js";
import { StructuredParcelableDeclaration } from "../structured-parcelable.js";
import type { TypeSpecifier } from "../type-specifier.js";
import { annotation, check, int, loc, str, typeSpec } from "./helpers.js";

const arg = (type: TypeSpecifier, name: string, direction?: Direction) =>
  new Argument({ location: loc(), type, name, direction });

const method = (
  name: string,
  args: Argument[] = [],
  opts: { returns?: TypeSpecifier; oneway?: boolean; line?: number } = {}
) =>
  new Method({
    location: loc(opts.line ?? 1),
    type: opts.returns ?? typeSpec("void"),
    name,
    arguments: args,
    oneway: opts.oneway,
  });

const iface = (
  methods: Method[],
  opts: { name?: string; oneway?: boolean; annotations?: Annotation[]; package?: string } = {}
) =>
  new InterfaceDeclaration({
    location: loc(),
    name: opts.name ?? "IFoo",
    package: opts.package,
    oneway: opts.oneway,
    annotations: opts.annotations,
    members: methods,
  });

const data = () => new StructuredParcelableDeclaration({ location: loc(), name: "Data" });

describe("oneway", () => {
  test("oneway methods can't return values", (t) => {
    const result = check([iface([method("foo", [], { returns: typeSpec("int"), oneway: true })])]);
    t.expect(result.codes).toEqual(["IF0002"]);
    t.expect(result.messages).toEqual(["oneway method 'foo' cannot return a value"]);
  });

  test("a oneway interface makes every method oneway", (t) => {
    const foo = method("foo");
    const bar = method("bar", [], { oneway: true });
    iface([foo, bar], { oneway: true });
    t.expect(foo.oneway).toBe(true);
    t.expect(bar.oneway).toBe(true);
    t.expect(method("baz").oneway).toBe(false);
  });

  test("out arguments of oneway methods are rejected", (t) => {
    const foo = method("foo", [arg(typeSpec("String", { isArray: true }), "names", "out")]);
    const result = check([iface([foo], { oneway: true })]);
    t.expect(result.codes).toEqual(["IF0002"]);
    t.expect(result.messages).toEqual(["oneway method 'foo' cannot have out parameters"]);
  });
});

describe("methods", () => {
  test("signatures must be unique", (t) => {
    const result = check([
      iface([
        method("foo", [arg(typeSpec("int"), "a")], { line: 3 }),
        method("foo", [arg(typeSpec("int"), "b")], { line: 5 }),
      ]),
    ]);
    t.expect(result.codes).toEqual(["IF0007"]);
    const [duplicate] = result.diagnostics;
    t.expect(duplicate.message).toBe("attempt to redefine method foo(int)");
    t.expect(duplicate.span.begin.line).toBe(5);
    t.expect(duplicate.related?.[0].message).toBe("foo(int) previously defined here");
    t.expect(duplicate.related?.[0].span.begin.line).toBe(3);
  });

  test("overloads with different argument types are allowed", (t) => {
    const result = check([
      iface([method("foo", [arg(typeSpec("int"), "a")]), method("foo", [arg(typeSpec("long"), "a")])]),
    ]);
    t.expect(result.ok).toBe(true);
    t.expect(result.diagnostics).toEqual([]);
  });

  test("reserved names are rejected", (t) => {
    const result = check([
      iface([method("getInterfaceVersion", [], { returns: typeSpec("int") })]),
    ]);
    t.expect(result.messages).toEqual([
      "method getInterfaceVersion() is reserved for internal use.",
    ]);
  });

  test("ParcelableHolder can't cross the interface", (t) => {
    const result = check([
      iface([
        method("get", [], { returns: typeSpec("ParcelableHolder") }),
        method("put", [arg(typeSpec("ParcelableHolder"), "holder", "in")]),
      ]),
    ]);
    t.expect(result.messages).toEqual([
      "ParcelableHolder cannot be a return type",
      "ParcelableHolder cannot be an argument type",
    ]);
  });

  test("argument names must be unique", (t) => {
    const result = check([
      iface([method("foo", [arg(typeSpec("int"), "a"), arg(typeSpec("long"), "a")])]),
    ]);
    t.expect(result.messages).toEqual(["method 'foo' has duplicate argument name 'a'"]);
  });
});

describe("argument directions", () => {
  test("primitives can only be in", (t) => {
    const result = check([iface([method("foo", [arg(typeSpec("int"), "x", "out")])])]);
    t.expect(result.codes).toEqual(["IF0005"]);
    t.expect(result.messages).toEqual([
      "'x' can't be an out parameter because primitive type can only be an in parameter.",
    ]);
  });

  test("parcelables must declare a direction", (t) => {
    const result = check([data(), iface([method("foo", [arg(typeSpec("Data"), "d")])])]);
    t.expect(result.codes).toEqual(["IF0004"]);
    t.expect(result.messages).toEqual([
      "'Data' can be an out type, so you must declare it as in, out, or inout.",
    ]);
  });

  test("a declared direction satisfies parcelables", (t) => {
    const result = check([data(), iface([method("foo", [arg(typeSpec("Data"), "d", "out")])])]);
    t.expect(result.ok).toBe(true);
  });

  test("interfaces can only be in", (t) => {
    const listener = iface([], { name: "IListener" });
    const result = check([
      listener,
      iface([method("register", [arg(typeSpec("IListener"), "l", "inout")])]),
    ]);
    t.expect(result.messages).toEqual([
      "'l' can't be an inout parameter because interface can only be an in parameter.",
      "l is 'inout'. Avoid inout parameters.",
    ]);
  });

  test("inout is allowed with a warning", (t) => {
    const result = check([
      iface([method("fill", [arg(typeSpec("String", { isArray: true }), "data", "inout")])]),
    ]);
    t.expect(result.ok).toBe(true);
    t.expect(result.codes).toEqual(["WN0003"]);
    t.expect(result.messages).toEqual(["data is 'inout'. Avoid inout parameters."]);
  });

  test("-Werror turns the inout warning into an error", (t) => {
    const result = check(
      [iface([method("fill", [arg(typeSpec("String", { isArray: true }), "data", "inout")])])],
      { config: { warningsAsErrors: true } }
    );
    t.expect(result.ok).toBe(false);
    t.expect(result.diagnostics[0].severity).toBe("error");
  });
});

describe("argument names", () => {
  test("keywords are rejected", (t) => {
    const result = check([iface([method("foo", [arg(typeSpec("int"), "new")])])]);
    t.expect(result.codes).toEqual(["IF0006"]);
    t.expect(result.messages).toEqual(["Argument name 'new' is a Java or aidl keyword"]);
  });

  test("the reserved prefix is rejected", (t) => {
    const result = check([iface([method("foo", [arg(typeSpec("int"), "_aidl_data")])])]);
    t.expect(result.messages).toEqual(["Argument name cannot begin with '_aidl'"]);
  });
});

test("names should start with I", (t) => {
  const result = check([iface([], { name: "Foo" })]);
  t.expect(result.ok).toBe(true);
  t.expect(result.codes).toEqual(["WN0002"]);
  t.expect(result.messages).toEqual(["Interface names should start with I: Foo"]);

  const quiet = check([iface([], { name: "Foo" })], {
    config: { disabledWarnings: ["interface-name"] },
  });
  t.expect(quiet.diagnostics).toEqual([]);
});

test("descriptor defaults to the canonical name", (t) => {
  t.expect(iface([], { package: "p" }).descriptor).toBe("p.IFoo");
  const described = iface([], {
    package: "p",
    annotations: [annotation("Descriptor", { value: str("q.IBar") })],
  });
  t.expect(described.descriptor).toBe("q.IBar");
});

test("native backends check method types", (t) => {
  const decl = () =>
    iface([method("binders", [], { returns: typeSpec("IBinder", { isArray: true }) })]);
  t.expect(check([decl()], { config: { language: "java" } }).ok).toBe(true);
  t.expect(check([decl()], { config: { language: "ndk" } }).messages).toEqual([
    "The NDK backend does not support array of IBinder",
  ]);
});

test("dump writes methods then constants", (t) => {
  const decl = new InterfaceDeclaration({
    location: loc(),
    name: "IFoo",
    oneway: true,
    members: [
      new ConstantDeclaration({ location: loc(), type: typeSpec("int"), name: "MAX", value: int("4") }),
      method("ping", [arg(typeSpec("int"), "times")]),
    ],
  });
  t.expect(check([decl]).ok).toBe(true);
  t.expect(decl.toString()).toBe(
    "interface IFoo {\n  oneway void ping(int times);\n  const int MAX = 4;\n}\n"
  );
});
