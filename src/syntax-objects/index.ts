export * from "./syntax.js";
export * from "./const-expr.js";
export * from "./annotation.js";
export * from "./annotatable.js";
export * from "./type-specifier.js";
export * from "./variable.js";
export * from "./argument.js";
export * from "./constant-declaration.js";
export * from "./method.js";
export * from "./defined-type.js";
export * from "./parcelable.js";
export * from "./structured-parcelable.js";
export * from "./union.js";
export * from "./enum.js";
export * from "./interface.js";
export * from "./document.js";
export { CodeWriter } from "./lib/code-writer.js";
