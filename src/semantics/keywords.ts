import { createRequire } from "node:module";

const require = createRequire(import.meta.url);

const loadKeywords = (): ReadonlySet<string> => {
  const words: unknown = require("./java-keywords.json");
  if (!Array.isArray(words)) throw new Error("java-keywords.json must hold an array");
  return new Set(words.filter((word): word is string => typeof word === "string"));
};

const keywords = loadKeywords();

/** Words reserved by the primary rendering target, which can't name arguments */
export const isJavaKeyword = (word: string): boolean => keywords.has(word);

/** Prefix reserved for names the generated code introduces */
export const RESERVED_ARGUMENT_PREFIX = "_aidl";
