import { test } from "vitest";
import { isJavaKeyword } from "../keywords.js";

test("reserved words come from the keyword table", (t) => {
  t.expect(isJavaKeyword("class")).toBe(true);
  t.expect(isJavaKeyword("synchronized")).toBe(true);
  t.expect(isJavaKeyword("Class")).toBe(false);
  t.expect(isJavaKeyword("data")).toBe(false);
});
