/**
 * @file Tests for type guards
 */
import { hasErrorCode, isObject } from "./guards";

test("isObject and hasErrorCode narrow unknown values", () => {
  expect(isObject({})).toBe(true);
  expect(isObject(null)).toBe(false);
  expect(isObject("x")).toBe(false);
  expect(hasErrorCode(Object.assign(new Error("x"), { code: "ENOENT" }))).toBe(true);
  expect(hasErrorCode({ code: 2 })).toBe(false);
  expect(hasErrorCode(new Error("plain"))).toBe(false);
});
