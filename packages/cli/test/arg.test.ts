/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { parseJson, parseLookupValue, parseModelId, parseProperties } from "../src/lib/arg.js";

describe("arg parsing", () => {
  describe("parseModelId", () => {
    it("should parse positive integers", () => {
      expect(parseModelId("1")).toBe(1);
      expect(parseModelId(" 42 ")).toBe(42);
    });

    it("should reject zero, negatives and non-numbers", () => {
      for (const value of ["0", "-1", "1.5", "abc", "", "007"]) {
        expect(() => parseModelId(value)).toThrow(InvalidArgumentError);
      }
      expect(() => parseModelId("abc", "--id")).toThrow("--id must be a positive integer");
    });

    it("should reject unsafe integers", () => {
      expect(() => parseModelId("9007199254740993")).toThrow("id is too large");
    });
  });

  describe("parseJson", () => {
    it("should parse valid JSON", () => {
      expect(parseJson('{"a":1}', "test")).toEqual({ a: 1 });
      expect(parseJson("null", "test")).toBe(null);
    });

    it("should handle BOM", () => {
      expect(parseJson("\uFEFF" + '{"a":1}', "test")).toEqual({ a: 1 });
    });

    it("should include source in error message", () => {
      expect(() => parseJson("{", "stdin")).toThrow(InvalidArgumentError);
      expect(() => parseJson("{", "--data")).toThrow("Invalid JSON in --data");
    });
  });

  describe("parseProperties", () => {
    it("should accept flat objects of primitive values", () => {
      expect(parseProperties({ a: "x", b: 2, c: false, d: null }, "--data")).toEqual({
        a: "x",
        b: 2,
        c: false,
        d: null,
      });
    });

    it("should reject non-objects", () => {
      expect(() => parseProperties([1], "--data")).toThrow("Payload in --data must be a JSON object");
      expect(() => parseProperties("x", "stdin")).toThrow("Payload in stdin must be a JSON object");
      expect(() => parseProperties(null, "stdin")).toThrow(InvalidArgumentError);
    });

    it("should reject nested values", () => {
      expect(() => parseProperties({ tags: ["a"] }, "--data")).toThrow(
        'Property "tags" in --data must be a string, number, boolean, or null'
      );
    });
  });

  describe("parseLookupValue", () => {
    it("should keep raw strings by default", () => {
      expect(parseLookupValue("42", false)).toBe("42");
    });

    it("should parse JSON primitives with --json-value", () => {
      expect(parseLookupValue("42", true)).toBe(42);
      expect(parseLookupValue("true", true)).toBe(true);
      expect(parseLookupValue('"42"', true)).toBe("42");
    });

    it("should reject JSON structures", () => {
      expect(() => parseLookupValue("[1]", true)).toThrow(
        "<value> must be a JSON string, number, boolean, or null"
      );
    });
  });
});
