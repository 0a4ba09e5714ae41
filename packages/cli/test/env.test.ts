/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import { resolveBackend, resolveRoot, resolveSchemaPath, isVerbose } from "../src/lib/env.js";

describe("environment resolution", () => {
  const keys = ["MODELKV_ROOT", "MODELKV_SCHEMA", "MODELKV_REDIS_URL", "MODELKV_CLI_DEBUG"];
  let saved: Map<string, string | undefined>;

  beforeEach(() => {
    saved = new Map(keys.map((key): [string, string | undefined] => [key, process.env[key]]));
    for (const key of keys) delete process.env[key];
  });

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  describe("resolveRoot", () => {
    it("should use CLI option when provided", () => {
      process.env.MODELKV_ROOT = "/env/path";
      expect(resolveRoot("/cli/path")).toBe(path.resolve("/cli/path"));
    });

    it("should use MODELKV_ROOT env var when CLI option not provided", () => {
      process.env.MODELKV_ROOT = "/env/path";
      expect(resolveRoot()).toBe(path.resolve("/env/path"));
    });

    it("should use default ./data when neither provided", () => {
      expect(resolveRoot()).toBe(path.resolve("./data"));
    });

    it("should expand a leading tilde", () => {
      expect(resolveRoot("~/models")).toBe(path.join(homedir(), "models"));
    });
  });

  describe("resolveSchemaPath", () => {
    it("should prefer the CLI option over MODELKV_SCHEMA", () => {
      process.env.MODELKV_SCHEMA = "/env/schema.json";
      expect(resolveSchemaPath("/cli/schema.json")).toBe(path.resolve("/cli/schema.json"));
      expect(resolveSchemaPath()).toBe(path.resolve("/env/schema.json"));
    });

    it("should be undefined when nothing is configured", () => {
      expect(resolveSchemaPath()).toBeUndefined();
    });
  });

  describe("resolveBackend", () => {
    it("should prefer --root", () => {
      process.env.MODELKV_REDIS_URL = "redis://env:6379";
      expect(resolveBackend({ root: "/data" })).toEqual({ kind: "file", root: path.resolve("/data") });
    });

    it("should use --redis, then MODELKV_REDIS_URL", () => {
      process.env.MODELKV_REDIS_URL = "redis://env:6379";
      expect(resolveBackend({ redis: "redis://flag:6379" })).toEqual({ kind: "redis", url: "redis://flag:6379" });
      expect(resolveBackend({})).toEqual({ kind: "redis", url: "redis://env:6379" });
    });

    it("should fall back to the file store", () => {
      process.env.MODELKV_ROOT = "/env/root";
      expect(resolveBackend({})).toEqual({ kind: "file", root: path.resolve("/env/root") });
    });

    it("should reject both --root and --redis", () => {
      expect(() => resolveBackend({ root: "/data", redis: "redis://x" })).toThrow(
        "Use either --root or --redis, not both"
      );
    });
  });

  describe("isVerbose", () => {
    it("should follow MODELKV_CLI_DEBUG", () => {
      process.env.MODELKV_CLI_DEBUG = "1";
      expect(isVerbose()).toBe(true);
      process.env.MODELKV_CLI_DEBUG = "0";
      expect(isVerbose()).toBe(false);
    });
  });
});
