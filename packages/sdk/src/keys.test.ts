import { describe, it, expect } from "vitest";
import { counterKey, recordKey, uniqueKey } from "./keys.js";

describe("key layout", () => {
  it("should name the id counter", () => {
    expect(counterKey("User")).toBe("User:mid");
  });

  it("should name object records by id", () => {
    expect(recordKey("User", 1)).toBe("User:1");
    expect(recordKey("people", 42)).toBe("people:42");
  });

  it("should name unique entries by property and encoded value", () => {
    expect(uniqueKey("User", "username", "daniel")).toBe('User:username:"daniel"');
    expect(uniqueKey("User", "badge", 1)).toBe("User:badge:1");
    expect(uniqueKey("User", "badge", "1")).toBe('User:badge:"1"');
    expect(uniqueKey("User", "verified", false)).toBe("User:verified:false");
  });

  it("should not let a string value imitate another property's key", () => {
    expect(uniqueKey("User", "a", "b:c")).not.toBe(uniqueKey("User", "a:b", "c"));
  });
});
