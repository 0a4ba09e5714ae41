import { describe, it, expect, beforeEach } from "vitest";
import { PropertyStore, decodeRecord, materialize } from "./property-store.js";
import { buildDefinition } from "./config.js";
import { MemoryStore } from "./adapters/memory.js";
import { CorruptRecordError, ValidationError } from "./errors.js";

const User = buildDefinition({
  name: "User",
  properties: {
    username: { unique: true },
    role: { default: "member" },
  },
});

describe("materialize", () => {
  it("should fill declared properties with defaults or null", () => {
    expect(materialize(User, {})).toEqual({ role: "member", username: null });
  });

  it("should let instance values, including null, override defaults", () => {
    expect(materialize(User, { role: null, username: "ada" })).toEqual({ role: null, username: "ada" });
  });

  it("should keep dynamic properties and drop transient ones", () => {
    expect(materialize(User, { score: 3, _draft: "x" })).toEqual({
      role: "member",
      score: 3,
      username: null,
    });
  });

  it("should reject unsupported values", () => {
    expect(() => materialize(User, { score: Infinity })).toThrow(ValidationError);
  });
});

describe("decodeRecord", () => {
  it("should decode a JSON object of primitive values", () => {
    expect(decodeRecord("User:1", '{"a":1,"b":"x","c":true,"d":null}')).toEqual({
      a: 1,
      b: "x",
      c: true,
      d: null,
    });
  });

  it("should reject invalid JSON", () => {
    expect(() => decodeRecord("User:1", "{nope")).toThrow("Corrupt value at User:1: invalid JSON");
  });

  it("should reject nested values and non-objects", () => {
    expect(() => decodeRecord("User:1", '{"tags":["a"]}')).toThrow(CorruptRecordError);
    expect(() => decodeRecord("User:1", "[1,2]")).toThrow(CorruptRecordError);
    expect(() => decodeRecord("User:1", "null")).toThrow(CorruptRecordError);
  });
});

describe("PropertyStore", () => {
  let store: MemoryStore;
  let records: PropertyStore;

  beforeEach(() => {
    store = new MemoryStore();
    records = new PropertyStore(store, User);
  });

  it("should write a compact record with sorted keys", async () => {
    const written = await records.save(1, { username: "ada", _cache: "skip", level: 2 });

    expect(written).toEqual({ level: 2, role: "member", username: "ada" });
    expect(store.snapshot()).toEqual({ "User:1": '{"level":2,"role":"member","username":"ada"}' });
  });

  it("should load what it saved", async () => {
    await records.save(3, { username: "ada", active: false });

    expect(await records.load(3)).toEqual({ active: false, role: "member", username: "ada" });
    expect(await records.load(4)).toBeNull();
  });

  it("should overwrite the whole record", async () => {
    await records.save(1, { username: "ada", nickname: "a" });
    await records.save(1, { username: "ada" });

    expect(await records.load(1)).toEqual({ role: "member", username: "ada" });
  });

  it("should remove records idempotently", async () => {
    await records.save(1, {});

    expect(await records.remove(1)).toBe(true);
    expect(await records.remove(1)).toBe(false);
    expect(await records.load(1)).toBeNull();
  });

  it("should surface corrupt records", async () => {
    await store.set("User:1", "{nope");

    await expect(records.load(1)).rejects.toBeInstanceOf(CorruptRecordError);
  });

  it("should key records by storage name", async () => {
    const people = new PropertyStore(store, buildDefinition({ name: "Person", storageName: "people" }));

    await people.save(1, { name: "ada" });

    expect(store.snapshot()).toEqual({ "people:1": '{"name":"ada"}' });
  });
});
