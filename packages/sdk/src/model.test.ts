import { describe, it, expect, beforeEach, vi } from "vitest";
import { defineModel, type Model } from "./model.js";
import { MemoryStore } from "./adapters/memory.js";
import { ConfigurationError, ModelStateError, NotFoundError, ValidationError } from "./errors.js";
import type { ModelDefinition } from "./types.js";

describe("defineModel", () => {
  it("should expose the validated definition", () => {
    const User = defineModel({ name: "User", properties: { username: { unique: true } }, connection: new MemoryStore() });

    expect(User.name).toBe("User");
    expect(User.definition.properties.get("username")?.unique).toBe(true);
  });

  it("should reject invalid declarations", () => {
    expect(() => defineModel({ name: "bad name" })).toThrow(ConfigurationError);
  });
});

describe("Model", () => {
  let store: MemoryStore;
  let User: Model;

  beforeEach(() => {
    store = new MemoryStore();
    User = defineModel({
      name: "User",
      properties: {
        username: { unique: true },
        email: { unique: true },
        role: { default: "member" },
      },
      connection: store,
    });
  });

  describe("instances", () => {
    it("should start without an id", () => {
      expect(User.create({ username: "ada" }).id).toBeNull();
    });

    it("should read defaults for absent declared properties only", () => {
      const user = User.create();

      expect(user.get("role")).toBe("member");
      expect(user.get("username")).toBeNull();
      expect(user.get("nickname")).toBeUndefined();
      expect(user.has("role")).toBe(false);
    });

    it("should validate names and values on set", () => {
      const user = User.create();

      expect(() => user.set("nick name", "x")).toThrow(ValidationError);
      expect(() => user.set("score", Number.POSITIVE_INFINITY)).toThrow(ValidationError);
      expect(() => User.create({ score: Number.NaN })).toThrow(ValidationError);
    });

    it("should only return properties set on the instance from toJSON", () => {
      const user = User.create({ username: "ada" }).set("score", 3);

      expect(user.toJSON()).toEqual({ username: "ada", score: 3 });
    });
  });

  describe("put", () => {
    it("should create on first put and update afterwards", async () => {
      const user = User.create({ username: "ada", email: "ada@example.com" });

      expect(await user.put()).toEqual({ ok: true, id: 1, created: true });
      expect(user.id).toBe(1);

      user.set("username", "lovelace");
      expect(await user.put()).toEqual({ ok: true, id: 1, created: false });
      expect(user.id).toBe(1);
      expect(await User.idFor("username", "lovelace")).toBe(1);
      expect(await User.idFor("username", "ada")).toBeNull();
    });

    it("should leave the instance unsaved when a create conflicts", async () => {
      await User.create({ username: "ada" }).put();
      const copy = User.create({ username: "ada" });

      const result = await copy.put();

      expect(result.ok).toBe(false);
      expect(copy.id).toBeNull();
    });

    it("should not persist transient properties", async () => {
      const user = User.create({ username: "ada", _password: "test-secret" });
      await user.put();

      expect(user.get("_password")).toBe("test-secret");
      expect(store.snapshot()["User:1"]).toBe('{"email":null,"role":"member","username":"ada"}');
    });

    it("should remove unset properties from the record", async () => {
      const user = User.create({ username: "ada", nickname: "a" });
      await user.put();

      await user.unset("nickname").put();

      expect((await User.get(1))?.toJSON()).toEqual({ email: null, role: "member", username: "ada" });
    });

    it("should refuse instances of another model", async () => {
      const Post = defineModel({ name: "Post", connection: store });

      await expect(User.put(Post.create())).rejects.toThrow(new ModelStateError("Instance of Post passed to User"));
    });
  });

  describe("fetch", () => {
    beforeEach(async () => {
      await User.create({ username: "ada", email: "ada@example.com", score: 10 }).put();
    });

    it("should load by id with every stored property", async () => {
      const user = await User.get(1);

      expect(user?.id).toBe(1);
      expect(user?.toJSON()).toEqual({ email: "ada@example.com", role: "member", score: 10, username: "ada" });
    });

    it("should find by unique value", async () => {
      expect((await User.findBy("email", "ada@example.com"))?.id).toBe(1);
      expect(await User.findBy("email", "nobody@example.com")).toBeNull();
    });

    it("should return null for missing ids", async () => {
      expect(await User.get(2)).toBeNull();
    });

    it("should update fetched instances in place", async () => {
      const user = await User.get(1);
      if (user === null) throw new Error("expected a user");

      user.set("score", 11);
      expect(await user.put()).toEqual({ ok: true, id: 1, created: false });
      expect((await User.get(1))?.get("score")).toBe(11);
    });
  });

  describe("delete", () => {
    it("should delete and clear the instance id", async () => {
      const user = User.create({ username: "ada" });
      await user.put();

      expect(await user.delete()).toEqual({ ok: true, id: 1, released: ["username"] });
      expect(user.id).toBeNull();
      expect(user.get("username")).toBe("ada");
      expect(await User.findBy("username", "ada")).toBeNull();
    });

    it("should refuse to delete unsaved instances", async () => {
      await expect(User.create().delete()).rejects.toThrow(
        new ModelStateError("Cannot delete an unsaved or already deleted User")
      );
    });

    it("should create a new object when a deleted instance is put again", async () => {
      const user = User.create({ username: "ada" });
      await user.put();
      await user.delete();

      expect(await user.put()).toEqual({ ok: true, id: 2, created: true });
    });

    it("should report unknown ids", async () => {
      const result = await User.deleteById(5);

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error).toBeInstanceOf(NotFoundError);
    });
  });

  describe("connection", () => {
    it("should resolve a handle from a factory for every operation", async () => {
      const factory = vi.fn((_model: ModelDefinition) => store);
      const Post = defineModel({ name: "Post", properties: { slug: { unique: true } }, connection: factory });

      await Post.create({ slug: "hello" }).put();
      await Post.findBy("slug", "hello");

      expect(factory).toHaveBeenCalledTimes(2);
      expect(factory.mock.calls[0]?.[0]).toBe(Post.definition);
    });

    it("should key objects by storage name", async () => {
      const Person = defineModel({ name: "Person", storageName: "people", connection: store });

      await Person.create({ name: "ada" }).put();

      expect(store.snapshot()).toEqual({ "people:mid": "1", "people:1": '{"name":"ada"}' });
    });
  });
});
