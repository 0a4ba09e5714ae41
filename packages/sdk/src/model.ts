/**
 * Model declaration and instances
 *
 * @example
 * ```typescript
 * const User = defineModel({
 *   name: "User",
 *   properties: { username: { unique: true }, email: { unique: true }, role: { default: "member" } },
 *   connection: { redis: "redis://localhost:6379" },
 * });
 *
 * const user = User.create({ username: "ada", email: "ada@example.com" });
 * const result = await user.put();
 * if (!result.ok) console.error(result.error.message);
 *
 * const same = await User.findBy("username", "ada");
 * ```
 */

import { buildDefinition } from "./config.js";
import { createResolver, type HandleResolver } from "./connection.js";
import { ModelGateway } from "./gateway.js";
import { ModelStateError } from "./errors.js";
import { validatePropertyName, validatePropertyValue } from "./validation.js";
import type {
  DeleteResult,
  ModelConfig,
  ModelDefinition,
  ModelId,
  Properties,
  PropertyValue,
  PutResult,
  StoredObject,
} from "./types.js";

/**
 * In-memory object of a model. Holds an open-ended property mapping and the
 * id assigned by its first successful `put`.
 */
export class ModelInstance {
  #model: Model;
  #id: ModelId | null;
  #properties: Properties = {};

  constructor(model: Model, properties: Properties = {}, id: ModelId | null = null) {
    this.#model = model;
    this.#id = id;
    for (const [name, value] of Object.entries(properties)) {
      this.set(name, value);
    }
  }

  get id(): ModelId | null {
    return this.#id;
  }

  get model(): Model {
    return this.#model;
  }

  /**
   * Read a property; absent declared properties read as their default, absent dynamic ones as undefined
   */
  get(name: string): PropertyValue | undefined {
    if (Object.hasOwn(this.#properties, name)) {
      return this.#properties[name];
    }
    return this.#model.definition.properties.get(name)?.default;
  }

  set(name: string, value: PropertyValue): this {
    const modelName = this.#model.definition.name;
    validatePropertyName(modelName, name);
    this.#properties[name] = validatePropertyValue(modelName, name, value);
    return this;
  }

  /**
   * Drop a property from the instance; the next `put` removes it from the record
   */
  unset(name: string): this {
    delete this.#properties[name];
    return this;
  }

  has(name: string): boolean {
    return Object.hasOwn(this.#properties, name);
  }

  /**
   * Copy of the properties set on the instance (defaults not merged)
   */
  toJSON(): Properties {
    return { ...this.#properties };
  }

  /**
   * Save the instance: creates it on first call, updates it afterwards
   */
  async put(): Promise<PutResult> {
    return this.#model.put(this);
  }

  /**
   * Delete the stored object; the instance keeps its properties but loses its id
   */
  async delete(): Promise<DeleteResult> {
    return this.#model.delete(this);
  }

  /** @internal */
  assignId(id: ModelId | null): void {
    this.#id = id;
  }
}

export class Model {
  readonly definition: ModelDefinition;
  #resolver: HandleResolver;
  #gateway: ModelGateway;

  constructor(config: ModelConfig) {
    this.definition = buildDefinition(config);
    this.#resolver = createResolver(config.connection);
    this.#gateway = new ModelGateway(this.definition, this.#resolver);
  }

  get name(): string {
    return this.definition.name;
  }

  /**
   * New unsaved instance
   */
  create(properties: Properties = {}): ModelInstance {
    return new ModelInstance(this, properties);
  }

  async put(instance: ModelInstance): Promise<PutResult> {
    this.#assertOwn(instance);
    const properties = instance.toJSON();
    const result =
      instance.id === null
        ? await this.#gateway.create(properties)
        : await this.#gateway.update(instance.id, properties);
    if (result.ok) {
      instance.assignId(result.id);
    }
    return result;
  }

  async get(id: ModelId): Promise<ModelInstance | null> {
    return this.#hydrate(await this.#gateway.fetchById(id));
  }

  /**
   * Fetch the object currently holding a unique value
   */
  async findBy(property: string, value: PropertyValue): Promise<ModelInstance | null> {
    return this.#hydrate(await this.#gateway.fetchByUnique(property, value));
  }

  /**
   * Id of the object currently holding a unique value, without loading it
   */
  async idFor(property: string, value: PropertyValue): Promise<ModelId | null> {
    return this.#gateway.lookupId(property, value);
  }

  async delete(instance: ModelInstance): Promise<DeleteResult> {
    this.#assertOwn(instance);
    if (instance.id === null) {
      throw new ModelStateError(`Cannot delete an unsaved or already deleted ${this.name}`);
    }
    const result = await this.#gateway.delete(instance.id);
    if (result.ok) {
      instance.assignId(null);
    }
    return result;
  }

  async deleteById(id: ModelId): Promise<DeleteResult> {
    return this.#gateway.delete(id);
  }

  /**
   * Close store clients this model created from connection options
   */
  async close(): Promise<void> {
    await this.#resolver.close();
  }

  #assertOwn(instance: ModelInstance): void {
    if (instance.model !== this) {
      throw new ModelStateError(`Instance of ${instance.model.name} passed to ${this.name}`);
    }
  }

  #hydrate(stored: StoredObject | null): ModelInstance | null {
    return stored === null ? null : new ModelInstance(this, stored.properties, stored.id);
  }
}

/**
 * Declare a model. The configuration is validated once and frozen.
 * @throws ConfigurationError if the declaration is invalid
 */
export function defineModel(config: ModelConfig): Model {
  return new Model(config);
}
