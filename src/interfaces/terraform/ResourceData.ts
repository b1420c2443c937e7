/**
 * Resource Data
 *
 * Typed field record for one resource or data-source instance, plus the
 * local identity the framework tracks it by. An empty identity means the
 * instance is not (or no longer) tracked.
 */

import { ValidationError } from "../../shared/errors"
import type { AttributeSchema, ConfigSchema, FieldMap, ResourceSchema } from "./schema"

export class ResourceData<T extends FieldMap> {
  private values: Partial<T>
  private identity: string

  constructor(
    readonly schema: ResourceSchema<T>,
    values: Partial<T> = {},
    id: string = ""
  ) {
    this.values = { ...values }
    this.identity = id
  }

  /**
   * Validate user configuration and wrap it in a record
   */
  static fromConfig<T extends FieldMap>(
    schema: ResourceSchema<T>,
    configSchema: ConfigSchema<T>,
    raw: unknown,
    id: string = ""
  ): ResourceData<T> {
    const result = configSchema.safeParse(raw)

    if (!result.success) {
      const issues = result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
      throw new ValidationError(`Invalid configuration: ${issues.join("; ")}`)
    }

    return new ResourceData(schema, result.data, id)
  }

  id(): string {
    return this.identity
  }

  setId(id: string): void {
    this.identity = id
  }

  get<K extends keyof T & string>(key: K): Partial<T>[K] | undefined {
    return this.values[key]
  }

  /**
   * Like get(), but treats the zero value ("" or 0) as unset
   */
  getOk<K extends keyof T & string>(key: K): Partial<T>[K] | undefined {
    const value = this.values[key]
    if (value === undefined || value === "" || value === 0) {
      return undefined
    }
    return value
  }

  set<K extends keyof T & string>(key: K, value: T[K] | undefined): void {
    const attribute = this.attribute(key)
    if (!attribute) {
      throw new ValidationError(`Invalid address to set: "${key}"`, key)
    }

    if (value === undefined) {
      delete this.values[key]
      return
    }

    if (attribute.type === "string" && typeof value !== "string") {
      throw new ValidationError(`${key}: expected string, got ${typeof value}`, key)
    }
    if (attribute.type === "number" && (typeof value !== "number" || !Number.isFinite(value))) {
      throw new ValidationError(`${key}: expected a finite number, got ${String(value)}`, key)
    }

    this.values[key] = value
  }

  toState(): Partial<T> {
    return { ...this.values }
  }

  private attribute<K extends keyof T & string>(key: K): AttributeSchema | undefined {
    return this.schema.attributes[key]
  }
}
