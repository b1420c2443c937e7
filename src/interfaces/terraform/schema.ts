/**
 * Terraform schema types
 *
 * Attribute metadata mirrors the shape `terraform providers schema -json`
 * reports, reduced to the primitive types this provider uses.
 */

import type { z } from "zod"
import type { Diagnostics } from "../../shared/types"
import type { ResourceData } from "./ResourceData"

export type AttributeType = "string" | "number"

export interface AttributeSchema {
  type: AttributeType
  description: string
  required?: boolean
  optional?: boolean
  computed?: boolean
}

export type FieldValue = string | number

export type FieldMap = Record<string, FieldValue | undefined>

export type AttributeMap<T extends FieldMap> = {
  readonly [K in keyof T & string]: AttributeSchema
}

export interface ResourceSchema<T extends FieldMap> {
  description: string
  attributes: AttributeMap<T>
}

/**
 * Decoder for the user-supplied part of a record
 */
export type ConfigSchema<T extends FieldMap> = z.ZodType<Partial<T>, z.ZodTypeDef, unknown>

export interface Resource<T extends FieldMap> {
  readonly schema: ResourceSchema<T>
  readonly configSchema: ConfigSchema<T>
  create(d: ResourceData<T>, signal?: AbortSignal): Promise<Diagnostics>
  read(d: ResourceData<T>, signal?: AbortSignal): Promise<Diagnostics>
  update(d: ResourceData<T>, signal?: AbortSignal): Promise<Diagnostics>
  delete(d: ResourceData<T>, signal?: AbortSignal): Promise<Diagnostics>
  importState(d: ResourceData<T>, signal?: AbortSignal): Promise<ResourceData<T>[]>
}

export interface DataSource<T extends FieldMap> {
  readonly schema: ResourceSchema<T>
  readonly configSchema: ConfigSchema<T>
  read(d: ResourceData<T>, signal?: AbortSignal): Promise<Diagnostics>
}

export type CreatedUpdatedFields = {
  created_at?: string
  updated_at?: string
  created_timestamp?: number
  updated_timestamp?: number
}

export function createdUpdatedAttributes(kind: string): AttributeMap<CreatedUpdatedFields> {
  return {
    created_at: {
      type: "string",
      computed: true,
      description: `The time the ${kind} was created, in RFC 3339 format (UTC).`,
    },
    updated_at: {
      type: "string",
      computed: true,
      description: `The time the ${kind} was last updated, in RFC 3339 format (UTC).`,
    },
    created_timestamp: {
      type: "number",
      computed: true,
      description: `The time the ${kind} was created, as a Unix timestamp in seconds.`,
    },
    updated_timestamp: {
      type: "number",
      computed: true,
      description: `The time the ${kind} was last updated, as a Unix timestamp in seconds.`,
    },
  }
}
