/**
 * Organization field projection
 *
 * Maps a remote Organization onto record fields. Everything is computed
 * before the first set(), so a bad timestamp leaves the record untouched.
 */

import type { Organization } from "../../../domain/organization/Organization"
import { ValidationError } from "../../../shared/errors"
import type { ResourceData } from "../ResourceData"
import type { OrganizationResourceModel } from "./types"

export interface Timestamp {
  iso: string
  unix: number
}

export function toTimestamp(field: string, date: Date | undefined): Timestamp {
  if (!date) {
    throw new ValidationError(`${field}: Organization has no ${field} value`, field)
  }

  const millis = date.getTime()
  if (Number.isNaN(millis)) {
    throw new ValidationError(`${field}: invalid time value`, field)
  }

  return {
    iso: date.toISOString(),
    unix: Math.floor(millis / 1000),
  }
}

export function setOrganizationResourceData(
  d: ResourceData<OrganizationResourceModel>,
  org: Organization
): void {
  const createdAt = toTimestamp("created_at", org.createdAt)
  const updatedAt = toTimestamp("updated_at", org.updatedAt)

  d.set("id", org.id)
  d.set("name", org.name)
  d.set("description", org.description)
  d.set("created_at", createdAt.iso)
  d.set("updated_at", updatedAt.iso)
  d.set("created_timestamp", createdAt.unix)
  d.set("updated_timestamp", updatedAt.unix)
}
