/**
 * influxdb2_organization data source
 *
 * Read-only lookup of an Organization by name or id.
 */

import type { Organization, OrganizationsAPI } from "../../../domain/organization/Organization"
import { diagFromError } from "../../../shared/diagnostics"
import type { Diagnostics } from "../../../shared/types"
import type { ResourceData } from "../ResourceData"
import { createdUpdatedAttributes } from "../schema"
import type { DataSource, ResourceSchema } from "../schema"
import { toTimestamp } from "./organizationResourceData"
import type { Timestamp } from "./organizationResourceData"
import { organizationDataSourceConfigSchema } from "./types"
import type { OrganizationDataSourceModel } from "./types"

export const organizationDataSourceSchema: ResourceSchema<OrganizationDataSourceModel> = {
  description: "Lookup an Organization in InfluxDB2.",
  attributes: {
    name: {
      type: "string",
      optional: true,
      computed: true,
      description: "Name of the Organization.",
    },
    id: {
      type: "string",
      optional: true,
      computed: true,
      description: "ID of the Organization.",
    },
    description: {
      type: "string",
      computed: true,
      description: "The description of the Organization.",
    },
    ...createdUpdatedAttributes("Organization"),
  },
}

export class OrganizationDataSource implements DataSource<OrganizationDataSourceModel> {
  readonly schema = organizationDataSourceSchema
  readonly configSchema = organizationDataSourceConfigSchema

  constructor(private orgsAPI: OrganizationsAPI) {}

  async read(d: ResourceData<OrganizationDataSourceModel>, signal?: AbortSignal): Promise<Diagnostics> {
    const lookup = this.lookupKey(d)
    if (!lookup) {
      return [{ severity: "error", summary: "one of name or id must be set" }]
    }

    let org: Organization
    try {
      org =
        lookup.by === "name"
          ? await this.orgsAPI.findByName(lookup.value, signal)
          : await this.orgsAPI.findById(lookup.value, signal)
    } catch (error) {
      return [
        ...diagFromError(error),
        { severity: "error", summary: `Can't find Organization with ${lookup.by}: ${lookup.value}` },
      ]
    }

    const id = org.id
    if (!id) {
      return [{ severity: "error", summary: "Organization not found" }]
    }

    // Timestamps are best effort; the lookup only guarantees id and name
    let timestamps: { createdAt: Timestamp; updatedAt: Timestamp } | null = null
    if (org.createdAt && org.updatedAt) {
      try {
        timestamps = {
          createdAt: toTimestamp("created_at", org.createdAt),
          updatedAt: toTimestamp("updated_at", org.updatedAt),
        }
      } catch (error) {
        return diagFromError(error)
      }
    }

    d.setId(id)
    d.set("id", id)
    d.set("name", org.name)
    if (org.description !== undefined) {
      d.set("description", org.description)
    }
    if (timestamps) {
      d.set("created_at", timestamps.createdAt.iso)
      d.set("updated_at", timestamps.updatedAt.iso)
      d.set("created_timestamp", timestamps.createdAt.unix)
      d.set("updated_timestamp", timestamps.updatedAt.unix)
    }

    return []
  }

  private lookupKey(d: ResourceData<OrganizationDataSourceModel>): { by: "name" | "id"; value: string } | null {
    const name = d.getOk("name")
    if (name !== undefined) {
      return { by: "name", value: name }
    }

    const id = d.getOk("id")
    if (id !== undefined) {
      return { by: "id", value: id }
    }

    return null
  }
}
