/**
 * InfluxDB Organizations API
 *
 * Implements the OrganizationsAPI interface against /api/v2/orgs.
 */

import type { CreateOrganizationInput, Organization, OrganizationsAPI } from "../../domain/organization/Organization"
import { NotFoundError, ValidationError } from "../../shared/errors"
import type { InfluxDBClient } from "./InfluxDBClient"
import { wireOrganizationSchema, wireOrganizationsSchema } from "./types"
import type { PatchOrganizationRequest, PostOrganizationRequest, WireOrganization } from "./types"

export class InfluxDBOrganizationsAPI implements OrganizationsAPI {
  constructor(private client: InfluxDBClient) {}

  async findByName(name: string, signal?: AbortSignal): Promise<Organization> {
    const response = await this.client.request("GET", "/orgs", wireOrganizationsSchema, {
      query: { org: name },
      signal,
    })

    const match = response.orgs.find((org) => org.name === name)
    if (!match) {
      throw new NotFoundError("Organization", `organization '${name}' not found`)
    }

    return this.mapWireToOrganization(match)
  }

  async findById(id: string, signal?: AbortSignal): Promise<Organization> {
    const org = await this.client.request("GET", `/orgs/${encodeURIComponent(id)}`, wireOrganizationSchema, {
      signal,
    })
    return this.mapWireToOrganization(org)
  }

  async create(input: CreateOrganizationInput, signal?: AbortSignal): Promise<Organization> {
    const body: PostOrganizationRequest = { name: input.name }
    if (input.description !== undefined) {
      body.description = input.description
    }

    const org = await this.client.request("POST", "/orgs", wireOrganizationSchema, { body, signal })
    return this.mapWireToOrganization(org)
  }

  async update(org: Organization, signal?: AbortSignal): Promise<Organization> {
    if (!org.id) {
      throw new ValidationError("Organization id is required for update", "id")
    }

    const body: PatchOrganizationRequest = {
      name: org.name,
      description: org.description ?? "",
    }

    const updated = await this.client.request(
      "PATCH",
      `/orgs/${encodeURIComponent(org.id)}`,
      wireOrganizationSchema,
      { body, signal }
    )
    return this.mapWireToOrganization(updated)
  }

  async delete(id: string, signal?: AbortSignal): Promise<void> {
    await this.client.requestNoContent("DELETE", `/orgs/${encodeURIComponent(id)}`, { signal })
  }

  private mapWireToOrganization(wire: WireOrganization): Organization {
    const org: Organization = { name: wire.name }

    if (wire.id !== undefined) {
      org.id = wire.id
    }
    if (wire.description !== undefined && wire.description !== null) {
      org.description = wire.description
    }
    if (wire.status !== undefined) {
      org.status = wire.status
    }
    if (wire.createdAt !== undefined) {
      org.createdAt = new Date(wire.createdAt)
    }
    if (wire.updatedAt !== undefined) {
      org.updatedAt = new Date(wire.updatedAt)
    }

    return org
  }
}
