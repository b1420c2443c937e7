/**
 * influxdb2_organization resource
 *
 * Create, read, update, delete and import handlers for Organizations.
 * A missing remote Organization is never an error here: read and update
 * drop it from state, delete treats it as already done.
 */

import type { Organization, OrganizationsAPI } from "../../../domain/organization/Organization"
import { diagErrorf, diagFromError } from "../../../shared/diagnostics"
import { AppError, errorMessage, isNotFoundError } from "../../../shared/errors"
import type { Diagnostics } from "../../../shared/types"
import type { ResourceData } from "../ResourceData"
import { createdUpdatedAttributes } from "../schema"
import type { Resource, ResourceSchema } from "../schema"
import { setOrganizationResourceData } from "./organizationResourceData"
import { ORGANIZATION_TYPE_NAME, organizationResourceConfigSchema } from "./types"
import type { OrganizationResourceModel } from "./types"

export const organizationResourceSchema: ResourceSchema<OrganizationResourceModel> = {
  description: "The Organization resource allows you to configure an InfluxDB2 Organization.",
  attributes: {
    name: {
      type: "string",
      required: true,
      description: "Name of the Organization.",
    },
    description: {
      type: "string",
      optional: true,
      description: "The description of the Organization.",
    },
    id: {
      type: "string",
      computed: true,
      description: "ID of the Organization.",
    },
    ...createdUpdatedAttributes("Organization"),
  },
}

export class OrganizationResource implements Resource<OrganizationResourceModel> {
  readonly schema = organizationResourceSchema
  readonly configSchema = organizationResourceConfigSchema

  constructor(private orgsAPI: OrganizationsAPI) {}

  async create(d: ResourceData<OrganizationResourceModel>, signal?: AbortSignal): Promise<Diagnostics> {
    const name = d.get("name") ?? ""

    // Refuse to adopt an Organization someone else created
    try {
      await this.orgsAPI.findByName(name, signal)
      return diagErrorf(
        `unable to create Organization (${name}) - an Organization with this name already exists; ` +
          `see resource documentation for ${ORGANIZATION_TYPE_NAME} for instructions on how to add an already existing Organization to the state`
      )
    } catch (error) {
      if (!isNotFoundError(error)) {
        return diagErrorf(
          `unable to check for presence of an existing Organization (${name}): ${errorMessage(error)}`
        )
      }
      console.log(`[INFO] Organization (${name}) not found, proceeding with create`)
    }

    const description = d.get("description") ?? ""

    console.log(`[INFO] Creating Organization (${name})`)
    let created: Organization
    try {
      created = await this.orgsAPI.create({ name, description }, signal)
    } catch (error) {
      return diagErrorf(`unable to create Organization (${name}): ${errorMessage(error)}`)
    }

    if (!created.id) {
      return diagErrorf(`unable to create Organization (${name}): <unknown error occurred>`)
    }

    const id = created.id
    d.setId(id)

    console.log(`[INFO] Created Organization (${name}) (${id})`)

    // The create response may omit server-stamped fields
    let org: Organization
    try {
      org = await this.orgsAPI.findById(id, signal)
    } catch (error) {
      return diagErrorf(`unable to retrieve Organization (${name}) (${id}): ${errorMessage(error)}`)
    }

    return this.project(d, org)
  }

  async read(d: ResourceData<OrganizationResourceModel>, signal?: AbortSignal): Promise<Diagnostics> {
    const id = d.id()

    console.log(`[INFO] Reading Organization (${id})`)

    let org: Organization
    try {
      org = await this.orgsAPI.findById(id, signal)
    } catch (error) {
      if (isNotFoundError(error)) {
        console.warn(`[WARN] Organization (${id}) not found, removing from state`)
        d.setId("")
        return []
      }
      return diagErrorf(`unable to retrieve Organization (${id}): ${errorMessage(error)}`)
    }

    const mismatch = this.checkIdentity(d, id, org)
    if (mismatch) {
      return mismatch
    }

    return this.project(d, org)
  }

  async update(d: ResourceData<OrganizationResourceModel>, signal?: AbortSignal): Promise<Diagnostics> {
    const id = d.id()

    console.log(`[INFO] Reading Organization (${id})`)

    let org: Organization
    try {
      org = await this.orgsAPI.findById(id, signal)
    } catch (error) {
      if (isNotFoundError(error)) {
        console.warn(`[WARN] Organization (${id}) not found, removing from state`)
        d.setId("")
        return []
      }
      return diagErrorf(`unable to retrieve Organization (${id}): ${errorMessage(error)}`)
    }

    const mismatch = this.checkIdentity(d, id, org)
    if (mismatch) {
      return mismatch
    }

    const desired: Organization = {
      ...org,
      name: d.get("name") ?? "",
      description: d.get("description") ?? "",
    }

    console.log(`[INFO] Updating Organization (${id})`)
    let updated: Organization
    try {
      updated = await this.orgsAPI.update(desired, signal)
    } catch (error) {
      return diagErrorf(`unable to update Organization (${id}): ${errorMessage(error)}`)
    }

    console.log(`[INFO] Updated Organization (${id})`)

    return this.project(d, updated)
  }

  async delete(d: ResourceData<OrganizationResourceModel>, signal?: AbortSignal): Promise<Diagnostics> {
    const id = d.id()

    console.log(`[INFO] Deleting Organization (${id})`)

    try {
      await this.orgsAPI.delete(id, signal)
    } catch (error) {
      if (isNotFoundError(error)) {
        console.warn(`[WARN] Organization (${id}) not found, so no action was taken`)
        return []
      }
      return diagErrorf(`unable to delete Organization (${id}): ${errorMessage(error)}`)
    }

    console.log(`[INFO] Organization (${id}) deleted, removing from state`)

    return []
  }

  /**
   * Bring an Organization that exists remotely under management, given only its id
   */
  async importState(
    d: ResourceData<OrganizationResourceModel>,
    signal?: AbortSignal
  ): Promise<ResourceData<OrganizationResourceModel>[]> {
    const id = d.id()

    let org: Organization
    try {
      org = await this.orgsAPI.findById(id, signal)
    } catch (error) {
      throw new AppError(`unable to import Organization (${id}): ${errorMessage(error)}`)
    }

    if (!org.id) {
      throw new AppError(`unable to import Organization (${id}): <unknown error occurred>`)
    }
    if (org.id !== id) {
      throw new AppError(`unable to import Organization (${id}): backend returned Organization (${org.id})`)
    }

    setOrganizationResourceData(d, org)
    d.setId(id)

    return [d]
  }

  /**
   * A fetched Organization must carry the id it was fetched by; a different
   * one means the tracked Organization is gone.
   */
  private checkIdentity(
    d: ResourceData<OrganizationResourceModel>,
    id: string,
    org: Organization
  ): Diagnostics | null {
    if (!org.id) {
      return diagErrorf(`unable to retrieve Organization (${id}): <unknown error occurred>`)
    }
    if (org.id !== id) {
      console.warn(`[WARN] Organization (${id}) resolved to (${org.id}), removing from state`)
      d.setId("")
      return []
    }
    return null
  }

  private project(d: ResourceData<OrganizationResourceModel>, org: Organization): Diagnostics {
    try {
      setOrganizationResourceData(d, org)
    } catch (error) {
      return diagFromError(error)
    }
    return []
  }
}
