/**
 * Organization Domain Entity
 *
 * Represents an organization in InfluxDB v2.
 */

export type OrganizationStatus = "active" | "inactive"

export interface Organization {
  // Absent until the backend assigns one
  id?: string
  name: string
  description?: string
  status?: OrganizationStatus
  createdAt?: Date
  updatedAt?: Date
}

export interface CreateOrganizationInput {
  name: string
  description?: string
}

/**
 * Remote operations the provider needs on organizations.
 *
 * Lookups and deletes of a missing organization reject with a NotFoundError.
 */
export interface OrganizationsAPI {
  findByName(name: string, signal?: AbortSignal): Promise<Organization>
  findById(id: string, signal?: AbortSignal): Promise<Organization>
  create(input: CreateOrganizationInput, signal?: AbortSignal): Promise<Organization>
  update(org: Organization, signal?: AbortSignal): Promise<Organization>
  delete(id: string, signal?: AbortSignal): Promise<void>
}
