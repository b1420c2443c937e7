/**
 * InfluxDB v2 wire types
 *
 * Only the parts of the /api/v2/orgs payloads the provider reads.
 */

import { z } from "zod"

export const wireOrganizationSchema = z.object({
  id: z.string().optional(),
  name: z.string(),
  description: z.string().nullish(),
  status: z.enum(["active", "inactive"]).optional(),
  createdAt: z.string().optional(),
  updatedAt: z.string().optional(),
})

export type WireOrganization = z.infer<typeof wireOrganizationSchema>

export const wireOrganizationsSchema = z.object({
  orgs: z.array(wireOrganizationSchema).default([]),
})

export interface PostOrganizationRequest {
  name: string
  description?: string
}

export interface PatchOrganizationRequest {
  name?: string
  description?: string
}

export const wireErrorSchema = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
})
