/**
 * Organization record shapes
 */

import { z } from "zod"
import type { CreatedUpdatedFields } from "../schema"

export const ORGANIZATION_TYPE_NAME = "influxdb2_organization"

export type OrganizationResourceModel = {
  id?: string
  name: string
  description?: string
} & CreatedUpdatedFields

export type OrganizationDataSourceModel = {
  id?: string
  name?: string
  description?: string
} & CreatedUpdatedFields

export const organizationResourceConfigSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
  })
  .strict()

export const organizationDataSourceConfigSchema = z
  .object({
    name: z.string().min(1).optional(),
    id: z.string().min(1).optional(),
  })
  .strict()
  .refine((config) => config.name !== undefined || config.id !== undefined, {
    message: "one of name or id must be set",
  })
