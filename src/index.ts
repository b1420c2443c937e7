export { createProvider, createProviderWithAPI } from "./interfaces/terraform/provider"
export type { Provider } from "./interfaces/terraform/provider"
export { ResourceData } from "./interfaces/terraform/ResourceData"
export type { AttributeSchema, DataSource, Resource, ResourceSchema } from "./interfaces/terraform/schema"
export { OrganizationResource, organizationResourceSchema } from "./interfaces/terraform/orgs/organizationResource"
export { OrganizationDataSource, organizationDataSourceSchema } from "./interfaces/terraform/orgs/organizationDataSource"
export { ORGANIZATION_TYPE_NAME } from "./interfaces/terraform/orgs/types"
export type { OrganizationDataSourceModel, OrganizationResourceModel } from "./interfaces/terraform/orgs/types"
export type { CreateOrganizationInput, Organization, OrganizationsAPI } from "./domain/organization/Organization"
export { InfluxDBClient } from "./infrastructure/influxdb/InfluxDBClient"
export { InfluxDBOrganizationsAPI } from "./infrastructure/influxdb/OrganizationsAPI"
export { loadProviderConfig } from "./shared/config"
export type { ProviderConfig } from "./shared/config"
export * from "./shared/errors"
export type { Diagnostic, Diagnostics } from "./shared/types"
