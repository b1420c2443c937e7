/**
 * Provider wiring
 *
 * Builds every resource and data source around one explicitly passed
 * OrganizationsAPI. There is no global client.
 */

import type { OrganizationsAPI } from "../../domain/organization/Organization"
import { InfluxDBClient } from "../../infrastructure/influxdb/InfluxDBClient"
import { InfluxDBOrganizationsAPI } from "../../infrastructure/influxdb/OrganizationsAPI"
import { loadProviderConfig } from "../../shared/config"
import type { ProviderConfig } from "../../shared/config"
import { OrganizationDataSource } from "./orgs/organizationDataSource"
import { OrganizationResource } from "./orgs/organizationResource"
import { ORGANIZATION_TYPE_NAME } from "./orgs/types"

export interface Provider {
  resources: {
    [ORGANIZATION_TYPE_NAME]: OrganizationResource
  }
  dataSources: {
    [ORGANIZATION_TYPE_NAME]: OrganizationDataSource
  }
}

export function createProviderWithAPI(orgsAPI: OrganizationsAPI): Provider {
  return {
    resources: {
      [ORGANIZATION_TYPE_NAME]: new OrganizationResource(orgsAPI),
    },
    dataSources: {
      [ORGANIZATION_TYPE_NAME]: new OrganizationDataSource(orgsAPI),
    },
  }
}

export function createProvider(config: Partial<ProviderConfig> = {}): Provider {
  const client = new InfluxDBClient(loadProviderConfig(config))
  return createProviderWithAPI(new InfluxDBOrganizationsAPI(client))
}
