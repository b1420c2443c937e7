/**
 * Shared HTTP client for InfluxDB API calls
 * Uses native fetch (Node.js 20 ships undici as the global fetch)
 */

/**
 * Pooled fetch function
 * Node's global fetch keeps connections alive per origin, so this is a
 * single seam for every request the provider sends
 */
export async function pooledFetch(
  url: string | URL,
  options?: RequestInit
): Promise<Response> {
  return fetch(url, options)
}
