/**
 * Per-tenant API documentation, rendered against the advertised base URL and
 * the tenant's first dataset (when it has one).
 */

export const EXAMPLE_DATASET = 'example_dataset_path'
export const API_KEY_PLACEHOLDER = 'YOUR_API_KEY_HERE'

// Calls chained in the complete example script
const WALKTHROUGH_PATHS = new Set(['/hello', '/data/summary', '/data/head', '/data/stats'])

export type EndpointDoc = {
  description: string
  authenticated: boolean
  parameters: string[]
  example: string
  curl_example: string
}

export type ApiDocs = {
  base_url: string
  authentication: { type: string; header: string; note: string }
  endpoints: Record<string, EndpointDoc>
  available_datasets: string[]
  complete_example: string
}

type EndpointEntry = {
  path: string
  description: string
  parameters: Record<string, string>
  authenticated?: boolean
}

function endpointDoc(apiBase: string, entry: EndpointEntry): EndpointDoc {
  const query = new URLSearchParams(entry.parameters).toString()
  const example = `${apiBase}${entry.path}${query ? `?${query}` : ''}`
  const authenticated = entry.authenticated ?? true
  const header = authenticated ? ` -H 'X-API-Key: ${API_KEY_PLACEHOLDER}'` : ''
  return {
    description: entry.description,
    authenticated,
    parameters: Object.keys(entry.parameters),
    example,
    curl_example: `curl${header} '${example}'`,
  }
}

export function buildApiDocs(baseUrl: string, datasets: string[]): ApiDocs {
  const apiBase = `${baseUrl.replace(/\/+$/, '')}/api`
  const dataset = datasets[0] ?? EXAMPLE_DATASET

  const entries: EndpointEntry[] = [
    { path: '/hello', description: 'Test endpoint (no authentication required)', parameters: {}, authenticated: false },
    { path: '/data/summary', description: 'Get dataset summary', parameters: { bucket_path: dataset } },
    { path: '/data/head', description: 'Get first N rows', parameters: { bucket_path: dataset, n: '5' } },
    {
      path: '/data/filter',
      description: 'Rows whose column contains a value (case-insensitive, at most 50)',
      parameters: { bucket_path: dataset, column: 'COLUMN_NAME', value: 'VALUE' },
    },
    { path: '/data/stats', description: 'Get statistical summary of numeric columns', parameters: { bucket_path: dataset } },
    {
      path: '/data/unique/COLUMN_NAME',
      description: 'Distinct values of a column',
      parameters: { bucket_path: dataset },
    },
  ]

  const endpoints = Object.fromEntries(entries.map((entry): [string, EndpointDoc] => [`GET ${entry.path}`, endpointDoc(apiBase, entry)]))

  const completeExample = [
    '#!/bin/sh',
    `API_KEY='${API_KEY_PLACEHOLDER}'`,
    `BASE_URL='${apiBase}'`,
    '',
    ...entries
      .filter((entry) => WALKTHROUGH_PATHS.has(entry.path))
      .map((entry) => {
        const query = new URLSearchParams(entry.parameters).toString()
        const header = entry.authenticated === false ? '' : ' -H "X-API-Key: $API_KEY"'
        return `curl${header} "$BASE_URL${entry.path}${query ? `?${query}` : ''}"`
      }),
  ].join('\n')

  return {
    base_url: apiBase,
    authentication: {
      type: 'API Key',
      header: `X-API-Key: ${API_KEY_PLACEHOLDER}`,
      note: `Replace ${API_KEY_PLACEHOLDER} with a key from POST /api/generate-key`,
    },
    endpoints,
    available_datasets: datasets,
    complete_example: completeExample,
  }
}
