import { listSiteProfiles } from '../../crawler/sites/registry.js'

export function runSitesCommand(write: (line: string) => void = console.log): number {
  for (const profile of listSiteProfiles()) {
    const pagination =
      profile.pagination.mode === 'query_param'
        ? `query_param (${profile.pagination.paramName})`
        : 'script_driven'
    write(`${profile.id.padEnd(10)} ${profile.name}  ${profile.baseUrl}`)
    write(
      `           pagination=${pagination} rate=${profile.rateLimitMs}ms concurrency=${profile.maxConcurrency}`
    )
  }
  return 0
}
