/**
 * Site Profile Registry
 *
 * Profiles are registered explicitly at startup and stay immutable for the
 * run; no auto-discovery. One profile per id and per registrable domain, so
 * two profiles never share a rate-limit budget by accident.
 */

import { ConfigurationError } from '../errors.js'
import type { SiteProfile } from '../types.js'
import { getRegistrableDomain } from '../utils/url.js'
import { centanetProfile } from './centanet/profile.js'
import { hse28Profile } from './hse28/profile.js'
import { ricacorpProfile } from './ricacorp/profile.js'

export class SiteProfileRegistry {
  private readonly profiles = new Map<string, SiteProfile>()
  private readonly domainToProfile = new Map<string, SiteProfile>()

  /**
   * @throws ConfigurationError on a duplicate id or domain
   */
  register(profile: SiteProfile): void {
    if (this.profiles.has(profile.id)) {
      throw new ConfigurationError(`Site profile '${profile.id}' is already registered`)
    }

    const domain = getRegistrableDomain(profile.baseUrl)
    const existing = this.domainToProfile.get(domain)
    if (existing) {
      throw new ConfigurationError(`Domain '${domain}' is already registered as '${existing.id}'`, {
        siteId: profile.id,
      })
    }

    this.profiles.set(profile.id, profile)
    this.domainToProfile.set(domain, profile)
  }

  get(siteId: string): SiteProfile | undefined {
    return this.profiles.get(siteId.toLowerCase())
  }

  list(): SiteProfile[] {
    return Array.from(this.profiles.values())
  }

  ids(): string[] {
    return Array.from(this.profiles.keys())
  }

  getByDomain(urlOrDomain: string): SiteProfile | undefined {
    const domain = urlOrDomain.includes('://') ? getRegistrableDomain(urlOrDomain) : urlOrDomain.toLowerCase()
    return this.domainToProfile.get(domain)
  }
}

export const BUILT_IN_PROFILES: readonly SiteProfile[] = [centanetProfile, hse28Profile, ricacorpProfile]

let globalRegistry: SiteProfileRegistry | null = null

/** The registry holding the built-in profiles */
export function getSiteRegistry(): SiteProfileRegistry {
  if (!globalRegistry) {
    const registry = new SiteProfileRegistry()
    for (const profile of BUILT_IN_PROFILES) registry.register(profile)
    globalRegistry = registry
  }
  return globalRegistry
}

export function getSiteProfile(siteId: string): SiteProfile | undefined {
  return getSiteRegistry().get(siteId)
}

export function listSiteProfiles(): SiteProfile[] {
  return getSiteRegistry().list()
}
