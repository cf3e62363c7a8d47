// backend/config/indexProfiles.ts
import { IndexProfile } from '../services/types'

export const INDEX_PROFILES: Record<string, IndexProfile> = {
  BANKNIFTY: {
    name: 'BANKNIFTY',
    token: '99926009',
    strikeStep: 100,
    roundTo: 100,
    buffer: 1000,
  },
  FINNIFTY: {
    name: 'FINNIFTY',
    token: '99926037',
    strikeStep: 50,
    roundTo: 50,
    buffer: 500,
  },
  MIDCPNIFTY: {
    name: 'MIDCPNIFTY',
    token: '99926074',
    strikeStep: 25,
    roundTo: 25,
    buffer: 150,
  },
}

// Unknown names are dropped with a warning; order follows the request.
export function resolveIndexProfiles(names: string[]): IndexProfile[] {
  const profiles: IndexProfile[] = []
  for (const name of names) {
    const profile = INDEX_PROFILES[name]
    if (!profile) {
      console.warn(`⚠️ Unknown index "${name}" ignored`)
      continue
    }
    profiles.push(profile)
  }
  return profiles
}
