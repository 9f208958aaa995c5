import { validateCatalogConfig, validateSettings } from '@autoreg/schemas/src/validators.js';
import type { CatalogConfig } from '@autoreg/schemas/src/catalog.schema.js';
import type { Settings } from '@autoreg/schemas/src/settings.schema.js';
import type { SessionContext } from '@autoreg/shared/src/types/session.types.js';

/**
 * Small catalog shared by unit tests. Mirrors the shape of config/catalog.json.
 */
export function createTestCatalog(): CatalogConfig {
  return validateCatalogConfig({
    websites: {
      US_NHTSA: 'https://www.nhtsa.gov/laws-regulations',
      US_EPA: 'https://www.epa.gov/regulations-emissions-vehicles-and-engines',
      EU_COMMISSION: 'https://ec.europa.eu/growth/sectors/automotive-industry_en',
      UNECE: 'https://unece.org/transport/vehicle-regulations',
      UK_VCA: 'https://www.vehicle-certification-agency.gov.uk/',
      JAPAN_MLIT: 'https://www.mlit.go.jp/en/',
    },
    regionWebsites: {
      us: ['US_NHTSA', 'US_EPA'],
      united_states: ['US_NHTSA', 'US_EPA'],
      eu: ['EU_COMMISSION', 'UNECE'],
      uk: ['UK_VCA', 'UNECE'],
      japan: ['JAPAN_MLIT', 'UNECE'],
    },
    categoryWebsites: {
      emissions: ['US_EPA', 'EU_COMMISSION', 'UNECE'],
      safety: ['US_NHTSA', 'UNECE', 'EU_COMMISSION'],
      type_approval: ['EU_COMMISSION', 'UNECE'],
    },
    globalDefaults: ['UNECE', 'EU_COMMISSION', 'US_EPA'],
  });
}

export function createTestSettings(overrides: unknown = {}): Settings {
  return validateSettings(overrides);
}

export function createTestSession(sessionId = 'session-1'): SessionContext {
  return { sessionId, startedAt: new Date('2026-01-15T10:00:00Z') };
}
