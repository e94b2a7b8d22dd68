/**
 * Regional API hosts.
 */

interface Region {
  url: string;
  description: string;
}

const REGIONS: Record<string, Region> = {
  eu: { url: 'https://eu-api.mimecast.com', description: 'Europe (excluding Germany)' },
  de: { url: 'https://de-api.mimecast.com', description: 'Germany' },
  us: { url: 'https://us-api.mimecast.com', description: 'United States of America' },
  usb: { url: 'https://usb-api.mimecast.com', description: 'United States of America (USB)' },
  ca: { url: 'https://ca-api.mimecast.com', description: 'Canada' },
  za: { url: 'https://za-api.mimecast.com', description: 'South Africa' },
  au: { url: 'https://au-api.mimecast.com', description: 'Australia' },
  je: { url: 'https://je-api.mimecast.com', description: 'Offshore' },
};

/** API base URL for a region code (case-insensitive), or undefined. */
export function getApiUrl(region: string): string | undefined {
  return REGIONS[region.toLowerCase()]?.url;
}

/** Human-readable name for a region code (case-insensitive), or undefined. */
export function getRegionDescription(region: string): string | undefined {
  return REGIONS[region.toLowerCase()]?.description;
}

/** Every region code mapped to its description. */
export function listRegions(): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [code, region] of Object.entries(REGIONS)) {
    result[code] = region.description;
  }
  return result;
}
