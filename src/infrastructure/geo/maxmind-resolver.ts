import { isIP } from 'node:net';
import { open } from 'maxmind';
import type { CityResponse, Reader } from 'maxmind';
import type { Location, LocationResolver } from '../../domain/index.js';
import { PipelineError } from '../../domain/index.js';

function englishName(names: { readonly en?: string } | undefined): string {
  return names?.en ?? '';
}

/** Projects a MaxMind city record onto the location contract. */
export function toLocation(record: CityResponse): Location {
  const timezone = record.location?.time_zone;
  return {
    country: englishName(record.country?.names),
    region: englishName(record.subdivisions?.[0]?.names),
    city: englishName(record.city?.names),
    ...(timezone ? { timezone } : {}),
  };
}

/**
 * Location resolver over a MaxMind City database loaded into memory.
 * Lookups are synchronous reads of the shared reader.
 */
export class MaxmindLocationResolver implements LocationResolver {
  constructor(private readonly reader: Reader<CityResponse>) {}

  static async open(databasePath: string): Promise<MaxmindLocationResolver> {
    try {
      return new MaxmindLocationResolver(await open<CityResponse>(databasePath));
    } catch (err: unknown) {
      throw new PipelineError('IpConfigError', `Failed to open GeoIP database at ${databasePath}`, { cause: err });
    }
  }

  async lookup(ip: string): Promise<Location | null> {
    if (isIP(ip) === 0) {
      throw new PipelineError('IpConfigError', `Invalid IP: ${ip}`);
    }

    let record: CityResponse | null;
    try {
      record = this.reader.get(ip);
    } catch (err: unknown) {
      throw new PipelineError('IpConfigError', `Lookup failed for ${ip}`, { cause: err });
    }
    return record === null ? null : toLocation(record);
  }
}
