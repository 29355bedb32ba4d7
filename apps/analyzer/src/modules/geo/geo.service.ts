import maxmind, { type CityResponse } from 'maxmind';
import type { GeoLocation } from '@pcap-lens/shared';

export type GeoRecord = Omit<GeoLocation, 'ip' | 'count'>;

// The parts of a GeoLite2-City record this service reads.
export interface CityLookup {
  city?: { names: { en?: string } };
  country?: { names: { en?: string } };
  location?: { latitude: number; longitude: number };
}

// Satisfied by maxmind's Reader<CityResponse>.
export interface CityReader {
  get(ip: string): CityLookup | null;
}

export interface PeerLocations {
  locations: GeoLocation[];
  mapError?: string;
}

/**
 * Lookups against a local GeoLite2-City database.
 *
 * Opened once at startup and closed at shutdown; a service without a
 * database reports itself unavailable instead of failing requests.
 */
export class GeoIPService {
  static readonly NOT_CONFIGURED_MESSAGE =
    'GeoIP database not configured. Download GeoLite2-City.mmdb from maxmind.com';
  private static UNKNOWN = 'Unknown';

  private reader: CityReader | null;
  private closed = false;

  constructor(reader: CityReader | null) {
    this.reader = reader;
  }

  static async open(databasePath: string): Promise<GeoIPService> {
    try {
      const reader = await maxmind.open<CityResponse>(databasePath);
      console.log(`[GeoIP] Database loaded from ${databasePath}`);
      return new GeoIPService(reader);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(
        `[GeoIP] Database not available at ${databasePath}, map features disabled: ${message}. ` +
          'Download GeoLite2-City.mmdb from maxmind.com and place it in ./data/',
      );
      return new GeoIPService(null);
    }
  }

  isAvailable(): boolean {
    return !this.closed && this.reader !== null;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.reader = null;
    console.log('[GeoIP] Reader closed');
  }

  lookup(ip: string): GeoRecord | null {
    if (this.closed) {
      throw new Error('GeoIP reader is closed');
    }
    if (!this.reader || !maxmind.validate(ip)) {
      return null;
    }

    const record = this.reader.get(ip);
    if (!record) return null;

    return {
      city: record.city?.names.en || GeoIPService.UNKNOWN,
      country: record.country?.names.en || GeoIPService.UNKNOWN,
      latitude: record.location?.latitude ?? 0,
      longitude: record.location?.longitude ?? 0,
    };
  }

  /**
   * Locate the busiest peers, most packets first. Only peers with a known
   * position count toward `limit`.
   */
  locateTopPeers(peers: ReadonlyMap<string, number>, limit: number): PeerLocations {
    if (!this.isAvailable()) {
      return { locations: [], mapError: GeoIPService.NOT_CONFIGURED_MESSAGE };
    }

    const ranked = [...peers.entries()].sort(
      ([ipA, countA], [ipB, countB]) => countB - countA || (ipA < ipB ? -1 : ipA > ipB ? 1 : 0),
    );

    const locations: GeoLocation[] = [];
    for (const [ip, count] of ranked) {
      if (locations.length >= limit) break;

      let record: GeoRecord | null;
      try {
        record = this.lookup(ip);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[GeoIP] Lookup failed for ${ip}: ${message}`);
        continue;
      }

      if (!record || (record.latitude === 0 && record.longitude === 0)) continue;
      locations.push({ ip, ...record, count });
    }

    return { locations };
  }
}
