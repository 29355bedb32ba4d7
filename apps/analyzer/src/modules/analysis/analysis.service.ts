/**
 * Analysis Service - runs the capture engine and attaches peer locations
 */

import type { AnalyzeResponse } from '@pcap-lens/shared';
import type { GeoIPService } from '../geo/geo.service.js';
import { analyzeCapture } from './analysis.engine.js';
import { toTrafficReport } from './analysis.merger.js';

export class AnalysisService {
  constructor(
    private geoService: GeoIPService,
    private maxGeoLookups: number,
  ) {}

  async analyze(capture: Uint8Array, targetIP: string): Promise<AnalyzeResponse> {
    console.log(`[Analyzer] Analyzing capture targetIP=${targetIP} size=${capture.length}`);
    const startedAt = Date.now();

    const result = await analyzeCapture(capture, targetIP);

    console.log(
      `[Analyzer] Done in ${Date.now() - startedAt}ms: ${result.sentIP.size} destination(s), ${result.receivedIP.size} source(s)`,
    );

    const { locations, mapError } = this.geoService.locateTopPeers(result.sentIP, this.maxGeoLookups);
    const response: AnalyzeResponse = {
      graphObjects: toTrafficReport(result),
      locations,
    };
    if (mapError) {
      response.mapError = mapError;
    }
    return response;
  }

  isGeoAvailable(): boolean {
    return this.geoService.isAvailable();
  }
}
