// Traffic counters relative to one target address.
// Time-keyed maps use whole seconds since the first frame of the capture;
// JSON object keys are strings, so "0", "1", ... on the wire.
export interface TrafficReport {
  sentTime: Record<string, number>;
  receivedTime: Record<string, number>;
  sentIP: Record<string, number>;
  receivedIP: Record<string, number>;
  sentSize: Record<string, number>;
}

export interface GeoLocation {
  ip: string;
  city: string;
  country: string;
  latitude: number;
  longitude: number;
  count: number;
}

// API Response Types
export interface AnalyzeResponse {
  graphObjects: TrafficReport;
  locations: GeoLocation[];
  mapError?: string;
}

export interface HealthResponse {
  status: 'ok';
  geoip: boolean;
}

export interface ApiErrorResponse {
  error: string;
}
