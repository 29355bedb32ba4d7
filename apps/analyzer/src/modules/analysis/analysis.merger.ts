import type { TrafficReport } from '@pcap-lens/shared';
import type { AnalysisResult, PartialResult } from './analysis.types.js';

export function createPartialResult(): PartialResult {
  return {
    sentTime: new Map(),
    receivedTime: new Map(),
    sentIP: new Map(),
    receivedIP: new Map(),
    sentSize: new Map(),
  };
}

export function incrementCount<K>(map: Map<K, number>, key: K, amount = 1): void {
  map.set(key, (map.get(key) ?? 0) + amount);
}

function addAll<K>(target: Map<K, number>, source: ReadonlyMap<K, number>): void {
  for (const [key, value] of source) {
    incrementCount(target, key, value);
  }
}

/** Add every counter of `source` into `target`. */
export function mergeInto(target: PartialResult, source: AnalysisResult): void {
  addAll(target.sentTime, source.sentTime);
  addAll(target.receivedTime, source.receivedTime);
  addAll(target.sentIP, source.sentIP);
  addAll(target.receivedIP, source.receivedIP);
  addAll(target.sentSize, source.sentSize);
}

/**
 * Key-wise sum over the union of keys. Order of `partials` does not
 * matter; an empty list gives an empty result.
 */
export function mergeResults(partials: readonly AnalysisResult[]): AnalysisResult {
  const merged = createPartialResult();
  for (const partial of partials) {
    mergeInto(merged, partial);
  }
  return merged;
}

function timeSeriesToRecord(map: ReadonlyMap<number, number>): Record<string, number> {
  const record: Record<string, number> = {};
  for (const key of [...map.keys()].sort((a, b) => a - b)) {
    record[String(key)] = map.get(key) ?? 0;
  }
  return record;
}

function addressMapToRecord(map: ReadonlyMap<string, number>): Record<string, number> {
  return Object.fromEntries(map);
}

export function toTrafficReport(result: AnalysisResult): TrafficReport {
  return {
    sentTime: timeSeriesToRecord(result.sentTime),
    receivedTime: timeSeriesToRecord(result.receivedTime),
    sentIP: addressMapToRecord(result.sentIP),
    receivedIP: addressMapToRecord(result.receivedIP),
    sentSize: timeSeriesToRecord(result.sentSize),
  };
}
