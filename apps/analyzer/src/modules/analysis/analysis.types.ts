/**
 * Counters owned by a single worker while a capture is being folded.
 * Keys are only ever added and values only ever grow.
 */
export interface PartialResult {
  /** relative second -> packets sent by the target */
  sentTime: Map<number, number>;
  /** relative second -> packets received by the target */
  receivedTime: Map<number, number>;
  /** destination address -> packets sent to it by the target */
  sentIP: Map<string, number>;
  /** source address -> packets it sent to the target */
  receivedIP: Map<string, number>;
  /** relative second -> captured bytes sent by the target */
  sentSize: Map<number, number>;
}

export interface AnalysisResult {
  readonly sentTime: ReadonlyMap<number, number>;
  readonly receivedTime: ReadonlyMap<number, number>;
  readonly sentIP: ReadonlyMap<string, number>;
  readonly receivedIP: ReadonlyMap<string, number>;
  readonly sentSize: ReadonlyMap<number, number>;
}

export type FrameFold<TFrame> = (frame: TFrame, result: PartialResult) => void;
