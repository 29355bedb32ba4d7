import os from 'os';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { decodeFrame, openCapture, type Frame } from '../capture/index.js';
import { parseTargetAddress, type TargetAddress } from '../../shared/utils/ip-address.js';
import { createPartialResult, incrementCount, mergeResults } from './analysis.merger.js';
import type { AnalysisResult, FrameFold, PartialResult } from './analysis.types.js';

const NS_PER_SECOND = 1_000_000_000n;

// Frames a worker folds before giving the other workers a turn.
export const FRAMES_PER_SLICE = 256;

export function defaultPoolSize(): number {
  return Math.max(1, os.availableParallelism());
}

/**
 * Whole seconds between `timestampNs` and the epoch, sub-second part
 * dropped. Frames stamped before the epoch land in second 0.
 */
export function toRelativeSecond(timestampNs: bigint, epochNs: bigint): number {
  const elapsed = timestampNs - epochNs;
  if (elapsed <= 0n) return 0;
  return Number(elapsed / NS_PER_SECOND);
}

export function createFrameClassifier(target: TargetAddress, epochNs: bigint): FrameFold<Frame> {
  return (frame, result) => {
    const addresses = decodeFrame(frame);
    if (!addresses) return;

    const fromTarget = addresses.source === target.text;
    const toTarget = addresses.destination === target.text;
    // Loopback traffic of the target to itself is neither sent nor received.
    if (fromTarget === toTarget) return;

    const second = toRelativeSecond(frame.timestampNs, epochNs);
    if (fromTarget) {
      incrementCount(result.sentTime, second);
      incrementCount(result.sentSize, second, frame.capturedLength);
      incrementCount(result.sentIP, addresses.destination);
    } else {
      incrementCount(result.receivedTime, second);
      incrementCount(result.receivedIP, addresses.source);
    }
  };
}

interface PoolState {
  failed: boolean;
}

async function drainShared<TFrame>(
  frames: Iterator<TFrame, unknown, undefined>,
  fold: FrameFold<TFrame>,
  state: PoolState,
): Promise<PartialResult> {
  const local = createPartialResult();
  let folded = 0;
  // No worker pulls again once any of them has failed.
  while (!state.failed) {
    try {
      // next() runs to completion before any other worker resumes, so each
      // frame is handed to exactly one worker.
      const next = frames.next();
      if (next.done) return local;
      fold(next.value, local);
    } catch (error) {
      state.failed = true;
      throw error;
    }
    folded += 1;
    if (folded % FRAMES_PER_SLICE === 0) {
      await yieldToEventLoop();
    }
  }
  return local;
}

/**
 * Start `poolSize` workers that compete for frames from one shared source
 * until it is exhausted. Each worker returns its own partial result.
 * Rejects with the first error thrown by the source or by `fold`.
 */
export async function runWorkerPool<TFrame>(
  frames: Iterator<TFrame, unknown, undefined>,
  fold: FrameFold<TFrame>,
  poolSize: number,
): Promise<PartialResult[]> {
  const workers = Math.max(1, Math.floor(poolSize));
  const state: PoolState = { failed: false };
  return Promise.all(Array.from({ length: workers }, () => drainShared(frames, fold, state)));
}

/**
 * Count packets the target sent and received, per second since the first
 * frame and per peer address.
 *
 * Throws InvalidAddressError before reading the capture, and FormatError
 * for malformed or truncated containers. An empty capture is not an error.
 */
export async function analyzeCapture(capture: Uint8Array, targetAddress: string): Promise<AnalysisResult> {
  const target = parseTargetAddress(targetAddress);
  const { frames } = openCapture(capture);

  // The epoch has to come from the first frame in container order, so it
  // is read here before any worker starts.
  const first = frames.next();
  if (first.done) {
    return mergeResults([]);
  }

  const fold = createFrameClassifier(target, first.value.timestampNs);
  const main = createPartialResult();
  fold(first.value, main);

  const partials = await runWorkerPool(frames, fold, defaultPoolSize());
  return mergeResults([main, ...partials]);
}
