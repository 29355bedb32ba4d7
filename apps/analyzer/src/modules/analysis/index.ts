export type { AnalysisResult, FrameFold, PartialResult } from './analysis.types.js';
export {
  analyzeCapture,
  createFrameClassifier,
  defaultPoolSize,
  runWorkerPool,
  toRelativeSecond,
  FRAMES_PER_SLICE,
} from './analysis.engine.js';
export {
  createPartialResult,
  incrementCount,
  mergeInto,
  mergeResults,
  toTrafficReport,
} from './analysis.merger.js';
export { AnalysisService } from './analysis.service.js';
export { analysisController } from './analysis.controller.js';
