/**
 * Streaming detection engine
 */
export { StreamingPipeline } from './StreamingPipeline.js';
export { PipelineStateError } from './errors/PipelineStateError.js';
export { toWireMessage } from './wire.js';
export type {
  BandAnalyzer,
  DetectedEvent,
  EventWireMessage,
  PipelineDependencies,
  PipelineState,
} from './types.js';
