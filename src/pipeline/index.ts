export {
  createRequestPipeline,
  DEFAULT_RESYNC_INTERVAL_MS,
  type ExecuteOptions,
  type Operation,
  type OperationContext,
  type OperationState,
  type PipelineMetrics,
  type RequestPipeline,
  type RequestPipelineConfig,
} from "./request-pipeline";
