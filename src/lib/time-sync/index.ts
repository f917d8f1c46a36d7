export {
  createTimeSynchronizer,
  type ClockOffset,
  type CorrectedTimestamp,
  type FetchServerTime,
  type TimeSynchronizer,
  type TimeSynchronizerConfig,
} from "./time-synchronizer";
