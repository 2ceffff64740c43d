export * from "./errors/fixtureErrors.js";
export { LogBuffer, type LogFilter } from "./logging/logBuffer.js";
export type { LogEntry, LogInput, LogLevel, LogSink } from "./logging/logTypes.js";
export { levelName, recordSeverity, toSeverity, type LevelThreshold } from "./records/levels.js";
export { RecordStore } from "./records/recordStore.js";
export type { LogRecord, RecordPage, RecordQuery } from "./records/recordTypes.js";
export { FrameDecoder, resolveFrameFormat, type FrameFormat } from "./net/frameDecoder.js";
export {
  FakeLogstashService,
  DEFAULT_STOP_TIMEOUT_MS,
  type FakeLogstashOptions,
  type ServiceState,
} from "./service/fakeLogstashService.js";
export {
  fetchAndRunService,
  runService,
  type FixtureService,
  type MaybePromise,
  type RunServiceOptions,
  type ServiceFactory,
} from "./service/fixtureService.js";
export { defaultContainerHost, LOCAL_HOST } from "./service/hosts.js";
export {
  isContainerAlive,
  DEFAULT_CONTAINER_TIMEOUT_MS,
  type ContainerHandle,
  type NetworkHandle,
} from "./containers/containerRuntime.js";
export { ContainerService, SingleContainerService, type ContainerServiceOptions } from "./containers/containerService.js";
export { disconnecting, killing } from "./containers/cleanup.js";
export { createInspectionApp, type InspectionServices } from "./http/app.js";
