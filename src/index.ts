/**
 * Public entry point of the project ledger.
 */
export * from './Domain/index.js';
export * from './Common/Errors.js';
export { log, LogLevel, SetLogThreshold, GetLogThreshold } from './Common/Log.js';
export type { ConfigLogLevel } from './Common/Log.js';
export { Project } from './Project/Project.js';
export type { ProjectOptions, DirectoryUpdate } from './Project/Project.js';
export { ChangeLog } from './Project/ChangeLog.js';
export { ParseMutation, ValidateMutation, ResolveMutationKind, IsMutationKind } from './Project/ParseMutation.js';
export { EncodeProjectRecord, DecodeProjectRecord } from './Project/ProjectCodec.js';
export type { InfoFormatOptions } from './Project/Rendering.js';
export { PlaceholderVolumeEstimator, PLACEHOLDER_VOLUME_ESTIMATOR } from './Project/VolumeEstimator.js';
export type { VolumeEstimator } from './Project/VolumeEstimator.js';
export * from './Repository/index.js';
export { ProjectStore } from './Services/ProjectStore.js';
export type { ProjectStoreOptions } from './Services/ProjectStore.js';
export { ConfigService } from './Services/ConfigService.js';
export { PathManager } from './Services/PathManager.js';
export { MetricsService, metricsService } from './Services/MetricsService.js';
export type { MetricsSnapshot } from './Services/MetricsService.js';
export { MainEventBus, MAIN_EVENT_BUS } from './Events/MainEventBus.js';
export type { ValidatedConfig } from './Types/Config.js';
export { BootProjectStore, DEFAULT_CONFIG_PATH } from './App.js';
export type { BootOptions, BootedLedger } from './App.js';
