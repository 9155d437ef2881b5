/**
 * Node.js station: filesystem adapter, inbox watcher, config and CLI
 */

export { NodeFileSystemAdapter } from './storage/node-fs-adapter';
export { NodeFileWatcher, type NodeFileWatcherOptions } from './storage/node-file-watcher';
export {
  ConfigManager,
  CONFIG_ENV_VAR,
  parseStationConfig,
  resolveConfigPath,
  type ResolvedStationConfig,
  type StationConfig,
} from './config/manager';
export {
  StructuredLogger,
  createLogger,
  configureLogger,
  getLogger,
  type LogContext,
  type LoggerOptions,
} from './telemetry/logger';
export { SyncMetrics, getSyncMetrics } from './telemetry/sync-metrics';
export {
  decodePayload,
  encodePayload,
  isPayloadFileName,
  payloadFileName,
  PAYLOAD_FILE_EXTENSION,
} from './sync/payload-file';
export { InboxWatcher, FAILED_DIR, type InboxFileOutcome, type InboxWatcherOptions } from './sync/inbox-watcher';
export { parseCliArgs, COMMANDS, type CliArgs, type CommandName } from './cli/cli-parser';
export { runCommand, UsageError, USAGE, type CommandContext } from './cli/commands';
