/**
 * New Employee Sync - Main Entry Point
 *
 * Creates Connecteam users for active Costpoint employees assigned to
 * qualifying projects who do not exist in Connecteam yet.
 *
 * Architecture:
 * - A scheduled function invokes `handler` with `{ client_name, dry_run }`
 * - The pipeline runs six sequential phases against the two systems
 * - Each phase's output is kept as a snapshot in S3 under the run id
 * - A report is emailed (live) or saved as HTML (dry run)
 */

// Core Types
export type * from './types/index.js';

// Logging
export { defaultLogger, silentLogger } from './logging/index.js';

// Configuration
export {
  ConfigurationError,
  DEFAULT_FILTER_NOTES_VALUE,
  DEFAULT_USERS_BASE_URL,
  loadAppConfig,
  parseRecipients,
  parseSourceSecret,
  parseTargetSecret,
  sourceSecretName,
  targetSecretName,
  type AppConfig,
  type PacingConfig,
  type SourceSystemConfig,
  type TargetSystemConfig,
} from './config/index.js';

// Secrets
export {
  AwsSecretStore,
  MemorySecretStore,
  decodeSecret,
  type SecretStore,
  type SecretsTransport,
} from './secrets/index.js';

// Storage - phase snapshots
export {
  S3SnapshotStore,
  MemorySnapshotStore,
  SnapshotRecorder,
  createSnapshotStore,
  type SnapshotStore,
  type SnapshotLabel,
  type SnapshotMetadata,
  type S3Config,
} from './storage/index.js';

// Events
export {
  EVENT_PREFIX,
  LoggerEventSink,
  SqsEventSink,
  type EventSink,
  type EventEnvelope,
  type EventLevel,
} from './events/index.js';

// HTTP plumbing
export {
  MAX_TIMEOUT_ATTEMPTS,
  FixedDelayPacer,
  createPacer,
  isTimeoutError,
  noPacing,
  withTimeoutRetry,
  type Pacer,
} from './http/index.js';

// Costpoint
export { CostpointClient, type CostpointClientOptions, type SourceSystemClient } from './source-client/index.js';

// Connecteam
export {
  ConnecteamClient,
  CUSTOM_FIELDS,
  DEFAULT_TEAM,
  SECURITY_TEAM,
  deriveTeam,
  formatDate,
  type ConnecteamClientOptions,
  type TargetSystemClient,
} from './target-client/index.js';

// Pipeline
export {
  computeMissing,
  collectIdentityKeys,
  formatRunId,
  runPipeline,
  type PipelineContext,
  type PhasePacing,
} from './pipeline/index.js';

// Report
export { renderReport, renderHtml, renderPlainText, renderSubject, type ReportInput } from './renderers/index.js';
export {
  SesEmailSender,
  NullEmailSender,
  deliverReport,
  type EmailSender,
  type EmailMessage,
  type EmailResult,
} from './delivery/index.js';

// Entry points
export {
  createEnvironmentFromProcess,
  handler,
  normalizeSyncRequest,
  sync,
  type SyncEnvironment,
  type SyncRequest,
} from './sync/index.js';
