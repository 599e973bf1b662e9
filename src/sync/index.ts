/**
 * Sync Module
 *
 * Invocation surface of the new employee sync:
 * - Normalize the invocation request
 * - Resolve both systems' secrets
 * - Open both client sessions, run the pipeline, and always close the sessions
 *
 * `handler` is the scheduled-function entry point; `sync` takes an explicit
 * environment so every collaborator can be replaced in tests.
 */

import { z } from 'zod';
import {
  ConfigurationError,
  loadAppConfig,
  parseSourceSecret,
  parseTargetSecret,
  sourceSecretName,
  targetSecretName,
  type AppConfig,
  type SourceSystemConfig,
  type TargetSystemConfig,
} from '../config/index.js';
import { SesEmailSender, type EmailSender } from '../delivery/index.js';
import { LoggerEventSink, SqsEventSink, type EventSink } from '../events/index.js';
import { createPacer } from '../http/index.js';
import { defaultLogger } from '../logging/index.js';
import { formatRunId, runPipeline, type PhasePacing } from '../pipeline/index.js';
import { AwsSecretStore, type SecretStore } from '../secrets/index.js';
import { CostpointClient, type SourceSystemClient } from '../source-client/index.js';
import { SnapshotRecorder, createSnapshotStore, type SnapshotStore } from '../storage/index.js';
import { ConnecteamClient, type TargetSystemClient } from '../target-client/index.js';
import type { Logger, ModuleResult } from '../types/index.js';

// ============================================================================
// Request
// ============================================================================

export interface SyncRequest {
  clientName: string;
  dryRun: boolean;
}

const SyncRequestSchema = z
  .object({
    client_name: z.string().trim().min(1).optional(),
    org_reference_id: z.string().trim().min(1).optional(),
    dry_run: z.boolean().default(false),
  })
  .transform((r, ctx) => {
    const clientName = r.client_name ?? r.org_reference_id;
    if (!clientName) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'client_name is required', path: ['client_name'] });
      return z.NEVER;
    }
    return { clientName, dryRun: r.dry_run };
  });

/**
 * Validate an invocation payload. `org_reference_id` stands in for a missing
 * `client_name`.
 */
export function normalizeSyncRequest(input: unknown): ModuleResult<SyncRequest> {
  const startTime = Date.now();
  const result = SyncRequestSchema.safeParse(input ?? {});

  if (!result.success) {
    return {
      success: false,
      error: {
        code: 'INVALID_REQUEST',
        message: result.error.errors.map((e) => e.message).join('; '),
        details: result.error.errors,
      },
      metadata: {
        module: 'sync',
        timestamp: new Date().toISOString(),
        duration: Date.now() - startTime,
      },
    };
  }

  return {
    success: true,
    data: result.data,
    metadata: {
      module: 'sync',
      timestamp: new Date().toISOString(),
      duration: Date.now() - startTime,
    },
  };
}

// ============================================================================
// Environment
// ============================================================================

/**
 * Collaborators of one run
 */
export interface SyncEnvironment {
  secrets: SecretStore;
  snapshots: SnapshotStore;
  emailSender: EmailSender;
  from: string;
  recipients: string[];
  pacing: PhasePacing;
  logger: Logger;
  now: () => Date;
  createEventSink(clientName: string): EventSink;
  createSourceClient(config: SourceSystemConfig): SourceSystemClient;
  createTargetClient(config: TargetSystemConfig): TargetSystemClient;
}

/**
 * Production environment: AWS-backed stores and real HTTP clients
 */
export function createEnvironmentFromProcess(
  config: AppConfig = loadAppConfig(),
  logger: Logger = defaultLogger
): SyncEnvironment {
  const clientOptions = { timeoutMs: config.httpTimeoutMs, retryBackoffMs: config.retryBackoffMs };

  return {
    secrets: new AwsSecretStore({ region: config.region }, logger),
    snapshots: createSnapshotStore(
      config.snapshotBucket
        ? { bucket: config.snapshotBucket, region: config.region, prefix: config.snapshotPrefix }
        : { type: 'memory' }
    ),
    emailSender: new SesEmailSender({ region: config.sesRegion }, logger),
    from: config.fromEmail,
    recipients: config.recipients,
    pacing: {
      group: createPacer(config.pacing.groupDelayMs),
      member: createPacer(config.pacing.memberDelayMs),
      creation: createPacer(config.pacing.creationDelayMs),
    },
    logger,
    now: () => new Date(),
    createEventSink: (clientName) =>
      config.eventsQueueUrl
        ? new SqsEventSink(
            {
              queueUrl: config.eventsQueueUrl,
              region: config.region,
              organizationId: clientName,
              sourceId: config.functionName,
            },
            logger
          )
        : new LoggerEventSink(logger),
    createSourceClient: (sourceConfig) => new CostpointClient(sourceConfig, logger, clientOptions),
    createTargetClient: (targetConfig) => new ConnecteamClient(targetConfig, logger, clientOptions),
  };
}

// ============================================================================
// Entry points
// ============================================================================

interface ResolvedConfigs {
  source: SourceSystemConfig;
  target: TargetSystemConfig;
}

async function resolveConfigs(secrets: SecretStore, clientName: string): Promise<ResolvedConfigs> {
  const source = parseSourceSecret(await secrets.getSecret(sourceSecretName(clientName)));
  const target = parseTargetSecret(await secrets.getSecret(targetSecretName(clientName)));
  return { source, target };
}

/**
 * Run one sync for a client.
 *
 * @returns 0 on success or a defined early exit, 1 on failure
 */
export async function sync(request: SyncRequest, environment: SyncEnvironment): Promise<number> {
  const { clientName, dryRun } = request;
  const events = environment.createEventSink(clientName);
  const runId = formatRunId(environment.now());

  await events.info(
    'pipeline_starting',
    `pipeline_starting run_id=${runId} client=${clientName} dry_run=${dryRun}`
  );

  let configs: ResolvedConfigs;
  try {
    configs = await resolveConfigs(environment.secrets, clientName);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      await events.error('configuration_error', `configuration_error error=${error.message}`);
    } else {
      const message = error instanceof Error ? error.message : String(error);
      await events.error('secret_retrieval_failed', `secret_retrieval_failed error=${message}`);
    }
    return 1;
  }

  await events.info('configurations_loaded', 'configurations_loaded');

  const source = environment.createSourceClient(configs.source);
  let target: TargetSystemClient | null = null;
  try {
    target = environment.createTargetClient(configs.target);
    return await runPipeline(
      {
        source,
        target,
        recorder: new SnapshotRecorder(environment.snapshots, runId, environment.logger),
        events,
        report: {
          sender: environment.emailSender,
          from: environment.from,
          recipients: environment.recipients,
        },
        pacing: environment.pacing,
        now: environment.now,
        logger: environment.logger,
      },
      dryRun
    );
  } finally {
    source.close();
    target?.close();
  }
}

/**
 * Scheduled-function entry point
 */
export async function handler(event: unknown): Promise<number> {
  const request = normalizeSyncRequest(event);
  if (!request.success || !request.data) {
    defaultLogger.error('Invalid sync request', { error: request.error?.message });
    return 1;
  }

  let environment: SyncEnvironment;
  try {
    environment = createEnvironmentFromProcess();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      defaultLogger.error('Invalid configuration', { error: error.message, details: error.details });
      return 1;
    }
    throw error;
  }

  return sync(request.data, environment);
}
