/**
 * Sync Unit Tests
 *
 * Request normalization, secret resolution and client lifecycle around a run.
 */

import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  createEnvironmentFromProcess,
  handler,
  normalizeSyncRequest,
  sync,
  type SyncEnvironment,
} from '../../src/sync/index.js';
import { loadAppConfig, type SourceSystemConfig, type TargetSystemConfig } from '../../src/config/index.js';
import type { EmailSender } from '../../src/delivery/index.js';
import { noPacing } from '../../src/http/index.js';
import { silentLogger } from '../../src/logging/index.js';
import { MemorySecretStore, type SecretStore } from '../../src/secrets/index.js';
import { MemorySnapshotStore, S3SnapshotStore } from '../../src/storage/index.js';
import {
  FakeSourceClient,
  FakeTargetClient,
  RecordingEventSink,
  detail,
  membership,
  page,
} from '../helpers.js';

// ============================================================================
// TEST FIXTURES
// ============================================================================

const SOURCE_SECRET = {
  base_url: 'https://cp.example.com/api/query',
  system: 'TEST',
  cp_company: '1',
  username: 'svc-user',
  password: 'test-secret',
};

const TARGET_SECRET = { key: 'test-key' };

function createSecrets(): MemorySecretStore {
  return new MemorySecretStore({
    'costpoint/acme': SOURCE_SECRET,
    'connectteam/acme': TARGET_SECRET,
  });
}

interface Harness {
  environment: SyncEnvironment;
  events: RecordingEventSink;
  source: FakeSourceClient;
  target: FakeTargetClient;
  sourceConfigs: SourceSystemConfig[];
  targetConfigs: TargetSystemConfig[];
  eventSinkClients: string[];
}

function createHarness(secrets: SecretStore = createSecrets()): Harness {
  const events = new RecordingEventSink();
  const source = new FakeSourceClient(
    new Map([['2392100', 'Security Alpha']]),
    { '2392100': [membership('E1', '2392100')] },
    { E1: detail('E1') }
  );
  const target = new FakeTargetClient({ active: { 0: page(['E1'], null) } });
  const sourceConfigs: SourceSystemConfig[] = [];
  const targetConfigs: TargetSystemConfig[] = [];
  const eventSinkClients: string[] = [];
  const emailSender: EmailSender = { send: jest.fn<EmailSender['send']>().mockResolvedValue({ success: true }) };

  const environment: SyncEnvironment = {
    secrets,
    snapshots: new MemorySnapshotStore(),
    emailSender,
    from: 'noreply@example.com',
    recipients: ['ops@example.com'],
    pacing: { group: noPacing, member: noPacing, creation: noPacing },
    logger: silentLogger,
    now: () => new Date('2026-03-02T09:05:00.000Z'),
    createEventSink: (clientName) => {
      eventSinkClients.push(clientName);
      return events;
    },
    createSourceClient: (config) => {
      sourceConfigs.push(config);
      return source;
    },
    createTargetClient: (config) => {
      targetConfigs.push(config);
      return target;
    },
  };

  return { environment, events, source, target, sourceConfigs, targetConfigs, eventSinkClients };
}

// ============================================================================
// normalizeSyncRequest
// ============================================================================

describe('normalizeSyncRequest', () => {
  it('reads the client name and defaults dry_run to false', () => {
    const result = normalizeSyncRequest({ client_name: 'acme' });

    expect(result.success).toBe(true);
    expect(result.data).toEqual({ clientName: 'acme', dryRun: false });
  });

  it('falls back to org_reference_id', () => {
    const result = normalizeSyncRequest({ org_reference_id: 'acme', dry_run: true });

    expect(result.data).toEqual({ clientName: 'acme', dryRun: true });
  });

  it('prefers client_name over org_reference_id', () => {
    expect(normalizeSyncRequest({ client_name: 'acme', org_reference_id: 'other' }).data?.clientName).toBe('acme');
  });

  it('rejects a request without a client', () => {
    const result = normalizeSyncRequest({ dry_run: true });

    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('INVALID_REQUEST');
    expect(result.error?.message).toBe('client_name is required');
    expect(result.metadata.module).toBe('sync');
  });

  it('rejects a missing payload', () => {
    expect(normalizeSyncRequest(undefined).error?.message).toBe('client_name is required');
  });

  it('rejects a non-boolean dry_run', () => {
    expect(normalizeSyncRequest({ client_name: 'acme', dry_run: 'yes' }).success).toBe(false);
  });
});

// ============================================================================
// sync
// ============================================================================

describe('sync', () => {
  let harness: Harness;

  beforeEach(() => {
    harness = createHarness();
  });

  it('loads both secrets for the client and runs the pipeline', async () => {
    const status = await sync({ clientName: 'acme', dryRun: false }, harness.environment);

    expect(status).toBe(0);
    expect(harness.eventSinkClients).toEqual(['acme']);
    expect(harness.sourceConfigs).toEqual([
      {
        baseUrl: 'https://cp.example.com/api/query',
        system: 'TEST',
        company: '1',
        username: 'svc-user',
        password: 'test-secret',
        filterNotesValue: 'CT',
      },
    ]);
    expect(harness.targetConfigs).toEqual([
      { apiKey: 'test-key', usersBaseUrl: 'https://api.connecteam.com/users/v1/users' },
    ]);
    expect(harness.source.calls[0]).toBe('groups');
  });

  it('announces the run before loading configuration', async () => {
    await sync({ clientName: 'acme', dryRun: true }, harness.environment);

    expect(harness.events.events.slice(0, 2)).toEqual([
      {
        level: 'info',
        eventType: 'pipeline_starting',
        message: 'pipeline_starting run_id=20260302_090500 client=acme dry_run=true',
      },
      { level: 'info', eventType: 'configurations_loaded', message: 'configurations_loaded' },
    ]);
  });

  it('closes both clients after the run', async () => {
    await sync({ clientName: 'acme', dryRun: false }, harness.environment);

    expect(harness.source.closed).toBe(true);
    expect(harness.target.closed).toBe(true);
  });

  it('closes both clients when the pipeline throws', async () => {
    harness.source.listQualifyingGroups = async () => {
      throw new Error('connection reset');
    };
    harness.events.error = async () => {
      throw new Error('sink down');
    };

    const status = await sync({ clientName: 'acme', dryRun: false }, harness.environment);

    expect(status).toBe(1);
    expect(harness.source.closed).toBe(true);
    expect(harness.target.closed).toBe(true);
  });

  it('fails with a configuration error when a secret is missing', async () => {
    harness = createHarness(new MemorySecretStore({ 'connectteam/acme': TARGET_SECRET }));

    const status = await sync({ clientName: 'acme', dryRun: false }, harness.environment);

    expect(status).toBe(1);
    expect(harness.events.find('configuration_error')).toEqual({
      level: 'error',
      eventType: 'configuration_error',
      message: "configuration_error error=Secret 'costpoint/acme' not found.",
    });
    expect(harness.sourceConfigs).toHaveLength(0);
    expect(harness.targetConfigs).toHaveLength(0);
  });

  it('fails with a configuration error when a secret is incomplete', async () => {
    harness = createHarness(
      new MemorySecretStore({ 'costpoint/acme': SOURCE_SECRET, 'connectteam/acme': { key: '' } })
    );

    const status = await sync({ clientName: 'acme', dryRun: false }, harness.environment);

    expect(status).toBe(1);
    expect(harness.events.find('configuration_error')?.message).toBe(
      'configuration_error error=Invalid target system secret: key: key is required'
    );
  });

  it('reports other secret store failures separately', async () => {
    const secrets: SecretStore = {
      getSecret: async () => {
        throw new Error('Rate exceeded');
      },
    };
    harness = createHarness(secrets);

    const status = await sync({ clientName: 'acme', dryRun: false }, harness.environment);

    expect(status).toBe(1);
    expect(harness.events.find('secret_retrieval_failed')?.message).toBe('secret_retrieval_failed error=Rate exceeded');
    expect(harness.events.find('configurations_loaded')).toBeUndefined();
  });
});

// ============================================================================
// createEnvironmentFromProcess
// ============================================================================

describe('createEnvironmentFromProcess', () => {
  it('keeps snapshots in memory without a bucket', () => {
    const environment = createEnvironmentFromProcess(loadAppConfig({}), silentLogger);

    expect(environment.snapshots).toBeInstanceOf(MemorySnapshotStore);
  });

  it('writes snapshots to S3 when a bucket is configured', () => {
    const environment = createEnvironmentFromProcess(
      loadAppConfig({ SNAPSHOT_BUCKET: 'audit-bucket' }),
      silentLogger
    );

    expect(environment.snapshots).toBeInstanceOf(S3SnapshotStore);
  });
});

// ============================================================================
// handler
// ============================================================================

describe('handler', () => {
  const savedPacing = process.env.MEMBER_PACING_MS;
  let consoleError: jest.SpiedFunction<typeof console.error>;

  beforeEach(() => {
    consoleError = jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleError.mockRestore();
    if (savedPacing === undefined) {
      delete process.env.MEMBER_PACING_MS;
    } else {
      process.env.MEMBER_PACING_MS = savedPacing;
    }
  });

  it('returns 1 for a request without a client', async () => {
    await expect(handler({ dry_run: true })).resolves.toBe(1);
    expect(consoleError).toHaveBeenCalledWith(
      '[ERROR] Invalid sync request',
      JSON.stringify({ error: 'client_name is required' })
    );
  });

  it('returns 1 when the environment is invalid', async () => {
    process.env.MEMBER_PACING_MS = 'slow';

    await expect(handler({ client_name: 'acme' })).resolves.toBe(1);
    expect(consoleError.mock.calls[0]?.[0]).toBe('[ERROR] Invalid configuration');
  });
});
