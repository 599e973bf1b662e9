/**
 * Storage Module
 *
 * Responsibilities:
 * - Define the SnapshotStore interface (durable audit trail of each phase)
 * - Implement S3SnapshotStore using AWS SDK v3
 * - Implement MemorySnapshotStore for tests and local runs
 * - Bind a store to one run through SnapshotRecorder (best effort)
 *
 * Storage paths:
 * - {prefix}/{run_id}/qualifying_groups.json
 * - {prefix}/{run_id}/memberships.json
 * - {prefix}/{run_id}/member_details.json
 * - {prefix}/{run_id}/existing_identities.json
 * - {prefix}/{run_id}/missing_members.json
 * - {prefix}/{run_id}/dry_run_preview.json | creation_results.json
 * - {prefix}/{run_id}/report_preview.html
 */

import { S3Client, PutObjectCommand, type PutObjectCommandOutput } from '@aws-sdk/client-s3';
import { createHash } from 'crypto';
import { defaultLogger } from '../logging/index.js';
import type { Logger, RunId } from '../types/index.js';

/**
 * Snapshot labels written by the pipeline
 */
export type SnapshotLabel =
  | 'qualifying_groups'
  | 'memberships'
  | 'member_details'
  | 'existing_identities'
  | 'missing_members'
  | 'dry_run_preview'
  | 'creation_results'
  | 'report_preview';

export type SnapshotContentType = 'application/json' | 'text/html';

export interface SnapshotMetadata {
  runId: RunId;
  label: string;
  fileName: string;
  createdAt: string;
  contentType: SnapshotContentType;
  size: number;
  checksum: string;
}

/**
 * Storage capability for phase snapshots
 */
export interface SnapshotStore {
  save(runId: RunId, label: string, content: string, contentType?: SnapshotContentType): Promise<SnapshotMetadata>;
}

/**
 * S3 configuration for the snapshot store
 */
export interface S3Config {
  bucket: string;
  /** AWS region (defaults to us-east-1) */
  region?: string;
  /** Key prefix for all objects (defaults to 'new-employees') */
  prefix?: string;
  /** Custom endpoint for S3-compatible services */
  endpoint?: string;
  /** Force path style for S3-compatible services like MinIO */
  forcePathStyle?: boolean;
}

/**
 * Narrow view of the S3 client, injectable in tests
 */
export interface S3Transport {
  send(command: PutObjectCommand): Promise<PutObjectCommandOutput>;
}

/**
 * Calculate MD5 checksum for content
 */
function calculateChecksum(content: string): string {
  return createHash('md5').update(Buffer.from(content, 'utf-8')).digest('hex');
}

function fileNameFor(label: string, contentType: SnapshotContentType): string {
  return `${label}.${contentType === 'text/html' ? 'html' : 'json'}`;
}

function buildMetadata(
  runId: RunId,
  label: string,
  content: string,
  contentType: SnapshotContentType
): SnapshotMetadata {
  return {
    runId,
    label,
    fileName: fileNameFor(label, contentType),
    createdAt: new Date().toISOString(),
    contentType,
    size: Buffer.byteLength(content, 'utf-8'),
    checksum: calculateChecksum(content),
  };
}

/**
 * S3 implementation of SnapshotStore
 */
export class S3SnapshotStore implements SnapshotStore {
  private transport: S3Transport;
  private bucket: string;
  private prefix: string;

  constructor(config: S3Config, transport?: S3Transport) {
    this.bucket = config.bucket;
    this.prefix = config.prefix ?? 'new-employees';

    if (transport) {
      this.transport = transport;
    } else {
      const client = new S3Client({
        region: config.region ?? 'us-east-1',
        ...(config.endpoint ? { endpoint: config.endpoint } : {}),
        ...(config.forcePathStyle ? { forcePathStyle: true } : {}),
      });
      this.transport = { send: (command) => client.send(command) };
    }
  }

  /**
   * Object key for a snapshot
   */
  getKey(runId: RunId, label: string, contentType: SnapshotContentType = 'application/json'): string {
    return `${this.prefix}/${runId}/${fileNameFor(label, contentType)}`;
  }

  async save(
    runId: RunId,
    label: string,
    content: string,
    contentType: SnapshotContentType = 'application/json'
  ): Promise<SnapshotMetadata> {
    const metadata = buildMetadata(runId, label, content, contentType);

    await this.transport.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: this.getKey(runId, label, contentType),
        Body: Buffer.from(content, 'utf-8'),
        ContentType: contentType,
        Metadata: {
          'run-id': runId,
          label,
          'created-at': metadata.createdAt,
          checksum: metadata.checksum,
        },
      })
    );

    return metadata;
  }
}

/**
 * In-memory snapshot store for testing and local development
 */
export class MemorySnapshotStore implements SnapshotStore {
  private store: Map<string, { content: string; metadata: SnapshotMetadata }> = new Map();

  private getKey(runId: RunId, label: string): string {
    return `${runId}/${label}`;
  }

  async save(
    runId: RunId,
    label: string,
    content: string,
    contentType: SnapshotContentType = 'application/json'
  ): Promise<SnapshotMetadata> {
    const metadata = buildMetadata(runId, label, content, contentType);
    this.store.set(this.getKey(runId, label), { content, metadata });
    return metadata;
  }

  /**
   * @throws Error if the snapshot was never saved
   */
  load(runId: RunId, label: string): { content: string; metadata: SnapshotMetadata } {
    const item = this.store.get(this.getKey(runId, label));
    if (!item) {
      throw new Error(`Snapshot not found: ${runId}/${label}`);
    }
    return item;
  }

  /**
   * Parse a JSON snapshot
   */
  loadJson(runId: RunId, label: string): unknown {
    return JSON.parse(this.load(runId, label).content);
  }

  has(runId: RunId, label: string): boolean {
    return this.store.has(this.getKey(runId, label));
  }

  clear(): void {
    this.store.clear();
  }

  size(): number {
    return this.store.size;
  }

  keys(): string[] {
    return Array.from(this.store.keys());
  }
}

/**
 * Create the store matching the environment: S3 when a bucket is configured
 */
export function createSnapshotStore(config: S3Config | { type: 'memory' }): SnapshotStore {
  if ('type' in config) {
    return new MemorySnapshotStore();
  }
  return new S3SnapshotStore(config);
}

/**
 * Run-scoped, best-effort snapshot writer.
 *
 * Write failures are logged and never propagate: the audit trail does not
 * decide the outcome of a run.
 */
export class SnapshotRecorder {
  constructor(
    private store: SnapshotStore,
    readonly runId: RunId,
    private logger: Logger = defaultLogger
  ) {}

  async recordJson(label: SnapshotLabel, value: unknown): Promise<SnapshotMetadata | null> {
    let body: string;
    try {
      body = JSON.stringify(value, null, 2);
    } catch (error) {
      this.logFailure(label, error);
      return null;
    }
    return this.write(label, body, 'application/json');
  }

  async recordHtml(label: SnapshotLabel, html: string): Promise<SnapshotMetadata | null> {
    return this.write(label, html, 'text/html');
  }

  private async write(
    label: SnapshotLabel,
    content: string,
    contentType: SnapshotContentType
  ): Promise<SnapshotMetadata | null> {
    try {
      const metadata = await this.store.save(this.runId, label, content, contentType);
      this.logger.info('Snapshot saved', { runId: this.runId, label, fileName: metadata.fileName });
      return metadata;
    } catch (error) {
      this.logFailure(label, error);
      return null;
    }
  }

  private logFailure(label: SnapshotLabel, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error('Failed to save snapshot', { runId: this.runId, label, error: message });
  }
}
