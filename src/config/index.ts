/**
 * Configuration Module
 *
 * Responsibilities:
 * - Validate the source and target system secrets (zod)
 * - Read runtime settings from the process environment
 * - Raise ConfigurationError for anything missing or malformed
 */

import { z } from 'zod';

/**
 * Raised for missing, undecodable or invalid secrets and settings.
 * The sync entry point turns it into a failed run before any external call.
 */
export class ConfigurationError extends Error {
  constructor(message: string, readonly details?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export const DEFAULT_FILTER_NOTES_VALUE = 'CT';
export const DEFAULT_USERS_BASE_URL = 'https://api.connecteam.com/users/v1/users';

// ============================================================================
// Secrets
// ============================================================================

const requiredString = (field: string) =>
  z.string({ required_error: `${field} is required` }).trim().min(1, `${field} is required`);

const SourceSecretSchema = z.object({
  base_url: requiredString('base_url'),
  system: requiredString('system'),
  cp_company: z.preprocess((v) => (typeof v === 'number' ? String(v) : v), requiredString('cp_company')),
  username: requiredString('username'),
  password: requiredString('password'),
  filter_notes_value: z.string().trim().min(1).optional(),
});

const TargetSecretSchema = z.object({
  key: requiredString('key'),
  users_base_url: z.string().url().optional(),
});

/**
 * Costpoint connection settings
 */
export interface SourceSystemConfig {
  baseUrl: string;
  system: string;
  company: string;
  username: string;
  password: string;
  /** NOTES value marking a project as qualifying */
  filterNotesValue: string;
}

/**
 * Connecteam connection settings
 */
export interface TargetSystemConfig {
  apiKey: string;
  usersBaseUrl: string;
}

function describeIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => (e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message));
}

export function parseSourceSecret(secret: Record<string, unknown>): SourceSystemConfig {
  const result = SourceSecretSchema.safeParse(secret);
  if (!result.success) {
    const issues = describeIssues(result.error);
    throw new ConfigurationError(`Invalid source system secret: ${issues.join('; ')}`, issues);
  }
  const s = result.data;
  return {
    baseUrl: s.base_url,
    system: s.system,
    company: s.cp_company,
    username: s.username,
    password: s.password,
    filterNotesValue: s.filter_notes_value ?? DEFAULT_FILTER_NOTES_VALUE,
  };
}

export function parseTargetSecret(secret: Record<string, unknown>): TargetSystemConfig {
  const result = TargetSecretSchema.safeParse(secret);
  if (!result.success) {
    const issues = describeIssues(result.error);
    throw new ConfigurationError(`Invalid target system secret: ${issues.join('; ')}`, issues);
  }
  return {
    apiKey: result.data.key,
    usersBaseUrl: result.data.users_base_url ?? DEFAULT_USERS_BASE_URL,
  };
}

export function sourceSecretName(clientName: string): string {
  return `costpoint/${clientName}`;
}

export function targetSecretName(clientName: string): string {
  return `connectteam/${clientName}`;
}

// ============================================================================
// Environment
// ============================================================================

const optionalString = z
  .string()
  .optional()
  .transform((v) => {
    const trimmed = v?.trim();
    return trimmed ? trimmed : undefined;
  });

const millis = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const AppEnvSchema = z.object({
  AWS_REGION: z.string().trim().min(1).default('us-east-1'),
  SES_REGION: optionalString,
  SNAPSHOT_BUCKET: optionalString,
  SNAPSHOT_PREFIX: z.string().trim().min(1).default('new-employees'),
  EVENTS_QUEUE_URL: optionalString,
  SES_FROM_EMAIL: z.string().trim().min(1).default('noreply@example.com'),
  SES_TO_EMAILS: z.string().default(''),
  AWS_LAMBDA_FUNCTION_NAME: z.string().trim().min(1).default('new-employee-sync'),
  GROUP_PACING_MS: millis(500),
  MEMBER_PACING_MS: millis(300),
  CREATION_PACING_MS: millis(300),
  HTTP_TIMEOUT_MS: millis(30000),
  RETRY_BACKOFF_MS: millis(1000),
});

/**
 * Pacing delays between consecutive external calls
 */
export interface PacingConfig {
  groupDelayMs: number;
  memberDelayMs: number;
  creationDelayMs: number;
}

export interface AppConfig {
  region: string;
  sesRegion: string;
  /** Absent: snapshots stay in memory */
  snapshotBucket: string | null;
  snapshotPrefix: string;
  /** Absent: events are only logged */
  eventsQueueUrl: string | null;
  fromEmail: string;
  recipients: string[];
  functionName: string;
  pacing: PacingConfig;
  httpTimeoutMs: number;
  retryBackoffMs: number;
}

/**
 * Split a comma-separated recipient list, dropping blanks
 */
export function parseRecipients(value: string): string[] {
  return value
    .split(',')
    .map((email) => email.trim())
    .filter((email) => email.length > 0);
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings count as unset so defaults apply.
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      cleaned[key] = value;
    }
  }

  const result = AppEnvSchema.safeParse(cleaned);
  if (!result.success) {
    const issues = describeIssues(result.error);
    throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`, issues);
  }

  const e = result.data;
  return {
    region: e.AWS_REGION,
    sesRegion: e.SES_REGION ?? e.AWS_REGION,
    snapshotBucket: e.SNAPSHOT_BUCKET ?? null,
    snapshotPrefix: e.SNAPSHOT_PREFIX,
    eventsQueueUrl: e.EVENTS_QUEUE_URL ?? null,
    fromEmail: e.SES_FROM_EMAIL,
    recipients: parseRecipients(e.SES_TO_EMAILS),
    functionName: e.AWS_LAMBDA_FUNCTION_NAME,
    pacing: {
      groupDelayMs: e.GROUP_PACING_MS,
      memberDelayMs: e.MEMBER_PACING_MS,
      creationDelayMs: e.CREATION_PACING_MS,
    },
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    retryBackoffMs: e.RETRY_BACKOFF_MS,
  };
}
