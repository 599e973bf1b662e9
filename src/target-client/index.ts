/**
 * Target Client Module (Connecteam)
 *
 * Responsibilities:
 * - Page through users of one status, extracting the Costpoint id custom field
 * - Build the creation payload for one employee (pure)
 * - Create one user per call, capturing failures as values
 */

import { z } from 'zod';
import axios from 'axios';
import type { AxiosAdapter } from 'axios';
import type { TargetSystemConfig } from '../config/index.js';
import { createHttpSession, withTimeoutRetry, type HttpSession } from '../http/index.js';
import { defaultLogger } from '../logging/index.js';
import type {
  CreateIdentityOutcome,
  CreationPayload,
  CustomFieldValue,
  IdentityPage,
  IdentityStatus,
  Logger,
  MemberDetail,
  MembershipRecord,
  TargetIdentity,
} from '../types/index.js';

/**
 * Target system capability consumed by the pipeline
 */
export interface TargetSystemClient {
  listIdentities(status: IdentityStatus, offset: number): Promise<IdentityPage>;
  buildCreationPayload(membership: MembershipRecord, detail: MemberDetail): CreationPayload;
  /** HTTP error statuses come back as `{ success: false }`; timeouts that outlast the retries throw */
  createIdentity(payload: CreationPayload): Promise<CreateIdentityOutcome>;
  close(): void;
}

export const CUSTOM_FIELDS = {
  /** Costpoint EMPL_ID, the dedup key */
  employeeId: 15329039,
  hireDate: 4360693,
  birthDate: 4360698,
  /** Project id */
  branch: 4360696,
  team: 4360694,
  /** Default labor category */
  title: 4360692,
  /** Project name */
  org: 4360695,
} as const;

export const SECURITY_TEAM = 'FL Security 2025';
export const DEFAULT_TEAM = 'FL Baker 2025';
export const PAGE_LIMIT = 500;

const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T ])/;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function daysInMonth(year: number, month: number): number {
  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  return month === 2 && leap ? 29 : DAYS_IN_MONTH[month - 1] ?? 0;
}

/**
 * Reformat an ISO date or date-time to MM/DD/YYYY. Only the date fields are
 * read; any time-of-day component is ignored.
 *
 * @example formatDate('2011-07-11T00:00:00') // '07/11/2011'
 * @throws Error if the value does not start with a valid YYYY-MM-DD date
 */
export function formatDate(isoDate: string): string {
  const match = ISO_DATE_PREFIX.exec(isoDate.trim());
  if (!match) {
    throw new Error(`Invalid ISO date: '${isoDate}'`);
  }
  const [, year, month, day] = match;
  const y = Number(year);
  const m = Number(month);
  const d = Number(day);
  if (y < 1 || m < 1 || m > 12 || d < 1 || d > daysInMonth(y, m)) {
    throw new Error(`Invalid ISO date: '${isoDate}'`);
  }
  return `${month}/${day}/${year}`;
}

/**
 * Team name for a project: ids starting with 2392 belong to the security team
 */
export function deriveTeam(groupId: string): string {
  return groupId.startsWith('2392') ? SECURITY_TEAM : DEFAULT_TEAM;
}

export function displayName(detail: Pick<MemberDetail, 'firstName' | 'lastName'>): string {
  return `${detail.firstName} ${detail.lastName}`;
}

/**
 * Creation body for one employee. Pure apart from the missing-email warning:
 * identical inputs give identical payloads.
 */
export function buildCreationPayload(
  membership: MembershipRecord,
  detail: MemberDetail,
  logger: Logger = defaultLogger
): CreationPayload {
  const customFields: CustomFieldValue[] = [
    { customFieldId: CUSTOM_FIELDS.employeeId, value: detail.employeeId },
    { customFieldId: CUSTOM_FIELDS.title, value: membership.laborCategory },
    { customFieldId: CUSTOM_FIELDS.branch, value: membership.groupId },
    { customFieldId: CUSTOM_FIELDS.team, value: deriveTeam(membership.groupId) },
    { customFieldId: CUSTOM_FIELDS.org, value: membership.groupName },
  ];

  if (detail.hireDate) {
    customFields.push({ customFieldId: CUSTOM_FIELDS.hireDate, value: formatDate(detail.hireDate) });
  }
  if (detail.birthDate) {
    customFields.push({ customFieldId: CUSTOM_FIELDS.birthDate, value: formatDate(detail.birthDate) });
  }

  const payload: CreationPayload = {
    userType: 'user',
    isArchived: false,
    firstName: detail.firstName,
    lastName: detail.lastName,
    customFields,
  };

  if (detail.email) {
    payload.email = detail.email;
  } else {
    logger.warn('Employee has no home email', { employeeId: detail.employeeId });
  }

  return payload;
}

// ============================================================================
// Listing response
// ============================================================================

const CustomFieldSchema = z.object({
  customFieldId: z.number().optional(),
  value: z.unknown().optional(),
});

const UserSchema = z.object({
  userId: z.union([z.number(), z.string()]).nullish(),
  customFields: z.array(CustomFieldSchema).nullish(),
});

const UsersPageSchema = z.object({
  data: z.object({ users: z.array(UserSchema).nullish() }).nullish(),
  paging: z.object({ offset: z.number().nullish() }).nullish(),
});

export function parseIdentityPage(body: unknown): IdentityPage {
  const parsed = UsersPageSchema.safeParse(body);
  if (!parsed.success) {
    throw new Error(`Unexpected Connecteam response: ${parsed.error.errors[0]?.message ?? 'invalid page'}`);
  }

  const items: TargetIdentity[] = (parsed.data.data?.users ?? []).map((user) => {
    const field = (user.customFields ?? []).find((cf) => cf.customFieldId === CUSTOM_FIELDS.employeeId);
    const raw = field?.value;
    const dedupKey =
      (typeof raw === 'string' && raw.length > 0) || typeof raw === 'number' ? String(raw) : null;
    return {
      userId: user.userId === undefined || user.userId === null ? null : String(user.userId),
      dedupKey,
    };
  });

  return { items, nextOffset: parsed.data.paging?.offset ?? null };
}

// ============================================================================
// Client
// ============================================================================

export interface ConnecteamClientOptions {
  /** Per-call timeout (default 30000) */
  timeoutMs?: number;
  /** Backoff between timeout retries (default 1000) */
  retryBackoffMs?: number;
  /** Request adapter override (tests) */
  adapter?: AxiosAdapter;
}

/**
 * Connecteam implementation of TargetSystemClient
 */
export class ConnecteamClient implements TargetSystemClient {
  private session: HttpSession;
  private config: TargetSystemConfig;
  private logger: Logger;
  private retryBackoffMs: number;

  constructor(config: TargetSystemConfig, logger: Logger = defaultLogger, options: ConnecteamClientOptions = {}) {
    this.config = config;
    this.logger = logger;
    this.retryBackoffMs = options.retryBackoffMs ?? 1000;
    this.session = createHttpSession(
      {
        timeout: options.timeoutMs ?? 30000,
        headers: {
          'X-API-KEY': config.apiKey,
          Accept: 'application/json',
          'Content-Type': 'application/json',
        },
      },
      options.adapter
    );
  }

  close(): void {
    this.session.close();
  }

  async listIdentities(status: IdentityStatus, offset: number): Promise<IdentityPage> {
    this.logger.info('Fetching Connecteam users', { status, offset });

    const response = await withTimeoutRetry(
      () =>
        this.session.http.get<unknown>(this.config.usersBaseUrl, {
          params: { limit: PAGE_LIMIT, offset, userStatus: status },
        }),
      { backoffMs: this.retryBackoffMs },
      this.logger,
      `Users listing (${status})`
    );

    return parseIdentityPage(response.data);
  }

  buildCreationPayload(membership: MembershipRecord, detail: MemberDetail): CreationPayload {
    return buildCreationPayload(membership, detail, this.logger);
  }

  async createIdentity(payload: CreationPayload): Promise<CreateIdentityOutcome> {
    const employeeId = payload.customFields.find((cf) => cf.customFieldId === CUSTOM_FIELDS.employeeId)?.value;
    this.logger.info('Creating user', { employeeId, name: displayName(payload) });

    try {
      const response = await withTimeoutRetry(
        () =>
          this.session.http.post<unknown>(this.config.usersBaseUrl, [payload], {
            params: { sendActivation: 'false' },
          }),
        { backoffMs: this.retryBackoffMs },
        this.logger,
        `User creation for ${employeeId ?? 'unknown'}`
      );
      this.logger.info('User created', { employeeId, statusCode: response.status });
      return { success: true, response: response.data };
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        const detail = errorDetail(error.response.data);
        this.logger.error('User create failed', {
          employeeId,
          statusCode: error.response.status,
          detail,
        });
        return {
          success: false,
          error: error.message,
          statusCode: error.response.status,
          detail,
        };
      }
      throw error;
    }
  }
}

/**
 * Structured error body when the response is JSON, raw text otherwise
 */
function errorDetail(data: unknown): unknown {
  if (typeof data !== 'string') {
    return data;
  }
  try {
    return JSON.parse(data);
  } catch {
    return data;
  }
}
