/**
 * Shared test fixtures: loggers, an in-process HTTP adapter, and in-memory
 * stand-ins for the source and target systems.
 */

import axios from 'axios';
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import type { EventLevel, EventSink } from '../src/events/index.js';
import { silentLogger } from '../src/logging/index.js';
import type { SourceSystemClient } from '../src/source-client/index.js';
import { buildCreationPayload, type TargetSystemClient } from '../src/target-client/index.js';
import type {
  CreateIdentityOutcome,
  CreationPayload,
  EmployeeId,
  IdentityPage,
  IdentityStatus,
  Logger,
  MemberDetail,
  MembershipRecord,
} from '../src/types/index.js';

// ============================================================================
// Logging
// ============================================================================

export type LogEntry = { level: string; msg: string; meta?: Record<string, unknown> };

export const createMockLogger = (): Logger & { logs: LogEntry[] } => {
  const logs: LogEntry[] = [];
  return {
    logs,
    info: (msg, meta) => logs.push({ level: 'info', msg, meta }),
    warn: (msg, meta) => logs.push({ level: 'warn', msg, meta }),
    error: (msg, meta) => logs.push({ level: 'error', msg, meta }),
    debug: (msg, meta) => logs.push({ level: 'debug', msg, meta }),
  };
};

// ============================================================================
// Events
// ============================================================================

export interface RecordedEvent {
  level: EventLevel;
  eventType: string;
  message: string;
}

export class RecordingEventSink implements EventSink {
  readonly events: RecordedEvent[] = [];

  async info(eventType: string, message: string): Promise<void> {
    this.events.push({ level: 'info', eventType, message });
  }

  async error(eventType: string, message: string): Promise<void> {
    this.events.push({ level: 'error', eventType, message });
  }

  async success(eventType: string, message: string): Promise<void> {
    this.events.push({ level: 'success', eventType, message });
  }

  types(): string[] {
    return this.events.map((e) => e.eventType);
  }

  find(eventType: string): RecordedEvent | undefined {
    return this.events.find((e) => e.eventType === eventType);
  }
}

// ============================================================================
// HTTP
// ============================================================================

export interface RecordedRequest {
  method: string;
  url: string;
  params: Record<string, unknown>;
  data: unknown;
  headers: Record<string, unknown>;
  timeout: number | undefined;
}

export type FakeReply = { status: number; data: unknown } | Error;

/**
 * In-process axios adapter. Non-2xx replies reject the way axios does.
 */
export function createFakeAdapter(respond: (request: RecordedRequest) => FakeReply): {
  adapter: AxiosAdapter;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
    const request: RecordedRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      params: config.params ?? {},
      data: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
      headers: config.headers.toJSON(),
      timeout: config.timeout,
    };
    requests.push(request);

    const reply = respond(request);
    if (reply instanceof Error) {
      throw reply;
    }

    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
    if (reply.status >= 200 && reply.status < 300) {
      return response;
    }
    throw new axios.AxiosError(
      `Request failed with status code ${reply.status}`,
      'ERR_BAD_RESPONSE',
      config,
      null,
      response
    );
  };

  return { adapter, requests };
}

export function timeoutError(): Error {
  return new axios.AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED');
}

// ============================================================================
// Domain fixtures
// ============================================================================

export function membership(employeeId: EmployeeId, groupId: string, overrides: Partial<MembershipRecord> = {}): MembershipRecord {
  return {
    employeeId,
    groupId,
    groupName: `Project ${groupId}`,
    laborCategory: 'GUARD1',
    ...overrides,
  };
}

export function detail(employeeId: EmployeeId, overrides: Partial<MemberDetail> = {}): MemberDetail {
  return {
    employeeId,
    firstName: `First${employeeId}`,
    lastName: `Last${employeeId}`,
    email: `${employeeId}@example.com`,
    hireDate: '2020-01-15T00:00:00',
    birthDate: '',
    isActive: true,
    ...overrides,
  };
}

/**
 * In-memory source system
 */
export class FakeSourceClient implements SourceSystemClient {
  readonly calls: string[] = [];
  closed = false;

  constructor(
    private groups: Map<string, string>,
    private members: Record<string, MembershipRecord[] | Error>,
    private details: Record<EmployeeId, MemberDetail | null>
  ) {}

  async listQualifyingGroups(): Promise<Map<string, string>> {
    this.calls.push('groups');
    return new Map(this.groups);
  }

  async listGroupMembers(groupId: string, _groupName: string): Promise<MembershipRecord[]> {
    this.calls.push(`members:${groupId}`);
    const records = this.members[groupId] ?? [];
    if (records instanceof Error) {
      throw records;
    }
    return records;
  }

  async getMemberDetail(employeeId: EmployeeId): Promise<MemberDetail | null> {
    this.calls.push(`detail:${employeeId}`);
    return this.details[employeeId] ?? null;
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * In-memory target system. Listing pages are looked up by status and offset.
 */
export class FakeTargetClient implements TargetSystemClient {
  readonly listCalls: Array<{ status: IdentityStatus; offset: number }> = [];
  readonly created: CreationPayload[] = [];
  closed = false;

  constructor(
    private pages: Partial<Record<IdentityStatus, Record<number, IdentityPage>>> = {},
    private outcomes: Record<EmployeeId, CreateIdentityOutcome | Error> = {},
    private logger: Logger = silentLogger
  ) {}

  async listIdentities(status: IdentityStatus, offset: number): Promise<IdentityPage> {
    this.listCalls.push({ status, offset });
    return this.pages[status]?.[offset] ?? { items: [], nextOffset: null };
  }

  buildCreationPayload(m: MembershipRecord, d: MemberDetail): CreationPayload {
    return buildCreationPayload(m, d, this.logger);
  }

  async createIdentity(payload: CreationPayload): Promise<CreateIdentityOutcome> {
    this.created.push(payload);
    const employeeId = String(payload.customFields[0]?.value);
    const outcome: CreateIdentityOutcome | Error = this.outcomes[employeeId] ?? {
      success: true,
      response: { data: { userIds: [1] } },
    };
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome;
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Identity page with the given dedup keys
 */
export function page(keys: Array<string | null>, nextOffset: number | null): IdentityPage {
  return {
    items: keys.map((key, i) => ({ userId: String(i + 1), dedupKey: key })),
    nextOffset,
  };
}
