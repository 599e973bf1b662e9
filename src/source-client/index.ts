/**
 * Source Client Module (Costpoint)
 *
 * Responsibilities:
 * - List qualifying projects (active, chargeable, NOTES = filter value)
 * - List a project's workforce, one default labor-category row per employee
 * - Fetch one employee's profile
 *
 * Every query is a POST of a `filter` document to
 * `{base_url}?system={system}&company={company}` with HTTP Basic auth. The
 * response is a tree of row sets: `document.rows[].row { rsId, data, children }`.
 */

import { z } from 'zod';
import type { AxiosAdapter } from 'axios';
import axios from 'axios';
import type { SourceSystemConfig } from '../config/index.js';
import { createHttpSession, withTimeoutRetry, type HttpSession } from '../http/index.js';
import { defaultLogger } from '../logging/index.js';
import type { EmployeeId, GroupMap, Logger, MemberDetail, MembershipRecord } from '../types/index.js';

/**
 * Source system capability consumed by the pipeline
 */
export interface SourceSystemClient {
  listQualifyingGroups(): Promise<GroupMap>;
  listGroupMembers(groupId: string, groupName: string): Promise<MembershipRecord[]>;
  /** null when the employee cannot be found */
  getMemberDetail(employeeId: EmployeeId): Promise<MemberDetail | null>;
  close(): void;
}

export interface CostpointClientOptions {
  /** Per-call timeout for the project listing (default 300000) */
  listTimeoutMs?: number;
  /** Per-call timeout for workforce and employee queries (default 30000) */
  timeoutMs?: number;
  /** Backoff between timeout retries (default 1000) */
  retryBackoffMs?: number;
  /** Request adapter override (tests) */
  adapter?: AxiosAdapter;
}

// ============================================================================
// Wire format
// ============================================================================

export const ROW_SETS = {
  project: 'PJMBASIC_PROJ',
  projectNotes: 'PJMBASIC_PROJ_NOTES',
  workforceHeader: 'PJM_PROJEMPL_HDR',
  workforceChild: 'PJM_PROJEMPL_CHILDTO',
  laborCategories: 'PJM_PROJEMPL_LABCAT_PLCWKFRCE',
  laborCategoryRow: 'PJM_PROJEMPLLABCAT_PLCWK',
  employee: 'LDMEINFO_EMPL',
} as const;

interface Relation {
  name: string;
  relation: '=';
  value: string;
}

interface RowSetWhere {
  rsWhere: {
    rsId: string;
    conditions: Array<{ joinWithParent: 'N'; relations: Relation[] }>;
    children: RowSetWhere[];
  };
}

export interface FilterDocument {
  filter: {
    id: string;
    where: RowSetWhere[];
  };
}

export interface CostpointRow {
  rsId?: string | undefined;
  data?: Record<string, unknown> | undefined;
  children?: Array<{ row?: CostpointRow | undefined }> | undefined;
}

const RowSchema: z.ZodType<CostpointRow> = z.lazy(() =>
  z.object({
    rsId: z.string().optional(),
    data: z.record(z.unknown()).optional(),
    children: z.array(z.object({ row: RowSchema.optional() })).optional(),
  })
);

const DocumentSchema = z.object({
  document: z
    .object({
      rows: z.array(z.object({ row: RowSchema.optional() })).optional(),
    })
    .optional(),
});

function rowSet(rsId: string, relations: Relation[], children: RowSetWhere[] = []): RowSetWhere {
  return {
    rsWhere: {
      rsId,
      conditions: relations.length > 0 ? [{ joinWithParent: 'N', relations }] : [],
      children,
    },
  };
}

function equals(name: string, value: string): Relation {
  return { name, relation: '=', value };
}

export function buildProjectsFilter(): FilterDocument {
  return {
    filter: {
      id: 'pjmbasicrrexpt',
      where: [rowSet(ROW_SETS.project, [equals('ACTIVE_FL', 'Y'), equals('ALLOW_CHARGES_FL', 'Y')])],
    },
  };
}

export function buildWorkforceFilter(groupId: string): FilterDocument {
  return {
    filter: {
      id: 'pjmworkrrexp',
      where: [
        rowSet(
          ROW_SETS.workforceHeader,
          [equals('PROJ_ID', groupId)],
          [rowSet(ROW_SETS.workforceChild, []), rowSet(ROW_SETS.laborCategories, [])]
        ),
      ],
    },
  };
}

export function buildEmployeeFilter(employeeId: EmployeeId): FilterDocument {
  return {
    filter: {
      id: 'ldmeinforrexpt',
      where: [rowSet(ROW_SETS.employee, [equals('EMPL_ID', employeeId)])],
    },
  };
}

/**
 * Read a data column as a string ('' when absent)
 */
function column(row: CostpointRow, name: string): string {
  const value = row.data?.[name];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return '';
}

function childRows(row: CostpointRow, rsId: string): CostpointRow[] {
  return (row.children ?? [])
    .map((child) => child.row)
    .filter((child): child is CostpointRow => child !== undefined && child.rsId === rsId);
}

export function parseRows(body: unknown): CostpointRow[] {
  const parsed = DocumentSchema.safeParse(body);
  if (!parsed.success) {
    throw new Error(`Unexpected Costpoint response: ${parsed.error.errors[0]?.message ?? 'invalid document'}`);
  }
  return (parsed.data.document?.rows ?? [])
    .map((r) => r.row)
    .filter((row): row is CostpointRow => row !== undefined);
}

// ============================================================================
// Response mapping
// ============================================================================

/**
 * Projects whose NOTES child equals the filter value, in response order
 */
export function extractQualifyingGroups(rows: CostpointRow[], filterNotesValue: string): Map<string, string> {
  const groups = new Map<string, string>();
  for (const row of rows) {
    if (row.rsId !== ROW_SETS.project) {
      continue;
    }
    const qualifies = childRows(row, ROW_SETS.projectNotes).some(
      (notes) => column(notes, 'NOTES') === filterNotesValue
    );
    if (qualifies) {
      groups.set(column(row, 'PROJ_ID'), column(row, 'PROJ_NAME'));
    }
  }
  return groups;
}

/**
 * One record per employee carrying a DFLT_FL = Y row; employees without a
 * default row are left out.
 */
export function extractMemberships(rows: CostpointRow[], groupId: string, groupName: string): MembershipRecord[] {
  const byEmployee = new Map<string, CostpointRow[]>();

  for (const header of rows) {
    if (header.rsId !== ROW_SETS.workforceHeader) {
      continue;
    }
    for (const categories of childRows(header, ROW_SETS.laborCategories)) {
      for (const entry of childRows(categories, ROW_SETS.laborCategoryRow)) {
        const employeeId = column(entry, 'PJM_PROJEMPLLABCAT_PLCWK_EMPL_ID');
        if (!employeeId) {
          continue;
        }
        const existing = byEmployee.get(employeeId);
        if (existing) {
          existing.push(entry);
        } else {
          byEmployee.set(employeeId, [entry]);
        }
      }
    }
  }

  const records: MembershipRecord[] = [];
  for (const [employeeId, entries] of byEmployee) {
    const defaultEntry = entries.find((entry) => column(entry, 'DFLT_FL') === 'Y');
    if (defaultEntry) {
      records.push({
        employeeId,
        groupId,
        groupName,
        laborCategory: column(defaultEntry, 'PJM_PROJEMPLLABCAT_PLCWK_BILL_LAB_CAT_CD'),
      });
    }
  }
  return records;
}

export function extractMemberDetail(rows: CostpointRow[], employeeId: EmployeeId): MemberDetail | null {
  const first = rows[0];
  if (!first) {
    return null;
  }
  return {
    employeeId,
    firstName: column(first, 'FIRST_NAME'),
    lastName: column(first, 'LAST_NAME'),
    email: column(first, 'HOME_EMAIL_ID'),
    hireDate: column(first, 'ORIG_HIRE_DT'),
    birthDate: column(first, 'BIRTH_DT'),
    isActive: column(first, 'S_EMPL_STATUS_CD') === 'ACT',
  };
}

// ============================================================================
// Client
// ============================================================================

/**
 * Costpoint implementation of SourceSystemClient
 */
export class CostpointClient implements SourceSystemClient {
  private session: HttpSession;
  private config: SourceSystemConfig;
  private logger: Logger;
  private listTimeoutMs: number;
  private timeoutMs: number;
  private retryBackoffMs: number;

  constructor(config: SourceSystemConfig, logger: Logger = defaultLogger, options: CostpointClientOptions = {}) {
    this.config = config;
    this.logger = logger;
    this.listTimeoutMs = options.listTimeoutMs ?? 300000;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.retryBackoffMs = options.retryBackoffMs ?? 1000;

    const credentials = Buffer.from(`${config.username}:${config.password}`, 'utf-8').toString('base64');
    this.session = createHttpSession(
      {
        timeout: this.listTimeoutMs,
        headers: {
          Authorization: `Basic ${credentials}`,
          'Content-Type': 'application/json',
        },
      },
      options.adapter
    );
  }

  /**
   * Query URL including system and company
   */
  get fullUrl(): string {
    return `${this.config.baseUrl}?system=${this.config.system}&company=${this.config.company}`;
  }

  close(): void {
    this.session.close();
  }

  private async post(body: FilterDocument, timeoutMs: number, context: string): Promise<CostpointRow[]> {
    const response = await withTimeoutRetry(
      () => this.session.http.post<unknown>(this.fullUrl, body, { timeout: timeoutMs }),
      { backoffMs: this.retryBackoffMs },
      this.logger,
      context
    );
    return parseRows(response.data);
  }

  async listQualifyingGroups(): Promise<GroupMap> {
    this.logger.info('Fetching qualifying projects', { filterNotesValue: this.config.filterNotesValue });

    const rows = await this.post(buildProjectsFilter(), this.listTimeoutMs, 'Project listing');
    const groups = extractQualifyingGroups(rows, this.config.filterNotesValue);

    for (const [groupId, groupName] of groups) {
      this.logger.debug('Qualifying project found', { groupId, groupName });
    }
    this.logger.info('Qualifying projects fetched', { count: groups.size });
    return groups;
  }

  async listGroupMembers(groupId: string, groupName: string): Promise<MembershipRecord[]> {
    this.logger.info('Fetching workforce', { groupId });

    const rows = await this.post(buildWorkforceFilter(groupId), this.timeoutMs, `Workforce query for ${groupId}`);
    const records = extractMemberships(rows, groupId, groupName);

    this.logger.info('Workforce fetched', { groupId, employeeCount: records.length });
    return records;
  }

  async getMemberDetail(employeeId: EmployeeId): Promise<MemberDetail | null> {
    let rows: CostpointRow[];
    try {
      rows = await this.post(buildEmployeeFilter(employeeId), this.timeoutMs, `Employee query for ${employeeId}`);
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        this.logger.error('Employee fetch failed', { employeeId, status: error.response.status });
        return null;
      }
      throw error;
    }

    const detail = extractMemberDetail(rows, employeeId);
    if (!detail) {
      this.logger.warn('Employee not found in Costpoint', { employeeId });
    }
    return detail;
  }
}
