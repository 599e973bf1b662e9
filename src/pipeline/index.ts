/**
 * Pipeline Module
 *
 * The six-phase reconciliation between Costpoint and Connecteam:
 *
 *   1. qualifying projects           (source)
 *   2. workforce per project, dedup  (source)
 *   3. employee details, active only (source)
 *   4. existing Connecteam ids       (target)
 *   5. missing = details - existing
 *   6. create missing users, or build a dry-run preview (target)
 *
 * then render and deliver the report.
 *
 * Execution is strictly sequential. Each phase records a snapshot of its
 * output and reports progress through the run's EventSink.
 */

import { deliverReport, type EmailSender } from '../delivery/index.js';
import type { EventSink } from '../events/index.js';
import { noPacing, type Pacer } from '../http/index.js';
import { defaultLogger } from '../logging/index.js';
import { renderReport } from '../renderers/index.js';
import type { SourceSystemClient } from '../source-client/index.js';
import type { SnapshotRecorder } from '../storage/index.js';
import { displayName, type TargetSystemClient } from '../target-client/index.js';
import type {
  CreationResult,
  EmployeeId,
  GroupMap,
  IdentityStatus,
  Logger,
  MemberDetail,
  MembershipRecord,
  OrderedMap,
  PreviewEntry,
  RunId,
} from '../types/index.js';

export const IDENTITY_STATUSES: readonly IdentityStatus[] = ['active', 'archived'];

export interface PhasePacing {
  /** Between workforce queries (phase 2) */
  group: Pacer;
  /** Between employee lookups (phase 3) */
  member: Pacer;
  /** Between creation requests (phase 6) */
  creation: Pacer;
}

export interface ReportDeliveryConfig {
  sender: EmailSender;
  from: string;
  recipients: string[];
}

/**
 * Everything one run needs; built per run by the sync entry point
 */
export interface PipelineContext {
  source: SourceSystemClient;
  target: TargetSystemClient;
  recorder: SnapshotRecorder;
  events: EventSink;
  report: ReportDeliveryConfig;
  pacing?: Partial<PhasePacing>;
  /** Clock for the report footer */
  now?: () => Date;
  logger?: Logger;
}

export interface CreationPhaseOutput {
  /** Empty in dry-run mode */
  results: CreationResult[];
  /** Empty in live mode */
  preview: PreviewEntry[];
}

/**
 * Run id for a start time: YYYYMMDD_HHMMSS (UTC)
 */
export function formatRunId(date: Date): RunId {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

function pacerFor(ctx: PipelineContext, key: keyof PhasePacing): Pacer {
  return ctx.pacing?.[key] ?? noPacing;
}

/**
 * Visit items in order, pausing between consecutive items
 */
async function forEachPaced<T>(
  items: Iterable<T>,
  pacer: Pacer,
  visit: (item: T, index: number) => Promise<void>
): Promise<void> {
  let index = 0;
  for (const item of items) {
    if (index > 0) {
      await pacer.pause();
    }
    await visit(item, index);
    index++;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Phase 1: qualifying projects
// ============================================================================

export async function discoverGroups(ctx: PipelineContext): Promise<GroupMap> {
  await ctx.events.info('phase_1_starting', 'phase_1_starting');

  const groups = await ctx.source.listQualifyingGroups();
  await ctx.recorder.recordJson(
    'qualifying_groups',
    Array.from(groups, ([groupId, groupName]) => ({ groupId, groupName }))
  );

  await ctx.events.info('phase_1_complete', `phase_1_complete count=${groups.size}`);
  return groups;
}

// ============================================================================
// Phase 2: workforce per project
// ============================================================================

/**
 * Merge every group's workforce into one mapping keyed by employee id.
 * An employee listed under several groups keeps the record of the first
 * group visited. A failing group query aborts the run.
 */
export async function enumerateMemberships(
  ctx: PipelineContext,
  groups: GroupMap
): Promise<Map<EmployeeId, MembershipRecord>> {
  await ctx.events.info('phase_2_starting', 'phase_2_starting');

  const memberships = new Map<EmployeeId, MembershipRecord>();
  await forEachPaced(groups, pacerFor(ctx, 'group'), async ([groupId, groupName]) => {
    const records = await ctx.source.listGroupMembers(groupId, groupName);
    for (const record of records) {
      if (!memberships.has(record.employeeId)) {
        memberships.set(record.employeeId, record);
      }
    }
  });

  await ctx.recorder.recordJson('memberships', Array.from(memberships.values()));
  await ctx.events.info('phase_2_complete', `phase_2_complete unique_employees=${memberships.size}`);
  return memberships;
}

// ============================================================================
// Phase 3: employee details
// ============================================================================

/**
 * Look up each employee; unknown and inactive employees are dropped
 */
export async function resolveMemberDetails(
  ctx: PipelineContext,
  memberships: OrderedMap<EmployeeId, MembershipRecord>
): Promise<Map<EmployeeId, MemberDetail>> {
  await ctx.events.info('phase_3_starting', 'phase_3_starting');

  const details = new Map<EmployeeId, MemberDetail>();
  const total = memberships.size;

  await forEachPaced(memberships.keys(), pacerFor(ctx, 'member'), async (employeeId, index) => {
    await ctx.events.info(
      'fetching_employee',
      `fetching_employee empl_id=${employeeId} progress=${index + 1}/${total}`
    );

    const detail = await ctx.source.getMemberDetail(employeeId);
    if (detail === null) {
      await ctx.events.error('employee_not_found', `employee_not_found empl_id=${employeeId}`);
    } else if (!detail.isActive) {
      await ctx.events.info(
        'skipping_inactive_employee',
        `skipping_inactive_employee empl_id=${employeeId} name=${displayName(detail)}`
      );
    } else {
      details.set(employeeId, detail);
    }
  });

  await ctx.recorder.recordJson('member_details', Array.from(details.values()));
  await ctx.events.info('phase_3_complete', `phase_3_complete active_employees=${details.size}`);
  return details;
}

// ============================================================================
// Phase 4: existing target identities
// ============================================================================

/**
 * Page through one status. Stops on an empty page, or when the next offset
 * is missing or does not move forward.
 */
export async function collectIdentityKeys(
  target: TargetSystemClient,
  status: IdentityStatus,
  logger: Logger = defaultLogger
): Promise<Set<EmployeeId>> {
  const keys = new Set<EmployeeId>();
  let offset = 0;

  for (;;) {
    const page = await target.listIdentities(status, offset);
    if (page.items.length === 0) {
      break;
    }

    for (const item of page.items) {
      if (item.dedupKey) {
        keys.add(item.dedupKey);
      }
    }

    if (page.nextOffset === null || page.nextOffset <= offset) {
      break;
    }
    offset = page.nextOffset;
  }

  logger.info('Connecteam users collected', { status, count: keys.size });
  return keys;
}

export async function collectExistingIdentities(ctx: PipelineContext): Promise<Set<EmployeeId>> {
  await ctx.events.info('phase_4_starting', 'phase_4_starting');

  const existing = new Set<EmployeeId>();
  for (const status of IDENTITY_STATUSES) {
    const keys = await collectIdentityKeys(ctx.target, status, ctx.logger);
    for (const key of keys) {
      existing.add(key);
    }
  }

  await ctx.recorder.recordJson('existing_identities', Array.from(existing).sort());
  await ctx.events.info('phase_4_complete', `phase_4_complete existing_count=${existing.size}`);
  return existing;
}

// ============================================================================
// Phase 5: missing employees
// ============================================================================

/**
 * Employee ids with details but no target identity, in detail order
 */
export function computeMissing(
  details: OrderedMap<EmployeeId, MemberDetail>,
  existing: ReadonlySet<EmployeeId>
): EmployeeId[] {
  return Array.from(details.keys()).filter((employeeId) => !existing.has(employeeId));
}

export async function findMissing(
  ctx: PipelineContext,
  details: OrderedMap<EmployeeId, MemberDetail>,
  existing: ReadonlySet<EmployeeId>
): Promise<EmployeeId[]> {
  await ctx.events.info('phase_5_starting', 'phase_5_starting');

  const missing = computeMissing(details, existing);
  await ctx.recorder.recordJson('missing_members', missing);

  await ctx.events.info(
    'phase_5_complete',
    `phase_5_complete missing_count=${missing.length} empl_ids=${missing.join(',')}`
  );
  return missing;
}

// ============================================================================
// Phase 6: creation or dry-run preview
// ============================================================================

function lookupRecords(
  employeeId: EmployeeId,
  memberships: OrderedMap<EmployeeId, MembershipRecord>,
  details: OrderedMap<EmployeeId, MemberDetail>
): { membership: MembershipRecord; detail: MemberDetail } {
  const membership = memberships.get(employeeId);
  const detail = details.get(employeeId);
  if (!membership || !detail) {
    throw new Error(`No workforce or detail record for employee ${employeeId}`);
  }
  return { membership, detail };
}

/**
 * One creation attempt. Anything that goes wrong for this employee becomes
 * a failed result so the remaining employees are still attempted.
 */
async function createOne(
  ctx: PipelineContext,
  membership: MembershipRecord,
  detail: MemberDetail
): Promise<CreationResult> {
  const employee = { employeeId: detail.employeeId, displayName: displayName(detail) };
  try {
    const payload = ctx.target.buildCreationPayload(membership, detail);
    const outcome = await ctx.target.createIdentity(payload);
    return { ...outcome, ...employee };
  } catch (error) {
    (ctx.logger ?? defaultLogger).error('User creation aborted', {
      employeeId: detail.employeeId,
      error: errorMessage(error),
    });
    return { success: false, error: errorMessage(error), statusCode: null, detail: null, ...employee };
  }
}

export async function createMissing(
  ctx: PipelineContext,
  memberships: OrderedMap<EmployeeId, MembershipRecord>,
  details: OrderedMap<EmployeeId, MemberDetail>,
  missing: readonly EmployeeId[],
  dryRun: boolean
): Promise<CreationPhaseOutput> {
  await ctx.events.info('phase_6_starting', `phase_6_starting dry_run=${dryRun} count=${missing.length}`);

  if (dryRun) {
    const preview: PreviewEntry[] = missing.map((employeeId) => {
      const { membership, detail } = lookupRecords(employeeId, memberships, details);
      return {
        employeeId,
        displayName: displayName(detail),
        payload: ctx.target.buildCreationPayload(membership, detail),
      };
    });
    await ctx.recorder.recordJson('dry_run_preview', preview);
    await ctx.events.info('phase_6_dry_run_complete', `phase_6_dry_run_complete would_create=${preview.length}`);
    return { results: [], preview };
  }

  const results: CreationResult[] = [];
  await forEachPaced(missing, pacerFor(ctx, 'creation'), async (employeeId, index) => {
    await ctx.events.info(
      'creating_user',
      `creating_user empl_id=${employeeId} progress=${index + 1}/${missing.length}`
    );
    const { membership, detail } = lookupRecords(employeeId, memberships, details);
    results.push(await createOne(ctx, membership, detail));
  });

  const successCount = results.filter((r) => r.success).length;
  await ctx.recorder.recordJson('creation_results', results);
  await ctx.events.info(
    'phase_6_complete',
    `phase_6_complete added=${successCount} failed=${results.length - successCount} total=${results.length}`
  );
  return { results, preview: [] };
}

// ============================================================================
// Orchestration
// ============================================================================

/**
 * Run all phases and deliver the report.
 *
 * @returns 0 on success or a defined early exit, 1 on failure
 */
export async function runPipeline(ctx: PipelineContext, dryRun: boolean): Promise<number> {
  const runId = ctx.recorder.runId;
  const now = ctx.now ?? (() => new Date());

  try {
    const groups = await discoverGroups(ctx);
    if (groups.size === 0) {
      await ctx.events.error('no_ct_projects_found', 'no_ct_projects_found');
      return 1;
    }

    const memberships = await enumerateMemberships(ctx, groups);
    if (memberships.size === 0) {
      await ctx.events.error('no_workforce_records', 'no_workforce_records');
      return 1;
    }

    const details = await resolveMemberDetails(ctx, memberships);
    if (details.size === 0) {
      await ctx.events.info('no_active_employees_in_workforce', 'no_active_employees_in_workforce');
      return 0;
    }

    const existing = await collectExistingIdentities(ctx);

    const missing = await findMissing(ctx, details, existing);
    if (missing.length === 0) {
      await ctx.events.info('all_ct_employees_already_in_connecteam', 'all_ct_employees_already_in_connecteam');
      return 0;
    }

    const { results } = await createMissing(ctx, memberships, details, missing, dryRun);

    const report = renderReport({
      memberships,
      details,
      missing,
      results: dryRun ? null : results,
      dryRun,
      generatedAt: now(),
    });
    await deliverReport(report, {
      dryRun,
      recorder: ctx.recorder,
      sender: ctx.report.sender,
      from: ctx.report.from,
      recipients: ctx.report.recipients,
      logger: ctx.logger,
    });

    if (!dryRun) {
      const failed = results.filter((r) => !r.success).length;
      if (failed > 0) {
        await ctx.events.error(
          'pipeline_complete_with_failures',
          `pipeline_complete_with_failures run_id=${runId} failed=${failed}`
        );
        return 1;
      }
    }

    await ctx.events.success('pipeline_complete', `pipeline_complete run_id=${runId} dry_run=${dryRun}`);
    return 0;
  } catch (error) {
    try {
      await ctx.events.error('pipeline_fatal_error', `pipeline_fatal_error error=${errorMessage(error)} run_id=${runId}`);
    } catch (reportError) {
      (ctx.logger ?? defaultLogger).error('Failed to report fatal pipeline error', {
        runId,
        error: errorMessage(error),
        reportError: errorMessage(reportError),
      });
    }
    return 1;
  }
}
