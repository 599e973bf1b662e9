/**
 * Renderers Module
 *
 * Pure formatting of the import report. The pipeline's phase outputs are the
 * only inputs; nothing here performs I/O.
 *
 * Responsibilities:
 * - Subject line with the employee count and the project ids involved
 * - HTML body: header, summary cards, per-employee table, footer
 * - Plain text body with fixed-width columns
 */

import { deriveTeam, displayName, formatDate } from '../target-client/index.js';
import type {
  CreationResult,
  EmployeeId,
  MemberDetail,
  MembershipRecord,
  OrderedMap,
  RenderedReport,
} from '../types/index.js';

export interface ReportInput {
  memberships: OrderedMap<EmployeeId, MembershipRecord>;
  details: OrderedMap<EmployeeId, MemberDetail>;
  missing: readonly EmployeeId[];
  /** null in dry-run mode */
  results: readonly CreationResult[] | null;
  dryRun: boolean;
  generatedAt: Date;
}

/**
 * One table row; shared by both bodies
 */
export interface ReportRow {
  employeeId: EmployeeId;
  name: string;
  email: string;
  groupId: string;
  groupName: string;
  team: string;
  laborCategory: string;
  hireDate: string;
  /** null in dry-run mode */
  created: boolean | null;
}

const PLACEHOLDER = '—';

/**
 * Hire date for display; unparseable values are shown as-is
 */
function displayDate(value: string): string {
  if (!value) {
    return PLACEHOLDER;
  }
  try {
    return formatDate(value);
  } catch {
    return value;
  }
}

export function buildReportRows(input: ReportInput): ReportRow[] {
  const outcomes = new Map((input.results ?? []).map((r) => [r.employeeId, r.success]));
  const rows: ReportRow[] = [];

  for (const employeeId of input.missing) {
    const detail = input.details.get(employeeId);
    const membership = input.memberships.get(employeeId);
    if (!detail || !membership) {
      continue;
    }
    rows.push({
      employeeId,
      name: displayName(detail),
      email: detail.email || PLACEHOLDER,
      groupId: membership.groupId,
      groupName: membership.groupName,
      team: deriveTeam(membership.groupId),
      laborCategory: membership.laborCategory,
      hireDate: displayDate(detail.hireDate),
      created: input.dryRun ? null : outcomes.get(employeeId) === true,
    });
  }
  return rows;
}

/**
 * Distinct project ids of the missing employees, sorted
 */
export function reportGroupIds(input: Pick<ReportInput, 'memberships' | 'missing'>): string[] {
  const ids = new Set<string>();
  for (const employeeId of input.missing) {
    const membership = input.memberships.get(employeeId);
    if (membership) {
      ids.add(membership.groupId);
    }
  }
  return Array.from(ids).sort();
}

export function renderSubject(input: Pick<ReportInput, 'memberships' | 'missing'>): string {
  const groupIds = reportGroupIds(input).join(', ');
  return `[Connecteam] New Employees Import Complete - ${input.missing.length} employees | ${groupIds}`;
}

export function renderReport(input: ReportInput): RenderedReport {
  return {
    subject: renderSubject(input),
    textBody: renderPlainText(input),
    htmlBody: renderHtml(input),
  };
}

// ============================================================================
// HTML
// ============================================================================

const CELL = 'padding:8px 12px;border-bottom:1px solid #eee;';
const HEAD_CELL = 'padding:10px 12px;text-align:left;';

function statusBadge(created: boolean): string {
  return created
    ? '<span style="background:#27ae60;color:#fff;padding:2px 8px;border-radius:3px;font-size:11px;">&#10003; Created</span>'
    : '<span style="background:#e74c3c;color:#fff;padding:2px 8px;border-radius:3px;font-size:11px;">&#10007; Failed</span>';
}

function renderRowHtml(row: ReportRow): string {
  const statusCell =
    row.created === null ? '' : `<td style="${CELL}text-align:center;">${statusBadge(row.created)}</td>`;
  return `
        <tr>
          <td style="${CELL}font-family:monospace;">${escapeHtml(row.employeeId)}</td>
          <td style="${CELL}">${escapeHtml(row.name)}</td>
          <td style="${CELL}color:#555;">${escapeHtml(row.email)}</td>
          <td style="${CELL}font-family:monospace;">${escapeHtml(row.groupId)}</td>
          <td style="${CELL}">${escapeHtml(row.groupName)}</td>
          <td style="${CELL}">${escapeHtml(row.team)}</td>
          <td style="${CELL}font-family:monospace;">${escapeHtml(row.laborCategory)}</td>
          <td style="${CELL}">${escapeHtml(row.hireDate)}</td>
          ${statusCell}
        </tr>`;
}

function summaryCard(value: string, label: string, valueStyle: string): string {
  return `
    <div style="flex:1;background:#fff;border:1px solid #d5e8d4;border-radius:4px;padding:16px;text-align:center;">
      <div style="${valueStyle}">${value}</div>
      <div style="font-size:12px;color:#777;margin-top:4px;">${label}</div>
    </div>`;
}

export function renderHtml(input: ReportInput): string {
  const rows = buildReportRows(input);
  const groupIds = reportGroupIds(input);
  const total = input.missing.length;

  let headerColor: string;
  let headerTitle: string;
  let headerSub: string;
  if (input.dryRun) {
    headerColor = '#2980b9';
    headerTitle = '&#128269; Dry Run Preview: New Employees Pending Import';
    headerSub = 'No changes have been made to Connecteam. This is a preview only.';
  } else {
    const successCount = (input.results ?? []).filter((r) => r.success).length;
    const failCount = total - successCount;
    headerColor = '#27ae60';
    headerTitle = '&#10003; New Employees Imported to Connecteam';
    headerSub =
      `<strong>${successCount}</strong> created successfully` +
      (failCount > 0 ? ` &nbsp;|&nbsp; <strong style="color:#e74c3c;">${failCount} failed</strong>` : '');
  }

  const statusHeader = input.dryRun ? '' : `<th style="padding:10px 12px;text-align:center;">Status</th>`;
  const countStyle = `font-size:28px;font-weight:bold;color:${headerColor};`;

  return `<!DOCTYPE html>
<html>
<head><meta charset="utf-8"></head>
<body style="font-family:Arial,sans-serif;font-size:14px;color:#333;margin:0;padding:0;background:#f5f5f5;">
<div style="max-width:960px;margin:20px auto;background:#fff;border-radius:6px;overflow:hidden;box-shadow:0 2px 8px rgba(0,0,0,.1);">

  <div style="background:${headerColor};padding:24px 32px;">
    <h1 style="margin:0;color:#fff;font-size:20px;">${headerTitle}</h1>
    <p style="margin:8px 0 0;color:rgba(255,255,255,0.85);font-size:13px;">${headerSub}</p>
  </div>

  <div style="display:flex;gap:16px;padding:24px 32px;background:#f8fffe;">${summaryCard(
    String(total),
    input.dryRun ? 'Employees to Import' : 'Employees Processed',
    countStyle
  )}${summaryCard(String(groupIds.length), 'CT Projects Represented', countStyle)}${summaryCard(
    escapeHtml(groupIds.join(', ')),
    'Project IDs',
    'font-size:14px;font-weight:bold;color:#555;margin-top:6px;'
  )}
  </div>

  <div style="padding:24px 32px;">
    <table style="width:100%;border-collapse:collapse;font-size:13px;">
      <thead>
        <tr style="background:#2c3e50;color:#fff;">
          <th style="${HEAD_CELL}">Employee ID</th>
          <th style="${HEAD_CELL}">Name</th>
          <th style="${HEAD_CELL}">Email</th>
          <th style="${HEAD_CELL}">Project ID</th>
          <th style="${HEAD_CELL}">Project Name</th>
          <th style="${HEAD_CELL}">Team</th>
          <th style="${HEAD_CELL}">Labor Cat</th>
          <th style="${HEAD_CELL}">Hire Date</th>
          ${statusHeader}
        </tr>
      </thead>
      <tbody>${rows.map(renderRowHtml).join('')}
      </tbody>
    </table>
  </div>

  <div style="padding:16px 32px;background:#ecf0f1;font-size:11px;color:#7f8c8d;text-align:center;">
    Generated by New Employees CP &rarr; Connecteam &bull; ${escapeHtml(formatGeneratedAt(input.generatedAt))}
    ${input.dryRun ? '&nbsp;&bull;&nbsp;<strong>DRY RUN: no records were created</strong>' : ''}
  </div>

</div>
</body>
</html>`;
}

// ============================================================================
// Plain text
// ============================================================================

export function renderPlainText(input: ReportInput): string {
  const rows = buildReportRows(input);
  const mode = input.dryRun ? 'DRY RUN PREVIEW' : 'IMPORT COMPLETE';

  const lines: string[] = [];
  lines.push(`New Employees CP -> Connecteam: ${mode}`);
  lines.push(`Total: ${input.missing.length} employees | ${reportGroupIds(input).length} projects`);
  lines.push('');
  lines.push(
    `${'ID'.padEnd(10)} ${'Name'.padEnd(28)} ${'Project'.padEnd(14)} ${'Team'.padEnd(20)} ` +
      `${'Labor Cat'.padEnd(12)} ${'Hire Date'.padEnd(12)}` +
      (input.dryRun ? '' : ' Status')
  );
  lines.push('-'.repeat(input.dryRun ? 86 : 95));

  for (const row of rows) {
    const status = row.created === null ? '' : ` ${row.created ? 'Created' : 'FAILED'}`;
    lines.push(
      `${row.employeeId.padEnd(10)} ${row.name.padEnd(28)} ${row.groupId.padEnd(14)} ` +
        `${row.team.padEnd(20)} ${row.laborCategory.padEnd(12)} ${row.hireDate.padEnd(12)}` +
        status
    );
  }

  if (input.dryRun) {
    lines.push('');
    lines.push('No changes have been made. This is a preview only.');
  }

  return lines.join('\n');
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * e.g. "Monday, March 02, 2026 at 09:05 AM" (UTC)
 */
export function formatGeneratedAt(date: Date): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: 'UTC',
    weekday: 'long',
    year: 'numeric',
    month: 'long',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hour12: true,
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): string => parts.find((p) => p.type === type)?.value ?? '';
  return `${part('weekday')}, ${part('month')} ${part('day')}, ${part('year')} at ${part('hour')}:${part('minute')} ${part('dayPeriod')}`;
}

/**
 * Escape HTML special characters to prevent XSS
 */
export function escapeHtml(text: string): string {
  const escapeMap: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#039;',
  };
  return text.replace(/[&<>"']/g, (char) => escapeMap[char] || char);
}
