/**
 * Core type definitions for the new employee sync
 *
 * This module exports all shared types used across the pipeline, the two
 * system clients and the report renderers.
 */

/**
 * Identifier of one sync run
 * Format: YYYYMMDD_HHMMSS (UTC)
 */
export type RunId = string;

/**
 * Employee identifier shared by both systems (the dedup key)
 */
export type EmployeeId = string;

/**
 * Insertion-ordered mapping.
 *
 * Several invariants (first-seen-wins membership dedup, missing list order)
 * depend on iteration order. `Map` iterates in insertion order by contract,
 * and re-setting an existing key keeps its original position.
 */
export type OrderedMap<K, V> = ReadonlyMap<K, V>;

// ============================================================================
// Source system records
// ============================================================================

/**
 * Qualifying group: group id -> group name, in source traversal order
 */
export type GroupMap = OrderedMap<string, string>;

/**
 * One employee's default assignment within a group
 */
export interface MembershipRecord {
  employeeId: EmployeeId;
  groupId: string;
  groupName: string;
  laborCategory: string;
}

/**
 * Source profile data needed to create a target identity
 */
export interface MemberDetail {
  employeeId: EmployeeId;
  firstName: string;
  lastName: string;
  /** May be empty */
  email: string;
  /** ISO date-time, e.g. "2011-07-11T00:00:00"; may be empty */
  hireDate: string;
  /** ISO date-time; may be empty */
  birthDate: string;
  isActive: boolean;
}

// ============================================================================
// Target system records
// ============================================================================

export type IdentityStatus = 'active' | 'archived';

/**
 * One listed identity. `dedupKey` is null when the custom field is missing or empty.
 */
export interface TargetIdentity {
  userId: string | null;
  dedupKey: string | null;
}

export interface IdentityPage {
  items: TargetIdentity[];
  /** Offset of the next page, or null when the listing gave none */
  nextOffset: number | null;
}

export interface CustomFieldValue {
  customFieldId: number;
  value: string;
}

/**
 * Creation request body for one employee (sent as a one-element array)
 */
export interface CreationPayload {
  userType: 'user';
  isArchived: false;
  firstName: string;
  lastName: string;
  customFields: CustomFieldValue[];
  email?: string;
}

/**
 * Outcome of a single creation call, before it is tied to an employee
 */
export type CreateIdentityOutcome =
  | { success: true; response: unknown }
  | { success: false; error: string; statusCode: number | null; detail: unknown };

/**
 * Per-employee outcome of a live creation
 */
export type CreationResult = CreateIdentityOutcome & {
  employeeId: EmployeeId;
  displayName: string;
};

/**
 * Dry-run entry: the exact creation body that would have been sent
 */
export interface PreviewEntry {
  employeeId: EmployeeId;
  displayName: string;
  payload: CreationPayload;
}

// ============================================================================
// Rendered report
// ============================================================================

export interface RenderedReport {
  subject: string;
  textBody: string;
  htmlBody: string;
}

// ============================================================================
// Observability
// ============================================================================

/**
 * Logger interface shared by clients, stores and senders
 */
export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Result wrapper for validation steps
 */
export interface ModuleResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  metadata: {
    module: string;
    timestamp: string;
    duration?: number;
  };
}
