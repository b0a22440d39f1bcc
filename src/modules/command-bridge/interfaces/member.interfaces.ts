import type { ConversionError } from '../errors/command-bridge.errors';

/**
 * Outcome of a coercion attempt. A failed attempt still carries the
 * target type's default value.
 */
export type ConversionOutcome<T = unknown> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly value: T; readonly error: ConversionError };

export type MemberApplyStatus = 'ok' | 'not-found' | 'unsupported' | 'failed';

export type MemberApplyOutcome =
  | { readonly status: 'ok'; readonly member: string; readonly value: unknown }
  | { readonly status: 'not-found'; readonly member: string; readonly message: string }
  | { readonly status: 'unsupported'; readonly member: string; readonly message: string }
  | { readonly status: 'failed'; readonly member: string; readonly message: string };

export interface MemberApplyResult {
  /** Unique member names, in application order */
  readonly updated: string[];
  /** Member name to failure message */
  readonly failed: Record<string, string>;
  /** True when both `updated` and `failed` are non-empty */
  readonly partialSuccess: boolean;
  readonly allSucceeded: boolean;
}
