/**
 * Isolation scope for history records.
 *
 * Every history call carries a HistoryIsolation. The constructor is
 * private and every factory validates the session id and domain, so code
 * that holds an instance holds a valid scope.
 */

import { IsolationViolationError } from '../types/errors.js';
import type { HistoryIsolationMetadata } from '../types/history.js';

export const SESSION_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

const DOMAIN_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,63}$/;

export class HistoryIsolation {
  /** Keeps plain `{ sessionId, domain }` objects from type-checking as an isolation */
  private readonly validated = true;

  private constructor(
    readonly sessionId: string,
    readonly domain: string
  ) {
    Object.freeze(this);
  }

  /**
   * Validate raw fields. Accepts unknown values because sinks re-check
   * isolation passed in by untyped callers.
   *
   * @throws IsolationViolationError
   */
  static create(sessionId: unknown, domain: unknown): HistoryIsolation {
    if (typeof sessionId !== 'string' || sessionId.trim() === '') {
      throw new IsolationViolationError('MISSING_SESSION_ID', 'History calls require a non-empty session id');
    }
    if (!SESSION_ID_PATTERN.test(sessionId)) {
      throw new IsolationViolationError(
        'MALFORMED_SESSION_ID',
        `Malformed session id ${JSON.stringify(sessionId)}: use letters, digits, ".", "_" or "-" (max 128)`
      );
    }
    if (typeof domain !== 'string' || !DOMAIN_PATTERN.test(domain)) {
      throw new IsolationViolationError(
        'MISSING_DOMAIN',
        `History calls require a domain of letters, digits, ".", "_" or "-" (got ${JSON.stringify(domain ?? null)})`
      );
    }
    return new HistoryIsolation(sessionId, domain);
  }

  toMetadata(): HistoryIsolationMetadata {
    return { sessionId: this.sessionId, domain: this.domain };
  }

  toString(): string {
    return `${this.domain}/${this.sessionId}`;
  }
}

/**
 * The only way to obtain a HistoryIsolation.
 *
 * @throws IsolationViolationError on an empty or malformed session id, or
 * a missing domain.
 */
export function createIsolation(sessionId: string, domain: string): HistoryIsolation {
  return HistoryIsolation.create(sessionId, domain);
}

/**
 * Re-validate an isolation value received at a sink boundary.
 *
 * @throws IsolationViolationError
 */
export function requireIsolation(value: unknown): HistoryIsolation {
  if (typeof value !== 'object' || value === null) {
    throw new IsolationViolationError('MISSING_SESSION_ID', 'History call without isolation');
  }
  const sessionId: unknown = Reflect.get(value, 'sessionId');
  const domain: unknown = Reflect.get(value, 'domain');
  return HistoryIsolation.create(sessionId, domain);
}
