// Revision Context Capture
//
// Reads who is acting, in what role, and from where out of the ambient
// request attributes a caller passes into each mutation. Capture never
// fails: anything missing or unreadable resolves to a fallback value.

import type { RevisionMetadata, RevisionOperation, Timestamp } from '@stafftrail/protocol';

/**
 * Request-scoped attributes supplied by the caller, e.g. authenticated
 * principal fields or inbound request headers. Keys are matched
 * case-insensitively.
 */
export type AmbientContext =
  | Readonly<Record<string, unknown>>
  | ReadonlyMap<string, unknown>;

export type CapturedRevisionContext = {
  actorId: string;
  actorRole: string;
  originAddress: string;
};

/**
 * Used when no ambient context is available at all (scripts, jobs).
 */
export const SYSTEM_REVISION_CONTEXT: CapturedRevisionContext = {
  actorId: 'system',
  actorRole: 'SYSTEM',
  originAddress: 'unknown',
};

/**
 * Used field by field when a context is present but incomplete.
 */
export const ANONYMOUS_REVISION_CONTEXT: CapturedRevisionContext = {
  actorId: 'anonymous',
  actorRole: 'USER',
  originAddress: 'unknown',
};

const ACTOR_KEYS = ['actorid', 'userid', 'username', 'x-actor-id', 'x-user-id'];
const ROLE_KEYS = ['actorrole', 'role', 'x-actor-role', 'x-user-role'];
const ORIGIN_KEYS = ['originaddress', 'x-forwarded-for', 'x-real-ip', 'remoteaddress', 'remote-address'];

function toAttributeMap(ambient: AmbientContext): Map<string, unknown> {
  const entries = ambient instanceof Map ? ambient.entries() : Object.entries(ambient);
  const attributes = new Map<string, unknown>();
  for (const [key, value] of entries) {
    if (typeof key === 'string') {
      attributes.set(key.toLowerCase(), value);
    }
  }
  return attributes;
}

function asText(value: unknown): string | undefined {
  const candidate = Array.isArray(value) ? value[0] : value;
  if (typeof candidate !== 'string') return undefined;
  const trimmed = candidate.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function firstText(attributes: Map<string, unknown>, keys: string[]): string | undefined {
  for (const key of keys) {
    const text = asText(attributes.get(key));
    if (text !== undefined) {
      return key === 'x-forwarded-for' ? asText(text.split(',')[0]) : text;
    }
  }
  return undefined;
}

/**
 * Capture actor identity, role and origin address from the ambient context.
 */
export function captureRevisionContext(
  ambient: AmbientContext | null | undefined
): CapturedRevisionContext {
  if (ambient === null || ambient === undefined || typeof ambient !== 'object') {
    return { ...SYSTEM_REVISION_CONTEXT };
  }

  let attributes: Map<string, unknown>;
  try {
    attributes = toAttributeMap(ambient);
  } catch {
    // Throwing getters or proxies: treat as no context
    return { ...SYSTEM_REVISION_CONTEXT };
  }

  return {
    actorId: firstText(attributes, ACTOR_KEYS) ?? ANONYMOUS_REVISION_CONTEXT.actorId,
    actorRole: firstText(attributes, ROLE_KEYS) ?? ANONYMOUS_REVISION_CONTEXT.actorRole,
    originAddress: firstText(attributes, ORIGIN_KEYS) ?? ANONYMOUS_REVISION_CONTEXT.originAddress,
  };
}

/**
 * Complete captured context with the operation and commit time chosen by
 * the mutation.
 */
export function toRevisionMetadata(
  captured: CapturedRevisionContext,
  operation: RevisionOperation,
  committedAt: Timestamp
): RevisionMetadata {
  return {
    actorId: captured.actorId,
    actorRole: captured.actorRole,
    originAddress: captured.originAddress,
    operation,
    committedAt,
  };
}
