// Tests for Revision Context Capture

import { describe, it, expect } from 'vitest';
import {
  captureRevisionContext,
  toRevisionMetadata,
  SYSTEM_REVISION_CONTEXT,
} from './capture.js';

describe('captureRevisionContext', () => {
  it('falls back to the system identity without a context', () => {
    expect(captureRevisionContext(undefined)).toEqual({
      actorId: 'system',
      actorRole: 'SYSTEM',
      originAddress: 'unknown',
    });
    expect(captureRevisionContext(null)).toEqual(SYSTEM_REVISION_CONTEXT);
  });

  it('falls back field by field for an incomplete context', () => {
    expect(captureRevisionContext({})).toEqual({
      actorId: 'anonymous',
      actorRole: 'USER',
      originAddress: 'unknown',
    });
    expect(captureRevisionContext({ actorId: 'u-9' })).toEqual({
      actorId: 'u-9',
      actorRole: 'USER',
      originAddress: 'unknown',
    });
  });

  it('reads request headers regardless of case', () => {
    const captured = captureRevisionContext({
      'X-Actor-Id': 'u-1',
      'X-Actor-Role': 'ADMIN',
      'X-Forwarded-For': '10.0.0.1, 10.0.0.2',
    });

    expect(captured).toEqual({
      actorId: 'u-1',
      actorRole: 'ADMIN',
      originAddress: '10.0.0.1',
    });
  });

  it('accepts a Map of attributes', () => {
    const captured = captureRevisionContext(
      new Map<string, unknown>([
        ['actorId', 'u-2'],
        ['remote-address', '192.168.0.7'],
      ])
    );

    expect(captured).toEqual({
      actorId: 'u-2',
      actorRole: 'USER',
      originAddress: '192.168.0.7',
    });
  });

  it('takes the first value of multi-valued headers', () => {
    const captured = captureRevisionContext({ 'x-forwarded-for': ['172.16.0.3', '172.16.0.4'] });

    expect(captured.originAddress).toBe('172.16.0.3');
  });

  it('ignores blank and non-string values', () => {
    expect(captureRevisionContext({ actorId: '   ', role: 42 })).toEqual({
      actorId: 'anonymous',
      actorRole: 'USER',
      originAddress: 'unknown',
    });
  });

  it('never throws on an unreadable context', () => {
    const hostile = {
      get actorId(): string {
        throw new Error('boom');
      },
    };

    expect(captureRevisionContext(hostile)).toEqual(SYSTEM_REVISION_CONTEXT);
  });

  it('returns a fresh object each time', () => {
    const first = captureRevisionContext(undefined);
    first.actorId = 'changed';

    expect(captureRevisionContext(undefined).actorId).toBe('system');
  });
});

describe('toRevisionMetadata', () => {
  it('adds operation and commit time', () => {
    const metadata = toRevisionMetadata(
      { actorId: 'u-1', actorRole: 'HR', originAddress: '10.0.0.1' },
      'SET_STATUS',
      '2024-05-01T12:00:00.000Z'
    );

    expect(metadata).toEqual({
      actorId: 'u-1',
      actorRole: 'HR',
      originAddress: '10.0.0.1',
      operation: 'SET_STATUS',
      committedAt: '2024-05-01T12:00:00.000Z',
    });
  });
});
