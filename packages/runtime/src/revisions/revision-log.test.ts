// Tests for the Revision Log

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { EmployeeSnapshot, RevisionMetadata } from '@stafftrail/protocol';
import {
  createInMemoryRepositoryContext,
  StorageUnreachableError,
  type RevisionRepository,
} from '@stafftrail/repositories';
import { RevisionLog } from './revision-log.js';

// --- Test Fixtures ---

function createSnapshot(overrides: Partial<EmployeeSnapshot> = {}): EmployeeSnapshot {
  return {
    employeeNumber: 'E100',
    firstName: 'Test',
    lastName: 'Person',
    email: 'test.person@example.com',
    phone: null,
    title: 'Analyst',
    department: 'Finance',
    salary: 42000,
    hireDate: '2022-02-01',
    status: 'ACTIVE',
    supervisorId: null,
    version: 0,
    createdBy: 'tester',
    createdAt: '2024-01-01T00:00:00.000Z',
    modifiedBy: 'tester',
    modifiedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}

function createMetadata(operation: RevisionMetadata['operation']): RevisionMetadata {
  return {
    actorId: 'tester',
    actorRole: 'USER',
    originAddress: 'unknown',
    operation,
    committedAt: '2024-01-01T00:00:00.000Z',
  };
}

function createFailingRepository(error: unknown): RevisionRepository {
  return {
    append: vi.fn().mockRejectedValue(error),
    list: vi.fn().mockRejectedValue(error),
    get: vi.fn().mockRejectedValue(error),
    last: vi.fn().mockRejectedValue(error),
    search: vi.fn().mockRejectedValue(error),
  };
}

describe('RevisionLog', () => {
  let log: RevisionLog;

  beforeEach(() => {
    log = new RevisionLog(createInMemoryRepositoryContext().revisions);
  });

  it('assigns strictly increasing numbers across employees', async () => {
    const first = await log.append('emp-1', 'CREATE', createSnapshot(), createMetadata('CREATE'));
    const second = await log.append('emp-2', 'CREATE', createSnapshot(), createMetadata('CREATE'));
    const third = await log.append(
      'emp-1',
      'UPDATE',
      createSnapshot({ version: 1 }),
      createMetadata('UPDATE')
    );

    expect([first, second, third]).toEqual([1, 2, 3]);
  });

  it('lists one employee history in ascending order', async () => {
    await log.append('emp-1', 'CREATE', createSnapshot(), createMetadata('CREATE'));
    await log.append('emp-2', 'CREATE', createSnapshot(), createMetadata('CREATE'));
    await log.append('emp-1', 'DELETE', createSnapshot(), createMetadata('DELETE'));

    const history = await log.listRevisions('emp-1');

    expect(history.map((r) => [r.revisionNumber, r.kind])).toEqual([
      [1, 'CREATE'],
      [3, 'DELETE'],
    ]);
  });

  it('reads single revisions', async () => {
    await log.append('emp-1', 'CREATE', createSnapshot(), createMetadata('CREATE'));
    await log.append(
      'emp-1',
      'UPDATE',
      createSnapshot({ title: 'Senior Analyst', version: 1 }),
      createMetadata('UPDATE')
    );

    expect((await log.getRevision('emp-1', 1))?.kind).toBe('CREATE');
    expect((await log.lastRevision('emp-1'))?.snapshot.title).toBe('Senior Analyst');
  });

  it('returns null or empty for absent history', async () => {
    await log.append('emp-1', 'CREATE', createSnapshot(), createMetadata('CREATE'));

    expect(await log.getRevision('emp-2', 1)).toBeNull();
    expect(await log.getRevision('emp-1', 99)).toBeNull();
    expect(await log.lastRevision('emp-2')).toBeNull();
    expect(await log.listRevisions('emp-2')).toEqual([]);
  });

  it('reports an unreachable store as StorageUnavailable', async () => {
    const failing = new RevisionLog(
      createFailingRepository(new StorageUnreachableError('connection refused'))
    );

    await expect(
      failing.append('emp-1', 'CREATE', createSnapshot(), createMetadata('CREATE'))
    ).rejects.toMatchObject({ code: 'STORAGE_UNAVAILABLE', message: 'connection refused' });
  });

  it('passes driver errors through untranslated', async () => {
    const cause = Object.assign(new Error('could not serialize access'), { code: '40001' });
    const failing = new RevisionLog(createFailingRepository(cause));

    const error = await failing
      .append('emp-1', 'CREATE', createSnapshot(), createMetadata('CREATE'))
      .catch((e: unknown) => e);

    expect(error).toBe(cause);
  });

  it('does not relabel programming errors', async () => {
    const cause = new TypeError('undefined is not a function');
    const failing = new RevisionLog(createFailingRepository(cause));

    await expect(failing.listRevisions('emp-1')).rejects.toBe(cause);
  });
});
