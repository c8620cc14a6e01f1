// Tests for the Employee Query Engine

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Employee, EmployeeCandidate } from '@stafftrail/protocol';
import {
  createInMemoryRepositoryContext,
  type InMemoryRepositoryContext,
} from '@stafftrail/repositories';
import { EmployeeQueryEngine } from './query-engine.js';
import { EmployeeStore } from '../store/employee-store.js';
import { NotFoundError, ValidationError } from '../errors.js';

// --- Test Fixtures ---

const ambient = { actorId: 'hr-1', role: 'HR' };

function createCandidate(
  employeeNumber: string,
  firstName: string,
  lastName: string,
  overrides: Partial<EmployeeCandidate> = {}
): EmployeeCandidate {
  return {
    employeeNumber,
    firstName,
    lastName,
    email: `${firstName}.${lastName}@example.com`,
    title: 'Engineer',
    department: 'Engineering',
    salary: 50000,
    hireDate: '2020-01-01',
    ...overrides,
  };
}

const numbers = (employees: Employee[]) => employees.map((e) => e.employeeNumber);

describe('EmployeeQueryEngine', () => {
  let repos: InMemoryRepositoryContext;
  let store: EmployeeStore;
  let queries: EmployeeQueryEngine;

  // emp-1 Ada (top), emp-2 Alan -> Ada, emp-3 Grace -> Alan, emp-4 Katherine -> Ada
  beforeEach(async () => {
    repos = createInMemoryRepositoryContext();
    let nextId = 0;
    store = new EmployeeStore({ repos, generateId: () => `emp-${++nextId}` });
    queries = new EmployeeQueryEngine({ repos });

    await store.create(
      createCandidate('E001', 'Ada', 'Lovelace', { department: 'Research', salary: 120000 }),
      ambient
    );
    await store.create(
      createCandidate('E002', 'Alan', 'Turing', {
        department: 'Research',
        salary: 110000,
        supervisorId: 'emp-1',
      }),
      ambient
    );
    await store.create(
      createCandidate('E003', 'Grace', 'Hopper', { salary: 90000, supervisorId: 'emp-2' }),
      ambient
    );
    await store.create(
      createCandidate('E004', 'Katherine', 'Johnson', { salary: 95000, supervisorId: 'emp-1' }),
      ambient
    );
  });

  describe('search', () => {
    it('returns everyone by employee number with default paging', async () => {
      const page = await queries.search();

      expect(numbers(page.items)).toEqual(['E001', 'E002', 'E003', 'E004']);
      expect(page).toMatchObject({ total: 4, pageIndex: 0, pageSize: 20, totalPages: 1 });
    });

    it('matches name fragments case-insensitively', async () => {
      expect(numbers((await queries.search({ firstNameContains: 'AL' })).items)).toEqual([
        'E002',
      ]);
      expect(numbers((await queries.search({ lastNameContains: 'o' })).items)).toEqual([
        'E001',
        'E003',
        'E004',
      ]);
    });

    it('combines filters with AND', async () => {
      await store.setStatus('emp-3', 'INACTIVE', ambient);

      const research = await queries.search({ departmentEquals: 'Research' });
      const inactive = await queries.search({ statusEquals: 'INACTIVE' });
      const none = await queries.search({
        departmentEquals: 'Research',
        statusEquals: 'INACTIVE',
      });

      expect(numbers(research.items)).toEqual(['E001', 'E002']);
      expect(numbers(inactive.items)).toEqual(['E003']);
      expect(none).toMatchObject({ items: [], total: 0, totalPages: 0 });
    });

    it('sorts and pages', async () => {
      const page = await queries.search(
        {},
        { sortBy: 'salary', direction: 'desc', pageSize: 2, pageIndex: 1 }
      );

      expect(numbers(page.items)).toEqual(['E004', 'E003']);
      expect(page).toMatchObject({ total: 4, pageIndex: 1, pageSize: 2, totalPages: 2 });
    });

    it('breaks ties by id', async () => {
      const page = await queries.search({}, { sortBy: 'department' });

      expect(page.items.map((e) => e.id)).toEqual(['emp-3', 'emp-4', 'emp-1', 'emp-2']);
    });

    it('caps the page size', async () => {
      const capped = new EmployeeQueryEngine({ repos, config: { maxPageSize: 3 } });

      const page = await capped.search({}, { pageSize: 500 });

      expect(page.items).toHaveLength(3);
      expect(page).toMatchObject({ pageSize: 3, totalPages: 2 });
    });

    it('rejects an invalid page request', async () => {
      await expect(queries.search({}, { pageIndex: -1 })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('lookups', () => {
    it('reads by id and by employee number', async () => {
      expect((await queries.get('emp-2'))?.lastName).toBe('Turing');
      expect((await queries.getByEmployeeNumber('E003'))?.id).toBe('emp-3');
      expect(await queries.get('missing')).toBeNull();
      expect(await queries.getByEmployeeNumber('E999')).toBeNull();
    });

    it('lists direct reports by employee number', async () => {
      expect(numbers(await queries.directReports('emp-1'))).toEqual(['E002', 'E004']);
      expect(await queries.directReports('emp-3')).toEqual([]);
      await expect(queries.directReports('missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('lists the reporting chain nearest first', async () => {
      expect(numbers(await queries.reportingChain('emp-3'))).toEqual(['E002', 'E001']);
      expect(await queries.reportingChain('emp-1')).toEqual([]);
      await expect(queries.reportingChain('missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('reads inside read-only transactions', async () => {
      const spy = vi.spyOn(repos, 'transaction');

      await queries.get('emp-1');

      expect(spy).toHaveBeenCalledWith(expect.any(Function), { readOnly: true });
    });
  });

  describe('history', () => {
    it('reads one employee history', async () => {
      await store.update('emp-3', 0, { title: 'Principal' }, ambient);

      const history = await queries.listRevisions('emp-3');

      expect(history.map((r) => r.revisionNumber)).toEqual([3, 5]);
      expect((await queries.lastRevision('emp-3'))?.snapshot.title).toBe('Principal');
      expect((await queries.getRevision('emp-3', 3))?.kind).toBe('CREATE');
      expect(await queries.getRevision('emp-1', 2)).toBeNull();
      expect(await queries.lastRevision('missing')).toBeNull();
    });

    it('keeps history after delete', async () => {
      await store.setStatus('emp-3', 'TERMINATED', ambient);
      await store.delete('emp-3', ambient);

      const history = await queries.listRevisions('emp-3');

      expect(history.map((r) => r.kind)).toEqual(['CREATE', 'UPDATE', 'DELETE']);
      expect(await queries.get('emp-3')).toBeNull();
    });

    it('searches across employees by revision number', async () => {
      const page = await queries.searchRevisions(
        { kind: 'CREATE' },
        { direction: 'desc', pageSize: 2 }
      );

      expect(page.items.map((r) => r.revisionNumber)).toEqual([4, 3]);
      expect(page).toMatchObject({ total: 4, totalPages: 2 });
    });

    it('filters history by actor', async () => {
      await store.update('emp-1', 0, { title: 'Director' }, { actorId: 'admin-2' });

      const page = await queries.searchRevisions({ actorId: 'admin-2' });

      expect(page.items.map((r) => [r.employeeId, r.revisionNumber])).toEqual([['emp-1', 5]]);
    });
  });
});
