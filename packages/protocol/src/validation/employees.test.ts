// Tests for employee input validation

import { describe, it, expect } from 'vitest';
import {
  parseEmployeeCandidate,
  parseEmployeeChanges,
  parseEmployeeSearchFilters,
} from './employees.js';

function validCandidate(): Record<string, unknown> {
  return {
    employeeNumber: 'E001',
    firstName: 'Ada',
    lastName: 'Lovelace',
    email: 'ada@example.com',
    title: 'Engineer',
    department: 'R&D',
    salary: 1000,
    hireDate: '2024-02-29',
  };
}

describe('parseEmployeeCandidate', () => {
  it('accepts a complete candidate', () => {
    const result = parseEmployeeCandidate(validCandidate());

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.value.employeeNumber).toBe('E001');
      expect(result.value.phone).toBeUndefined();
    }
  });

  it('trims text and lower-cases the email', () => {
    const result = parseEmployeeCandidate({
      ...validCandidate(),
      firstName: '  Ada ',
      email: ' Ada@Example.COM ',
    });

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.value.firstName).toBe('Ada');
      expect(result.value.email).toBe('ada@example.com');
    }
  });

  it('rejects a missing business key', () => {
    const { employeeNumber: _omitted, ...rest } = validCandidate();
    const result = parseEmployeeCandidate(rest);

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.issues.map((i) => i.path)).toEqual(['employeeNumber']);
    }
  });

  it('rejects impossible calendar dates', () => {
    const result = parseEmployeeCandidate({ ...validCandidate(), hireDate: '2023-02-29' });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.issues).toEqual([
        { path: 'hireDate', message: 'Expected a calendar date (YYYY-MM-DD)' },
      ]);
    }
  });

  it('rejects negative salary', () => {
    const result = parseEmployeeCandidate({ ...validCandidate(), salary: -1 });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.issues[0].path).toBe('salary');
    }
  });

  it('rejects unknown fields such as status', () => {
    const result = parseEmployeeCandidate({ ...validCandidate(), status: 'INACTIVE' });

    expect(result.valid).toBe(false);
  });
});

describe('parseEmployeeChanges', () => {
  it('accepts a partial change set', () => {
    const result = parseEmployeeChanges({ title: 'Lead Engineer', supervisorId: null });

    expect(result).toEqual({
      valid: true,
      value: { title: 'Lead Engineer', supervisorId: null },
    });
  });

  it('rejects changes to the business key', () => {
    const result = parseEmployeeChanges({ employeeNumber: 'E999' });

    expect(result.valid).toBe(false);
  });

  it('rejects status and version changes', () => {
    expect(parseEmployeeChanges({ status: 'INACTIVE' }).valid).toBe(false);
    expect(parseEmployeeChanges({ version: 4 }).valid).toBe(false);
  });
});

describe('parseEmployeeSearchFilters', () => {
  it('treats missing input as no filters', () => {
    expect(parseEmployeeSearchFilters(undefined)).toEqual({ valid: true, value: {} });
  });

  it('drops blank text filters', () => {
    const result = parseEmployeeSearchFilters({ firstNameContains: '   ', statusEquals: 'ACTIVE' });

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.value.firstNameContains).toBeUndefined();
      expect(result.value.statusEquals).toBe('ACTIVE');
    }
  });

  it('rejects unknown statuses', () => {
    expect(parseEmployeeSearchFilters({ statusEquals: 'RETIRED' }).valid).toBe(false);
  });

  it('rejects filters outside the enumerated set', () => {
    expect(parseEmployeeSearchFilters({ byEmail: 'x' }).valid).toBe(false);
  });
});
