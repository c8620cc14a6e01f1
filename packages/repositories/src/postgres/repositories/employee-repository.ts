import { eq, and, asc, desc, count, ilike, type SQL } from 'drizzle-orm';
import type { PgColumn } from 'drizzle-orm/pg-core';
import type { DatabaseExecutor } from '../db.js';
import { employees } from '../schema/index.js';
import type {
  EmployeeRepository,
  EmployeePatch,
  EmployeeSearchCriteria,
  EmployeeSearchResult,
} from '../../interfaces/index.js';
import type { Employee, EmployeeSortKey, Id } from '@stafftrail/protocol';

type EmployeeRow = typeof employees.$inferSelect;

const SORT_COLUMNS: Record<EmployeeSortKey, PgColumn> = {
  employeeNumber: employees.employeeNumber,
  firstName: employees.firstName,
  lastName: employees.lastName,
  department: employees.department,
  hireDate: employees.hireDate,
  salary: employees.salary,
  createdAt: employees.createdAt,
};

/**
 * Escape LIKE wildcards so user text matches literally.
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export class PgEmployeeRepository implements EmployeeRepository {
  constructor(private db: DatabaseExecutor) {}

  async insert(employee: Employee): Promise<Employee> {
    const [row] = await this.db
      .insert(employees)
      .values({
        id: employee.id,
        employeeNumber: employee.employeeNumber,
        firstName: employee.firstName,
        lastName: employee.lastName,
        email: employee.email,
        phone: employee.phone,
        title: employee.title,
        department: employee.department,
        salary: String(employee.salary),
        hireDate: employee.hireDate,
        status: employee.status,
        supervisorId: employee.supervisorId,
        version: employee.version,
        createdBy: employee.createdBy,
        createdAt: new Date(employee.createdAt),
        modifiedBy: employee.modifiedBy,
        modifiedAt: new Date(employee.modifiedAt),
      })
      .returning();

    return rowToEmployee(row);
  }

  async get(id: Id): Promise<Employee | null> {
    const [row] = await this.db.select().from(employees).where(eq(employees.id, id));
    return row ? rowToEmployee(row) : null;
  }

  async getByEmployeeNumber(employeeNumber: string): Promise<Employee | null> {
    const [row] = await this.db
      .select()
      .from(employees)
      .where(eq(employees.employeeNumber, employeeNumber));
    return row ? rowToEmployee(row) : null;
  }

  async getByEmail(email: string): Promise<Employee | null> {
    const [row] = await this.db.select().from(employees).where(eq(employees.email, email));
    return row ? rowToEmployee(row) : null;
  }

  async compareAndSet(
    id: Id,
    expectedVersion: number,
    patch: EmployeePatch
  ): Promise<Employee | null> {
    const updateData: Partial<typeof employees.$inferInsert> = {
      version: expectedVersion + 1,
      modifiedBy: patch.modifiedBy,
      modifiedAt: new Date(patch.modifiedAt),
    };

    if (patch.firstName !== undefined) updateData.firstName = patch.firstName;
    if (patch.lastName !== undefined) updateData.lastName = patch.lastName;
    if (patch.email !== undefined) updateData.email = patch.email;
    if (patch.phone !== undefined) updateData.phone = patch.phone;
    if (patch.title !== undefined) updateData.title = patch.title;
    if (patch.department !== undefined) updateData.department = patch.department;
    if (patch.salary !== undefined) updateData.salary = String(patch.salary);
    if (patch.hireDate !== undefined) updateData.hireDate = patch.hireDate;
    if (patch.status !== undefined) updateData.status = patch.status;
    if (patch.supervisorId !== undefined) updateData.supervisorId = patch.supervisorId;

    const [row] = await this.db
      .update(employees)
      .set(updateData)
      .where(and(eq(employees.id, id), eq(employees.version, expectedVersion)))
      .returning();

    return row ? rowToEmployee(row) : null;
  }

  async remove(id: Id, expectedVersion: number): Promise<boolean> {
    const rows = await this.db
      .delete(employees)
      .where(and(eq(employees.id, id), eq(employees.version, expectedVersion)))
      .returning({ id: employees.id });
    return rows.length > 0;
  }

  async getSupervisorId(id: Id): Promise<Id | null | undefined> {
    const [row] = await this.db
      .select({ supervisorId: employees.supervisorId })
      .from(employees)
      .where(eq(employees.id, id));
    return row ? row.supervisorId : undefined;
  }

  async countActiveDependents(id: Id): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(employees)
      .where(and(eq(employees.supervisorId, id), eq(employees.status, 'ACTIVE')));
    return row?.value ?? 0;
  }

  async listDependents(id: Id): Promise<Employee[]> {
    const rows = await this.db
      .select()
      .from(employees)
      .where(eq(employees.supervisorId, id))
      .orderBy(asc(employees.employeeNumber));
    return rows.map(rowToEmployee);
  }

  async count(): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(employees);
    return row?.value ?? 0;
  }

  async search(criteria: EmployeeSearchCriteria): Promise<EmployeeSearchResult> {
    const conditions: SQL[] = [];

    if (criteria.firstNameContains) {
      conditions.push(
        ilike(employees.firstName, `%${escapeLikePattern(criteria.firstNameContains)}%`)
      );
    }

    if (criteria.lastNameContains) {
      conditions.push(
        ilike(employees.lastName, `%${escapeLikePattern(criteria.lastNameContains)}%`)
      );
    }

    if (criteria.departmentEquals) {
      conditions.push(eq(employees.department, criteria.departmentEquals));
    }

    if (criteria.statusEquals) {
      conditions.push(eq(employees.status, criteria.statusEquals));
    }

    const where = conditions.length > 0 ? and(...conditions) : undefined;
    const sortColumn = SORT_COLUMNS[criteria.sortBy];

    const rows = await this.db
      .select()
      .from(employees)
      .where(where)
      .orderBy(
        criteria.direction === 'desc' ? desc(sortColumn) : asc(sortColumn),
        asc(employees.id)
      )
      .limit(criteria.limit)
      .offset(criteria.offset);

    const [totals] = await this.db.select({ value: count() }).from(employees).where(where);

    return {
      items: rows.map(rowToEmployee),
      total: totals?.value ?? 0,
    };
  }
}

export function rowToEmployee(row: EmployeeRow): Employee {
  return {
    id: row.id,
    employeeNumber: row.employeeNumber,
    firstName: row.firstName,
    lastName: row.lastName,
    email: row.email,
    phone: row.phone,
    title: row.title,
    department: row.department,
    salary: Number(row.salary),
    hireDate: row.hireDate,
    status: row.status,
    supervisorId: row.supervisorId,
    version: row.version,
    createdBy: row.createdBy,
    createdAt: row.createdAt.toISOString(),
    modifiedBy: row.modifiedBy,
    modifiedAt: row.modifiedAt.toISOString(),
  };
}
