// Hierarchy Validator
//
// Graph checks over the supervision forest. Stateless: every answer comes
// from the view passed in, which inside a mutation is the transaction's own
// repository so the check and the write see the same snapshot.

import type { Id } from '@stafftrail/protocol';
import { IntegrityViolationError } from '../errors.js';

/**
 * The slice of the employee repository the validator reads.
 */
export interface HierarchyView {
  /**
   * @returns The supervisor reference, or undefined if the employee does not exist
   */
  getSupervisorId(id: Id): Promise<Id | null | undefined>;
  countActiveDependents(id: Id): Promise<number>;
  count(): Promise<number>;
}

type Climb = {
  /** Employees passed through, starting with the starting employee */
  chain: Id[];
  /** Whether the walk met `stopAt` */
  reached: boolean;
};

/**
 * Walk up the supervision chain from `startId`, stopping at `stopAt`, at the
 * top of the chain, or when the start does not exist.
 *
 * The walk visits at most one more employee than the store holds.
 * Revisiting an employee, exceeding that bound, or following a reference
 * to a missing employee means the stored graph is corrupt.
 */
async function climb(view: HierarchyView, startId: Id, stopAt?: Id): Promise<Climb> {
  const bound = await view.count();
  const chain: Id[] = [];
  const seen = new Set<Id>();
  let current: Id | null = startId;

  while (current !== null) {
    if (current === stopAt) {
      return { chain, reached: true };
    }

    if (seen.has(current) || seen.size > bound) {
      throw new IntegrityViolationError(`Supervision chain above ${startId} does not terminate`, {
        startId,
        repeatedId: current,
        steps: seen.size,
        bound,
      });
    }
    seen.add(current);
    chain.push(current);

    const next: Id | null | undefined = await view.getSupervisorId(current);
    if (next === undefined) {
      if (current === startId) break;
      throw new IntegrityViolationError(`Dangling supervisor reference to ${current}`, {
        startId,
        missingId: current,
      });
    }
    current = next;
  }

  return { chain, reached: false };
}

/**
 * Would making `proposedSupervisorId` the supervisor of `employeeId` close
 * a loop? True when `employeeId` appears anywhere in the proposed
 * supervisor's chain, including the proposed supervisor itself.
 *
 * @throws IntegrityViolationError if the existing graph is corrupt
 */
export async function wouldCreateCycle(
  view: HierarchyView,
  employeeId: Id,
  proposedSupervisorId: Id
): Promise<boolean> {
  const { reached } = await climb(view, proposedSupervisorId, employeeId);
  return reached;
}

/**
 * Number of ACTIVE employees whose supervisor is `employeeId`.
 */
export async function activeDependentCount(view: HierarchyView, employeeId: Id): Promise<number> {
  return view.countActiveDependents(employeeId);
}

/**
 * Supervisors above `employeeId`, nearest first. Empty for the top of a
 * chain or an unknown employee.
 *
 * @throws IntegrityViolationError if the existing graph is corrupt
 */
export async function supervisionChain(view: HierarchyView, employeeId: Id): Promise<Id[]> {
  const { chain } = await climb(view, employeeId);
  return chain.slice(1);
}
