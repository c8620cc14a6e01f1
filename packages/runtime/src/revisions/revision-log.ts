// Revision Log
//
// Append-only history of employee mutations. Appends go through whichever
// RevisionRepository the log was built on; inside a mutation that is the
// transaction's repository, so a rolled-back mutation leaves no revision.

import type {
  EmployeeSnapshot,
  Id,
  Revision,
  RevisionKind,
  RevisionMetadata,
} from '@stafftrail/protocol';
import type { RevisionRepository } from '@stafftrail/repositories';
import { translateRepositoryError } from '../errors.js';

// Repository errors become store errors. Anything else, a driver error
// included, goes up unchanged to the transaction boundary that translates it.
async function guard<T>(run: () => Promise<T>): Promise<T> {
  try {
    return await run();
  } catch (error) {
    throw translateRepositoryError(error);
  }
}

export class RevisionLog {
  private revisions: RevisionRepository;

  constructor(revisions: RevisionRepository) {
    this.revisions = revisions;
  }

  /**
   * Record one committed mutation.
   *
   * @returns The assigned revision number
   * @throws StorageUnavailableError if the store cannot be reached
   */
  async append(
    employeeId: Id,
    kind: RevisionKind,
    snapshot: EmployeeSnapshot,
    metadata: RevisionMetadata
  ): Promise<number> {
    const revision = await guard(() =>
      this.revisions.append({ employeeId, kind, snapshot, metadata })
    );
    return revision.revisionNumber;
  }

  /**
   * Full history of one employee, oldest first. Empty for unknown ids.
   */
  async listRevisions(employeeId: Id): Promise<Revision[]> {
    return guard(() => this.revisions.list(employeeId));
  }

  async getRevision(employeeId: Id, revisionNumber: number): Promise<Revision | null> {
    return guard(() => this.revisions.get(employeeId, revisionNumber));
  }

  async lastRevision(employeeId: Id): Promise<Revision | null> {
    return guard(() => this.revisions.last(employeeId));
  }
}
