import { AccessConflictError } from '../errors/tree.js';

/**
 * Shared mutable record with dynamically checked exclusive access.
 *
 * Any number of reads may run while no write is in progress. A write holds the
 * record exclusively until its callback returns; a read or write attempted in
 * the meantime (only possible re-entrantly, from inside that callback) throws
 * `AccessConflictError` instead of observing a half-applied update.
 */
export class RecordCell<R> {
  private exclusive = false;

  constructor(
    private readonly record: R,
    private readonly owner: string
  ) {}

  read<V>(reader: (record: Readonly<R>) => V): V {
    if (this.exclusive) {
      throw new AccessConflictError(this.owner, 'shared');
    }
    return reader(this.record);
  }

  write<V>(writer: (record: R) => V): V {
    if (this.exclusive) {
      throw new AccessConflictError(this.owner, 'exclusive');
    }
    this.exclusive = true;
    try {
      return writer(this.record);
    } finally {
      this.exclusive = false;
    }
  }
}
