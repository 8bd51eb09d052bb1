import type { ClientSession } from 'mongodb';

/** Handed to repositories so their writes join the current unit of work. */
export interface TxContext {
  session?: ClientSession;
}

export interface UnitOfWork {
  readonly tx: TxContext;
  commit(): Promise<void>;
  abort(): Promise<void>;
  /** Frees the underlying resources. Called exactly once, after commit or abort. */
  release(): Promise<void>;
}

export type UnitOfWorkFactory = () => Promise<UnitOfWork>;

/** For stores without transactions (in-memory repositories, tests). */
export class NoopUnitOfWork implements UnitOfWork {
  readonly tx: TxContext = {};
  committed = false;
  aborted = false;
  released = false;

  async commit(): Promise<void> {
    this.committed = true;
  }

  async abort(): Promise<void> {
    this.aborted = true;
  }

  async release(): Promise<void> {
    this.released = true;
  }
}

export const noopUnitOfWork: UnitOfWorkFactory = async () => new NoopUnitOfWork();
