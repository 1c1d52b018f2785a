export type StoreKind = 'memory' | 'file' | 'redis';

/**
 * Durable home of serialized session records. Stores deal in text so a
 * damaged record can still be read back for recovery.
 */
export interface SessionStore {
  readonly kind: StoreKind;
  read(changeId: string): Promise<string | null>;
  /** Resolves only once the record is durable. */
  write(changeId: string, serialized: string): Promise<void>;
  delete(changeId: string): Promise<boolean>;
  list(): Promise<string[]>;
}
