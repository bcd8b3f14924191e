import { EntityManager } from 'typeorm';

export interface AuditRunOptions {
  /** Guard evaluated inside the transaction before any write. */
  idempotency?: {
    check: (manager: EntityManager) => Promise<boolean>;
    onDuplicate: () => void;
  };
}

/** Audit metadata always names the loan or member the operation concerns. */
export type AuditMetadata = { subjectId: string } & Record<string, unknown>;
