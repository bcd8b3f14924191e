import { getDataSourceToken } from '@nestjs/typeorm';
import { StructuredLoggerService } from '../common/logging/structured-logger.service';
import { LEDGER_POLICY, DEFAULT_LEDGER_POLICY } from '../config/ledger-policy';
import { AuditContext, AuditContextService } from '../modules/audit/audit-context.service';
import { AuditService } from '../modules/audit/audit.service';

/** EntityManager stand-in: `save` echoes its input, `create` copies it. */
export function createMockManager() {
  return {
    connection: { options: { type: 'better-sqlite3' } },
    findOne: jest.fn(),
    find: jest.fn(),
    exists: jest.fn().mockResolvedValue(false),
    create: jest.fn((_entity: unknown, values: object) => ({ ...values })),
    save: jest.fn(async (_entity: unknown, values: unknown) => values),
  };
}

export type MockManager = ReturnType<typeof createMockManager>;

export function createMockRepository() {
  return {
    findOne: jest.fn(),
    find: jest.fn().mockResolvedValue([]),
    exists: jest.fn().mockResolvedValue(true),
  };
}

export type MockRepository = ReturnType<typeof createMockRepository>;

interface MockRunOptions {
  idempotency?: { check(manager: MockManager): Promise<boolean>; onDuplicate(): void };
}

/**
 * Audit service that runs the executor straight against the mock manager,
 * honouring the idempotency guard the way the real one does.
 */
export function createMockAuditService(manager: MockManager) {
  return {
    run: jest.fn(
      async (
        _transactionId: string,
        _operation: string,
        _userId: string,
        _metadata: object,
        executor: (manager: MockManager) => Promise<unknown>,
        options?: MockRunOptions,
      ) => {
        if (options?.idempotency && (await options.idempotency.check(manager))) {
          options.idempotency.onDuplicate();
        }
        return executor(manager);
      },
    ),
    getAuditTrail: jest.fn().mockResolvedValue([]),
  };
}

export interface LedgerTestDoubles {
  manager: MockManager;
  repository: MockRepository;
  auditService: ReturnType<typeof createMockAuditService>;
  structuredLogger: { log: jest.Mock };
  context: { getContext: jest.Mock<AuditContext | undefined, []> };
}

export function createLedgerTestDoubles(service: AuditContext['service'] = 'loan'): LedgerTestDoubles {
  const manager = createMockManager();
  return {
    manager,
    repository: createMockRepository(),
    auditService: createMockAuditService(manager),
    structuredLogger: { log: jest.fn() },
    context: {
      getContext: jest.fn<AuditContext | undefined, []>(() => ({
        transactionId: 'txn_test',
        operation: 'TEST',
        service,
        userId: 'system',
      })),
    },
  };
}

/** Providers shared by every ledger service spec. */
export function ledgerProviders(doubles: LedgerTestDoubles) {
  return [
    {
      provide: getDataSourceToken(),
      useValue: {
        getRepository: jest.fn(() => doubles.repository),
        manager: doubles.manager,
      },
    },
    { provide: LEDGER_POLICY, useValue: DEFAULT_LEDGER_POLICY },
    { provide: AuditService, useValue: doubles.auditService },
    { provide: StructuredLoggerService, useValue: doubles.structuredLogger },
    { provide: AuditContextService, useValue: doubles.context },
  ];
}
