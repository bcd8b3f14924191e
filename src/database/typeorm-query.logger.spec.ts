import { StructuredLoggerService } from '../common/logging/structured-logger.service';
import { AuditContext, AuditContextService } from '../modules/audit/audit-context.service';
import { TypeOrmQueryLogger } from './typeorm-query.logger';

describe('TypeOrmQueryLogger', () => {
  const context: AuditContext = {
    transactionId: 'txn_1',
    operation: 'REPAYMENT',
    service: 'repayment',
    userId: 'teller-1',
  };
  let structuredLogger: StructuredLoggerService;
  let log: jest.SpyInstance;
  let auditContext: AuditContextService;
  let queryLogger: TypeOrmQueryLogger;

  beforeEach(() => {
    structuredLogger = new StructuredLoggerService();
    log = jest.spyOn(structuredLogger, 'log').mockImplementation(() => undefined);
    auditContext = new AuditContextService();
    queryLogger = new TypeOrmQueryLogger(structuredLogger, auditContext);
  });

  it('drops queries issued outside an audited operation', () => {
    queryLogger.logQuery('SELECT 1');

    expect(log).not.toHaveBeenCalled();
  });

  it('tags queries with the running operation', async () => {
    await auditContext.run(context, async () => {
      queryLogger.logQuery('SELECT 1', [42]);
    });

    expect(log).toHaveBeenCalledWith({
      level: 'debug',
      service: 'repayment',
      operation: 'REPAYMENT',
      transactionId: 'txn_1',
      userId: 'teller-1',
      duration: undefined,
      metadata: { query: 'SELECT 1', params: [42] },
    });
  });

  it('logs failed queries at error level', async () => {
    await auditContext.run(context, async () => {
      queryLogger.logQueryError(new Error('deadlock detected'), 'UPDATE loans', []);
    });

    expect(log).toHaveBeenCalledWith(
      expect.objectContaining({
        level: 'error',
        transactionId: 'txn_1',
        metadata: { query: 'UPDATE loans', params: [] },
        error: expect.objectContaining({ message: 'deadlock detected', code: 'Error' }),
      }),
    );
  });

  it('reports slow queries as warnings with their duration', async () => {
    await auditContext.run(context, async () => {
      queryLogger.logQuerySlow(1500, 'SELECT * FROM loan_transactions');
    });

    expect(log).toHaveBeenCalledWith(
      expect.objectContaining({ level: 'warn', duration: 1500 }),
    );
  });
});
