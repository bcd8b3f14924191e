import { Logger } from '@nestjs/common';
import { Money } from '../money/money';
import { describeError, StructuredLoggerService } from './structured-logger.service';

describe('StructuredLoggerService', () => {
  let service: StructuredLoggerService;

  beforeEach(() => {
    jest.restoreAllMocks();
    service = new StructuredLoggerService();
  });

  it('writes one JSON line with defaults filled in', () => {
    const log = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);

    service.log({
      timestamp: '2024-01-10T00:00:00.000Z',
      service: 'loan',
      operation: 'LOAN_ISSUE',
      transactionId: 'txn_1',
      metadata: { principal: Money.of('500') },
    });

    expect(log).toHaveBeenCalledWith(
      '{"timestamp":"2024-01-10T00:00:00.000Z","level":"info","service":"loan",' +
        '"operation":"LOAN_ISSUE","transactionId":"txn_1","userId":"system",' +
        '"metadata":{"principal":"500.00"}}',
    );
  });

  it('routes each level to the matching Nest logger method', () => {
    const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    const error = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    const debug = jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    const base = { service: 'overdue', operation: 'OVERDUE_BATCH', transactionId: 'txn_2' } as const;

    service.log({ ...base, level: 'warn' });
    service.log({ ...base, level: 'error' });
    service.log({ ...base, level: 'debug' });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledTimes(1);
  });

  it('marks circular metadata instead of failing', () => {
    const log = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    const loop: Record<string, unknown> = {};
    loop.self = loop;

    service.log({ service: 'member', operation: 'MEMBER_REGISTRATION', transactionId: 'txn_3', metadata: loop });

    expect(log.mock.calls[0][0]).toContain('"metadata":{"self":"[Circular]"}');
  });
});

describe('describeError', () => {
  it('keeps message and name of an Error', () => {
    expect(describeError(new TypeError('bad input'))).toEqual({
      message: 'bad input',
      stack: expect.any(String),
      code: 'TypeError',
    });
  });

  it('stringifies anything else', () => {
    expect(describeError('timeout')).toEqual({ message: 'timeout' });
  });
});
