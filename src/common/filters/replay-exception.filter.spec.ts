import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ReplayExceptionFilter } from './replay-exception.filter';
import { OverAllocationError } from '../errors/replay.errors';

describe('ReplayExceptionFilter', () => {
  it('should answer an aborted run with 422 and the error code', () => {
    const json = jest.fn();
    const response = { status: jest.fn().mockReturnValue({ json }) };
    const host = new ExecutionContextHost([{ url: '/replay' }, response]);

    new ReplayExceptionFilter().catch(new OverAllocationError('900.00', '400.00', '2020-01-01'), host);

    expect(response.status).toHaveBeenCalledWith(422);
    expect(json).toHaveBeenCalledWith({
      statusCode: 422,
      message: '[2020-01-01] Cannot debit 900.00: only 400.00 available in corpus',
      error: 'OVER_ALLOCATION',
      timestamp: expect.any(String),
      path: '/replay',
    });
  });
});
