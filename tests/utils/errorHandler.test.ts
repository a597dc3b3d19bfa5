import logger from '../../src/utils/logger';
import { handleError } from '../../src/utils/errorHandler';
import { ComponentIndexError, DegenerateVectorError } from '../../src/utils/errors';

jest.mock('../../src/utils/logger', () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

describe('handleError', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should log vector errors as warnings with their details', () => {
    expect(handleError(new DegenerateVectorError('normalize'))).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith('Vector Error: Cannot normalize a zero-length vector', {
      name: 'DegenerateVectorError',
      details: { operation: 'normalize' },
    });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('should keep the index and dimension of a bad component access', () => {
    handleError(new ComponentIndexError(4, 2));
    expect(logger.warn).toHaveBeenCalledWith('Vector Error: Component index 4 is out of range for a 2D vector', {
      name: 'ComponentIndexError',
      details: { index: 4, dimension: 2 },
    });
  });

  it('should log unexpected errors with their stack', () => {
    expect(handleError(new Error('boom'))).toBe(1);
    expect(logger.error).toHaveBeenCalledWith('Unexpected Error: boom', { stack: expect.any(String) });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should log thrown values that are not errors', () => {
    expect(handleError('oops')).toBe(1);
    expect(logger.error).toHaveBeenCalledWith('Unexpected Error', { error: 'oops' });
  });
});
