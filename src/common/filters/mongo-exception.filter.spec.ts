import { ArgumentsHost, Logger, NotFoundException } from '@nestjs/common';
import { isMongoDuplicateKey, MongoExceptionFilter } from './mongo-exception.filter';

function createHost() {
  const response = { status: jest.fn(), json: jest.fn() };
  response.status.mockReturnValue(response);
  const request = { method: 'POST', url: '/api/auth/register' };
  const host = {
    switchToHttp: () => ({ getResponse: () => response, getRequest: () => request }),
  };
  return { host: host as unknown as ArgumentsHost, response };
}

describe('MongoExceptionFilter', () => {
  const filter = new MongoExceptionFilter();

  beforeAll(() => {
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterAll(() => {
    jest.restoreAllMocks();
  });

  it('passes HTTP exceptions through', () => {
    const { host, response } = createHost();

    filter.catch(new NotFoundException('Chat not found'), host);

    expect(response.status).toHaveBeenCalledWith(404);
    expect(response.json).toHaveBeenCalledWith({
      statusCode: 404,
      message: 'Chat not found',
      error: 'Not Found',
    });
  });

  it('maps duplicate keys to 409', () => {
    const { host, response } = createHost();

    filter.catch(Object.assign(new Error('E11000 duplicate key'), { code: 11000 }), host);

    expect(response.status).toHaveBeenCalledWith(409);
  });

  it('maps an unreachable database to 503', () => {
    const { host, response } = createHost();
    const err = new Error('connect ECONNREFUSED 127.0.0.1:27017');
    err.name = 'MongoServerSelectionError';

    filter.catch(err, host);

    expect(response.status).toHaveBeenCalledWith(503);
  });

  it('hides the details of anything else', () => {
    const { host, response } = createHost();

    filter.catch(new TypeError('secret internals'), host);

    expect(response.status).toHaveBeenCalledWith(500);
    expect(response.json).toHaveBeenCalledWith({
      statusCode: 500,
      message: 'Internal server error',
    });
  });
});

describe('isMongoDuplicateKey', () => {
  it('looks through error causes', () => {
    const inner = Object.assign(new Error('dup'), { code: 11000 });
    const outer = Object.assign(new Error('write failed'), { cause: inner });

    expect(isMongoDuplicateKey(outer)).toBe(true);
    expect(isMongoDuplicateKey(new Error('other'))).toBe(false);
  });
});
