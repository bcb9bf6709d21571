import { ClientSession } from 'mongoose';
import { TransactionService } from '../common/database/transaction.service';

/** Chainable stand-in for a Mongoose Query that resolves to `result` on exec(). */
export interface QueryMock<T> {
  sort: jest.Mock;
  session: jest.Mock;
  exec: jest.Mock<Promise<T>, []>;
}

export function mockQuery<T>(result: T): QueryMock<T> {
  const query: QueryMock<T> = {
    sort: jest.fn(),
    session: jest.fn(),
    exec: jest.fn(() => Promise.resolve(result)),
  };
  query.sort.mockReturnValue(query);
  query.session.mockReturnValue(query);
  return query;
}

export type ModelMock = Record<
  | 'find'
  | 'findOne'
  | 'findById'
  | 'findOneAndUpdate'
  | 'findByIdAndUpdate'
  | 'exists'
  | 'countDocuments'
  | 'create'
  | 'insertMany'
  | 'updateOne'
  | 'deleteOne'
  | 'deleteMany',
  jest.Mock
>;

export function createModelMock(): ModelMock {
  return {
    find: jest.fn(() => mockQuery([])),
    findOne: jest.fn(() => mockQuery(null)),
    findById: jest.fn(() => mockQuery(null)),
    findOneAndUpdate: jest.fn(() => mockQuery(null)),
    findByIdAndUpdate: jest.fn(() => mockQuery(null)),
    exists: jest.fn(() => mockQuery(null)),
    countDocuments: jest.fn(() => mockQuery(0)),
    create: jest.fn(),
    insertMany: jest.fn(async (docs: unknown[]) => docs),
    updateOne: jest.fn(() => mockQuery({ matchedCount: 1, modifiedCount: 1 })),
    deleteOne: jest.fn(() => mockQuery({ deletedCount: 1 })),
    deleteMany: jest.fn(() => mockQuery({ deletedCount: 0 })),
  };
}

/** Runs the unit of work immediately with no session, recording each call. */
export function createTransactionsMock(): { run: jest.Mock } {
  return {
    run: jest.fn((work: (session: ClientSession | null) => Promise<unknown>) => work(null)),
  };
}

export function asTransactionService(mock: { run: jest.Mock }): TransactionService {
  return mock as unknown as TransactionService;
}
