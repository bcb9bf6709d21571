import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectConnection } from '@nestjs/mongoose';
import { ClientSession, Connection } from 'mongoose';
import { AppConfig } from '../../config/configuration';

/**
 * Runs a unit of work that touches several documents.
 * With DB_TRANSACTIONS enabled the work gets a session inside connection.transaction();
 * otherwise it runs with a null session (standalone mongod has no transactions).
 */
@Injectable()
export class TransactionService {
  private readonly enabled: boolean;

  constructor(
    @InjectConnection() private readonly connection: Connection,
    config: ConfigService<AppConfig, true>,
  ) {
    this.enabled = config.get('database', { infer: true }).transactions;
  }

  async run<T>(work: (session: ClientSession | null) => Promise<T>): Promise<T> {
    if (!this.enabled) return work(null);
    return this.connection.transaction((session) => work(session));
  }
}

/** Options fragment for create/insertMany: attaches the session only when there is one. */
export function withSession(session: ClientSession | null): { session?: ClientSession } {
  return session ? { session } : {};
}
