import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';

function prop(err: unknown, key: string): unknown {
  if (typeof err !== 'object' || err === null || !(key in err)) return undefined;
  return Reflect.get(err, key);
}

/** True if the error or any cause is a MongoDB duplicate key error (code 11000). */
export function isMongoDuplicateKey(err: unknown): boolean {
  let e: unknown = err;
  while (e) {
    const code = prop(e, 'code');
    if (code === 11000 || code === 11001) return true;
    e = prop(e, 'cause');
  }
  return false;
}

/** True if the error looks like MongoDB being unreachable. */
export function isMongoConnectionError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const msg = err.message.toLowerCase();
  return (
    err.name === 'MongoNetworkError' ||
    err.name === 'MongoServerSelectionError' ||
    err.name === 'MongoNotConnectedError' ||
    msg.includes('connect econnrefused') ||
    msg.includes('server selection timed out') ||
    msg.includes('topology was destroyed')
  );
}

/**
 * Global filter: HTTP exceptions pass through unchanged, MongoDB duplicate keys become 409,
 * an unreachable database 503, anything else a generic 500 (logged with its stack).
 */
@Catch()
export class MongoExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(MongoExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    if (exception instanceof HttpException) {
      const body = exception.getResponse();
      response
        .status(exception.getStatus())
        .json(typeof body === 'string' ? { statusCode: exception.getStatus(), message: body } : body);
      return;
    }

    if (isMongoDuplicateKey(exception)) {
      this.logger.warn(`duplicate key on ${request.method} ${request.url}`);
      response.status(HttpStatus.CONFLICT).json({
        statusCode: HttpStatus.CONFLICT,
        message: 'A record with this value already exists.',
        error: 'Conflict',
      });
      return;
    }

    if (isMongoConnectionError(exception)) {
      this.logger.error('MongoDB connection error', exception instanceof Error ? exception.message : '');
      response.status(HttpStatus.SERVICE_UNAVAILABLE).json({
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        message: 'Database unavailable. Check MONGODB_URI.',
        error: 'Service Unavailable',
      });
      return;
    }

    this.logger.error(
      `unhandled error on ${request.method} ${request.url}`,
      exception instanceof Error ? exception.stack : String(exception),
    );
    response.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
    });
  }
}
