import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { ReplayError, ReplayErrorCode } from '../errors/replay.errors';

export interface ReplayErrorResponse {
  statusCode: number;
  message: string;
  error: ReplayErrorCode;
  timestamp: string;
  path: string;
}

// A run that aborted is a well-formed request the ledger could not satisfy: 422.
@Catch(ReplayError)
export class ReplayExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ReplayExceptionFilter.name);

  catch(exception: ReplayError, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    this.logger.error(`${exception.code}: ${exception.message}`);

    const body: ReplayErrorResponse = {
      statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
      message: exception.message,
      error: exception.code,
      timestamp: new Date().toISOString(),
      path: request.url,
    };
    response.status(body.statusCode).json(body);
  }
}
