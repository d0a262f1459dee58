import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { PipelineError, PipelineErrorKind } from '../errors/pipeline.errors';

const STATUS_BY_KIND: Record<PipelineErrorKind, HttpStatus> = {
  InvalidWindow: HttpStatus.BAD_REQUEST,
  ValidationError: HttpStatus.BAD_REQUEST,
  CorruptRecord: HttpStatus.UNPROCESSABLE_ENTITY,
  ConstraintViolation: HttpStatus.UNPROCESSABLE_ENTITY,
  RunNotFound: HttpStatus.NOT_FOUND,
  RunAlreadyActive: HttpStatus.CONFLICT,
  SourceUnavailable: HttpStatus.SERVICE_UNAVAILABLE,
  TargetUnavailable: HttpStatus.SERVICE_UNAVAILABLE,
  StoreUnavailable: HttpStatus.SERVICE_UNAVAILABLE,
  ExportFailed: HttpStatus.INTERNAL_SERVER_ERROR,
};

/**
 * Maps the pipeline error taxonomy onto HTTP responses.
 * Body: { statusCode, error: <kind>, message }
 */
@Catch(PipelineError)
export class PipelineErrorFilter implements ExceptionFilter<PipelineError> {
  private readonly logger = new Logger(PipelineErrorFilter.name);

  catch(exception: PipelineError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const status = STATUS_BY_KIND[exception.kind];

    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`${exception.kind}: ${exception.message}`);
    }

    response.status(status).json({
      statusCode: status,
      error: exception.kind,
      message: exception.message,
    });
  }
}
