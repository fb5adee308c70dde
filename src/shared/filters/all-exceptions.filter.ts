import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import type { FieldErrorDetail } from '../../email';
import { ContactNotFoundException } from '../../contact/domain/exceptions/contact-not-found.exception';
import { ContactAlreadyExistsException } from '../../contact/domain/exceptions/contact-already-exists.exception';

function isFieldErrorDetail(value: unknown): value is FieldErrorDetail {
  return (
    typeof value === 'object' &&
    value !== null &&
    'field' in value &&
    typeof value.field === 'string' &&
    'constraints' in value &&
    typeof value.constraints === 'object'
  );
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    // Let @nestjs/terminus health-check responses pass through unchanged
    if (exception instanceof HttpException) {
      const exceptionResponse = exception.getResponse();
      if (
        typeof exceptionResponse === 'object' &&
        exceptionResponse !== null &&
        'status' in exceptionResponse &&
        ('info' in exceptionResponse || 'error' in exceptionResponse) &&
        'details' in exceptionResponse
      ) {
        response.status(exception.getStatus()).json(exceptionResponse);
        return;
      }
    }

    let statusCode = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal server error';
    let details: FieldErrorDetail[] = [];

    if (exception instanceof ContactNotFoundException) {
      statusCode = HttpStatus.NOT_FOUND;
      message = exception.message;
    } else if (exception instanceof ContactAlreadyExistsException) {
      statusCode = HttpStatus.CONFLICT;
      message = exception.message;
    } else if (exception instanceof HttpException) {
      statusCode = exception.getStatus();
      const exceptionResponse = exception.getResponse();

      if (typeof exceptionResponse === 'object' && exceptionResponse !== null) {
        if (
          'message' in exceptionResponse &&
          typeof exceptionResponse.message === 'string'
        ) {
          message = exceptionResponse.message;
        } else {
          message = exception.message;
        }

        // Field details from validationExceptionFactory
        if (
          'details' in exceptionResponse &&
          Array.isArray(exceptionResponse.details)
        ) {
          details = exceptionResponse.details.filter(isFieldErrorDetail);
        }
      } else {
        message = String(exceptionResponse);
      }
    } else if (exception instanceof Error) {
      message = exception.message;
    }

    if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${request.url} - ${statusCode}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    } else {
      this.logger.warn(
        `${request.method} ${request.url} - ${statusCode}: ${message}`,
      );
    }

    response.status(statusCode).json({
      success: false,
      error: {
        statusCode,
        message,
        details,
      },
      timestamp: new Date().toISOString(),
    });
  }
}
