import {
  BadRequestException,
  ConflictException,
  GatewayTimeoutException,
  HttpException,
  InternalServerErrorException,
} from '@nestjs/common';
import {
  getErrorMessage,
  SessionBusyError,
  TurnTimeoutError,
  ValidationError,
} from '@risk-router/shared/utils';
import { ErrorResponseDto } from './dto/chat.dto';

/**
 * Map a failed turn to the HTTP error the chat endpoints return.
 * The body always has the `{ status: 'error', error, sessionId }` shape.
 */
export function toHttpException(error: unknown, sessionId?: string): HttpException {
  if (error instanceof HttpException) {
    return error;
  }

  const body: ErrorResponseDto = { status: 'error', error: getErrorMessage(error), sessionId };

  if (error instanceof TurnTimeoutError) {
    return new GatewayTimeoutException(body);
  }
  if (error instanceof ValidationError) {
    return new BadRequestException(body);
  }
  if (error instanceof SessionBusyError) {
    return new ConflictException(body);
  }
  return new InternalServerErrorException(body);
}
