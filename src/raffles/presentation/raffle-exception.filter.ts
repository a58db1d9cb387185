import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus } from '@nestjs/common';
import { Response } from 'express';
import { RaffleError, RaffleErrorCode } from '../domain/raffle.errors';

const STATUS_BY_CODE: Record<RaffleErrorCode, HttpStatus> = {
  [RaffleErrorCode.RAFFLE_CLOSED]: HttpStatus.CONFLICT,
  [RaffleErrorCode.RAFFLE_NOT_YET_FINISHED]: HttpStatus.CONFLICT,
  [RaffleErrorCode.INVALID_TIMESTAMP]: HttpStatus.BAD_REQUEST,
  [RaffleErrorCode.NOT_OWNER]: HttpStatus.FORBIDDEN,
  [RaffleErrorCode.OWNER_EXCLUDED]: HttpStatus.FORBIDDEN,
  [RaffleErrorCode.INSUFFICIENT_FUNDS]: HttpStatus.BAD_REQUEST,
  [RaffleErrorCode.INSUFFICIENT_ALLOWANCE]: HttpStatus.BAD_REQUEST,
  [RaffleErrorCode.INVALID_PURCHASE]: HttpStatus.BAD_REQUEST,
  [RaffleErrorCode.INVALID_ADDRESS]: HttpStatus.BAD_REQUEST,
  [RaffleErrorCode.ALREADY_CLAIMED]: HttpStatus.CONFLICT,
  [RaffleErrorCode.ALREADY_SETTLED]: HttpStatus.CONFLICT,
  [RaffleErrorCode.EMPTY_POT]: HttpStatus.CONFLICT,
  [RaffleErrorCode.NO_PARTICIPANTS]: HttpStatus.CONFLICT,
  [RaffleErrorCode.NOT_SETTLED]: HttpStatus.CONFLICT,
  [RaffleErrorCode.RAFFLE_NOT_FOUND]: HttpStatus.NOT_FOUND,
  [RaffleErrorCode.CONCURRENT_UPDATE]: HttpStatus.CONFLICT,
  [RaffleErrorCode.SELF_REFERRAL]: HttpStatus.BAD_REQUEST,
  [RaffleErrorCode.NOT_A_PLAYER]: HttpStatus.BAD_REQUEST,
  [RaffleErrorCode.TRANSFER_FAILED]: HttpStatus.BAD_REQUEST,
};

export function statusForRaffleError(error: RaffleError): HttpStatus {
  return STATUS_BY_CODE[error.code];
}

@Catch(RaffleError)
export class RaffleExceptionFilter implements ExceptionFilter {
  catch(exception: RaffleError, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();
    const status = statusForRaffleError(exception);

    response.status(status).json({
      statusCode: status,
      error: exception.code,
      message: exception.message,
      details: exception.details,
    });
  }
}
