import {
	ArgumentsHost,
	Catch,
	ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import type { Response } from "express";
import { EscrowError, type EscrowErrorCode } from "@inscription-escrow/sdk";
import { TokenTransferError } from "../../ledger/token-transfer.error";
import { toError } from "../errors";

const STATUS_BY_CODE: Record<EscrowErrorCode, HttpStatus> = {
	DustAmount: HttpStatus.BAD_REQUEST,
	OutOfBounds: HttpStatus.BAD_REQUEST,
	Forbidden: HttpStatus.FORBIDDEN,
	SelfTrade: HttpStatus.FORBIDDEN,
	InvalidId: HttpStatus.NOT_FOUND,
	AlreadyDone: HttpStatus.CONFLICT,
	NotCommitted: HttpStatus.CONFLICT,
	ListingExists: HttpStatus.CONFLICT,
	Expired: HttpStatus.CONFLICT,
	NotExpired: HttpStatus.CONFLICT,
	NoBuyer: HttpStatus.CONFLICT,
	BtcTxAlreadyUsed: HttpStatus.CONFLICT,
	InscriptionMismatch: HttpStatus.UNPROCESSABLE_ENTITY,
	TxNotForReceiver: HttpStatus.UNPROCESSABLE_ENTITY,
	ValueTooSmall: HttpStatus.UNPROCESSABLE_ENTITY,
	ProofInvalid: HttpStatus.UNPROCESSABLE_ENTITY,
	TransferFailed: HttpStatus.UNPROCESSABLE_ENTITY,
};

export function statusForEscrowCode(code: EscrowErrorCode): HttpStatus {
	return STATUS_BY_CODE[code];
}

/**
 * Maps escrow and ledger errors to `{ error, message, details? }` bodies.
 * Framework HTTP exceptions keep their own status and body.
 */
@Catch()
export class EscrowExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(EscrowExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost) {
		const res = host.switchToHttp().getResponse<Response>();

		if (exception instanceof EscrowError) {
			res.status(statusForEscrowCode(exception.code)).json({
				error: exception.code,
				message: exception.message,
				details: exception.details,
			});
			return;
		}
		if (exception instanceof TokenTransferError) {
			res.status(HttpStatus.UNPROCESSABLE_ENTITY).json({
				error: exception.code,
				message: exception.message,
			});
			return;
		}
		if (exception instanceof HttpException) {
			res.status(exception.getStatus()).json(exception.getResponse());
			return;
		}

		const err = toError(exception);
		this.logger.error(err.message, err.stack);
		res.status(HttpStatus.INTERNAL_SERVER_ERROR).json({
			error: "InternalError",
			message: "Internal server error",
		});
	}
}
