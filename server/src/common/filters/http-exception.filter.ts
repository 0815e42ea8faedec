import {
	ArgumentsHost,
	Catch,
	ExceptionFilter,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import type { Request, Response } from "express";
import { toError, toHttpException } from "../errors";

/**
 * Renders every failure as JSON. Settlement errors keep their code and
 * details; anything unexpected becomes a logged 500.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(HttpExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost) {
		const ctx = host.switchToHttp();
		const response = ctx.getResponse<Response>();
		const request = ctx.getRequest<Request>();

		const http = toHttpException(exception);
		const status = http.getStatus();
		if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
			const error = toError(exception);
			this.logger.error(
				`${request.method} ${request.originalUrl} failed: ${error.message}`,
				error.stack,
			);
		}

		const body = http.getResponse();
		response.status(status).json({
			statusCode: status,
			...(typeof body === "string" ? { message: body } : body),
			path: request.originalUrl,
			timestamp: new Date().toISOString(),
		});
	}
}
