import {
	ExecutionContext,
	UnauthorizedException,
	createParamDecorator,
} from "@nestjs/common";
import type { Request } from "express";

/** Account the request acts for; authenticated upstream */
export const CALLER_HEADER = "x-caller-address";

export const Caller = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): string => {
		const request = ctx.switchToHttp().getRequest<Request>();
		const caller = request.header(CALLER_HEADER);
		if (!caller) {
			throw new UnauthorizedException(`Missing ${CALLER_HEADER} header`);
		}
		return caller;
	},
);
