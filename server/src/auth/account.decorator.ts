import {
	createParamDecorator,
	ExecutionContext,
	UnauthorizedException,
} from "@nestjs/common";
import type { AuthenticatedRequest } from "./auth.guard";
import type { AuthenticatedAccount } from "./auth.service";

/**
 * The account resolved by `AuthGuard`.
 */
export const AccountFromJwt = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): AuthenticatedAccount => {
		const req = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
		if (!req.account) {
			throw new UnauthorizedException("Not authenticated");
		}
		return req.account;
	},
);
