import { Injectable, Logger, NestMiddleware } from "@nestjs/common";
import type { NextFunction, Request, Response } from "express";
import { ConfigService } from "@nestjs/config";
import { timingSafeEqual as cryptoTimingSafeEqual } from "node:crypto";

/**
 * HTTP basic auth for the ledger administration routes, checked against
 * LEDGER_ADMIN_USER / LEDGER_ADMIN_PASS. With no credentials configured every
 * request is refused.
 */
@Injectable()
export class BasicAuthMiddleware implements NestMiddleware {
	private readonly logger = new Logger(BasicAuthMiddleware.name);

	constructor(private readonly config: ConfigService) {}

	use(req: Request, res: Response, next: NextFunction) {
		const header = req.header("authorization");
		if (!header || !header.startsWith("Basic ")) {
			res.setHeader("WWW-Authenticate", 'Basic realm="Ledger"');
			return res.status(401).send("Authentication required");
		}

		const decoded = Buffer.from(
			header.slice("Basic ".length).trim(),
			"base64",
		).toString("utf8");
		const sep = decoded.indexOf(":");
		const username = sep >= 0 ? decoded.slice(0, sep) : "";
		const password = sep >= 0 ? decoded.slice(sep + 1) : "";

		const expectedUser = this.config.get<string>("LEDGER_ADMIN_USER") ?? "";
		const expectedPass = this.config.get<string>("LEDGER_ADMIN_PASS") ?? "";
		if (!expectedUser || !expectedPass) {
			this.logger.warn("Ledger admin credentials are not configured");
			return res.status(401).send("Unauthorized");
		}

		const ok =
			timingSafeEqual(username, expectedUser) &&
			timingSafeEqual(password, expectedPass);
		if (!ok) {
			res.setHeader("WWW-Authenticate", 'Basic realm="Ledger"');
			return res.status(401).send("Unauthorized");
		}

		return next();
	}
}

function timingSafeEqual(a: string, b: string): boolean {
	const ab = Buffer.from(a);
	const bb = Buffer.from(b);
	if (ab.length !== bb.length) {
		// same-length comparison so a mismatch in size costs the same time
		cryptoTimingSafeEqual(ab, ab);
		return false;
	}
	return cryptoTimingSafeEqual(ab, bb);
}
