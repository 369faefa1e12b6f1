import { Controller, Get } from "@nestjs/common";
import { ApiOkResponse, ApiOperation, ApiTags } from "@nestjs/swagger";

@ApiTags("0 - Health")
@Controller("api/v1/health")
export class HealthController {
	@Get()
	@ApiOperation({ summary: "Liveness probe" })
	@ApiOkResponse({
		schema: { type: "object", properties: { status: { type: "string" } } },
	})
	check() {
		return { status: "ok" };
	}
}
