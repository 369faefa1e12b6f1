import { ApiProperty, getSchemaPath } from "@nestjs/swagger";

export type ApiEnvelope<T> = {
	data: T;
};

export const envelope = <T>(data: T): ApiEnvelope<T> => ({ data });

export function getSchemaPathForDto(dto: Parameters<typeof getSchemaPath>[0]) {
	return {
		allOf: [
			{ $ref: getSchemaPath(ApiEnvelopeShellDto) },
			{
				type: "object",
				properties: {
					data: { $ref: getSchemaPath(dto) },
				},
				required: ["data"],
			},
		],
	};
}

/** Placeholder “envelope” shell; `data` is overridden per-endpoint in controller schemas. */
export class ApiEnvelopeShellDto<T> {
	@ApiProperty({
		description: "Payload for this endpoint (shape varies by route)",
	})
	data!: T;
}

export class ApiErrorDto {
	@ApiProperty({ example: "AlreadyDone" })
	error!: string;

	@ApiProperty({ example: 'Listing in status "done" does not accept "cancel"' })
	message!: string;

	@ApiProperty({ required: false })
	details?: unknown;
}
