import type { FastifyInstance } from "fastify";
import { isAppError } from "../../errors";
import type { SourceGateway } from "../../source/source-gateway";

export interface SourceRoutesDeps {
	gateway: Pick<SourceGateway, "read">;
}

export const FILE_NOT_FOUND = "File not found";

export async function registerSourceRoutes(
	app: FastifyInstance,
	deps: SourceRoutesDeps,
): Promise<void> {
	const { gateway } = deps;

	app.get<{ Params: { "*": string } }>(
		"/source/*",
		async (request, reply) => {
			const requestPath = request.params["*"];
			try {
				const file = await gateway.read(requestPath);
				return reply.code(200).type("text/plain").send(file.content);
			} catch (err: unknown) {
				if (isAppError(err, "SOURCE_NOT_FOUND")) {
					request.log.debug({ requestPath }, err.message);
					return reply
						.code(404)
						.type("text/plain; charset=utf-8")
						.send(FILE_NOT_FOUND);
				}
				throw err;
			}
		},
	);
}
