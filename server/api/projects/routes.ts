import type { FastifyInstance } from "fastify";
import type { CatalogStore } from "../../projects/catalog-store";
import {
	serializeProject,
	serializeProjects,
} from "../../projects/project-serializer";

export interface ProjectRoutesDeps {
	catalog: Pick<CatalogStore, "listAll" | "getById">;
}

export const PROJECT_NOT_FOUND_BODY = { error: "Project not found" } as const;

export async function registerProjectRoutes(
	app: FastifyInstance,
	deps: ProjectRoutesDeps,
): Promise<void> {
	const { catalog } = deps;

	app.get("/api/projects", async () => serializeProjects(catalog.listAll()));

	app.get<{ Params: { id: string } }>(
		"/api/projects/:id",
		async (request, reply) => {
			const project = catalog.getById(request.params.id);
			if (!project) {
				request.log.debug(
					{ projectId: request.params.id },
					"project not found",
				);
				return reply.code(404).send(PROJECT_NOT_FOUND_BODY);
			}
			return serializeProject(project);
		},
	);
}
