import type { FastifyInstance, FastifyReply } from "fastify";
import type { CatalogStore } from "../../projects/catalog-store";
import { serializeProjects } from "../../projects/project-serializer";
import type {
	RenderResult,
	TemplateRenderer,
} from "../../render/template-renderer";
import type { SiteProfile } from "../../site/site-profile";

export interface PageRoutesDeps {
	catalog: Pick<CatalogStore, "listAll" | "getById">;
	renderer: TemplateRenderer;
	profile: SiteProfile;
}

export const INDEX_TEMPLATE = "index.html";
export const PREVIEW_UNAVAILABLE = "Preview not available";

export async function registerPageRoutes(
	app: FastifyInstance,
	deps: PageRoutesDeps,
): Promise<void> {
	const { catalog, renderer, profile } = deps;

	app.get("/", async (request, reply) => {
		const projects = catalog.listAll();
		request.log.debug(
			{ projectIds: projects.map((project) => project.id) },
			`rendering index with ${projects.length} projects`,
		);
		const result = renderer.render(INDEX_TEMPLATE, {
			projects,
			projectsJson: serializeProjects(projects),
			profile,
		});
		if (!result.ok) {
			request.log.error({ template: INDEX_TEMPLATE }, result.message);
		}
		return sendRendered(reply, result);
	});

	app.get<{ Params: { id: string } }>(
		"/project/:id/preview",
		async (request, reply) => {
			const project = catalog.getById(request.params.id);
			if (!project?.previewTemplate) {
				request.log.debug(
					{ projectId: request.params.id },
					"preview not available",
				);
				return reply
					.code(404)
					.type("text/plain; charset=utf-8")
					.send(PREVIEW_UNAVAILABLE);
			}

			const result = renderer.render(project.previewTemplate, { project });
			if (!result.ok) {
				request.log.error(
					{ projectId: project.id, template: project.previewTemplate },
					result.message,
				);
			}
			return sendRendered(reply, result);
		},
	);
}

function sendRendered(reply: FastifyReply, result: RenderResult): FastifyReply {
	if (result.ok) {
		return reply.code(200).type("text/html; charset=utf-8").send(result.html);
	}
	return reply
		.code(500)
		.type("text/plain; charset=utf-8")
		.send(`Template error: ${result.message}`);
}
