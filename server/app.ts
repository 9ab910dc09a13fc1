import fastifyStatic from "@fastify/static";
import Fastify, { type FastifyInstance } from "fastify";
import { registerPageRoutes } from "./api/pages/routes";
import { registerProjectRoutes } from "./api/projects/routes";
import { registerSourceRoutes } from "./api/source/routes";
import type { CatalogStore } from "./projects/catalog-store";
import type { TemplateRenderer } from "./render/template-renderer";
import type { SiteProfile } from "./site/site-profile";
import type { SourceGateway } from "./source/source-gateway";

/** Node's default header size cap; no request line can carry a longer param. */
export const MAX_PARAM_LENGTH = 16 * 1024;

export interface AppDeps {
	catalog: Pick<CatalogStore, "listAll" | "getById">;
	renderer: TemplateRenderer;
	gateway: Pick<SourceGateway, "read">;
	profile: SiteProfile;
}

export interface AppOptions {
	/** false disables logging; otherwise the pino level */
	logLevel?: "debug" | "info" | false;
	/** Directory served under /static/ */
	staticDir?: string;
}

export async function buildApp(
	deps: AppDeps,
	options: AppOptions = {},
): Promise<FastifyInstance> {
	const logLevel = options.logLevel ?? "info";
	const app = Fastify({
		logger: logLevel === false ? false : { level: logLevel },
		// Long unknown ids must still reach the handlers and get their 404.
		maxParamLength: MAX_PARAM_LENGTH,
	});

	if (options.staticDir) {
		await app.register(fastifyStatic, {
			root: options.staticDir,
			prefix: "/static/",
		});
	}

	await registerPageRoutes(app, {
		catalog: deps.catalog,
		renderer: deps.renderer,
		profile: deps.profile,
	});
	await registerProjectRoutes(app, { catalog: deps.catalog });
	await registerSourceRoutes(app, { gateway: deps.gateway });

	return app;
}
