import { buildApp } from "./app";
import { loadConfig } from "./config";
import { CatalogStore } from "./projects/catalog-store";
import { PORTFOLIO_PROJECTS } from "./projects/portfolio-projects";
import { NunjucksTemplateRenderer } from "./render/template-renderer";
import { loadSiteProfile } from "./site/site-profile";
import { SourceGateway } from "./source/source-gateway";

async function main() {
	const config = loadConfig();

	const catalog = CatalogStore.fromDefinitions(PORTFOLIO_PROJECTS);
	const profile = await loadSiteProfile(config.siteProfileFile);
	const renderer = new NunjucksTemplateRenderer({
		templatesDir: config.templatesDir,
		reload: config.debug,
	});
	const gateway = new SourceGateway(
		{ baseDir: config.sourceRoot, declaredOnly: config.sourceDeclaredOnly },
		catalog.listAll(),
	);

	const app = await buildApp(
		{ catalog, renderer, gateway, profile },
		{ logLevel: config.debug ? "debug" : "info", staticDir: config.staticDir },
	);

	app.log.info(
		{
			projects: catalog.size,
			declaredFiles: gateway.declaredFiles().size,
			sourceRoot: config.sourceRoot,
			declaredOnly: config.sourceDeclaredOnly,
		},
		"catalog loaded",
	);

	await app.listen({ port: config.port, host: config.host });

	let shuttingDown = false;
	const shutdown = async (signal: string) => {
		if (shuttingDown) {
			return;
		}
		shuttingDown = true;
		app.log.info(`received ${signal}, shutting down`);
		try {
			await app.close();
			process.exit(0);
		} catch (error) {
			console.error("[server] Shutdown failed:", error);
			process.exit(1);
		}
	};

	process.on("SIGINT", () => {
		void shutdown("SIGINT");
	});
	process.on("SIGTERM", () => {
		void shutdown("SIGTERM");
	});
}

main().catch((err) => {
	console.error("Failed to start server:", err);
	process.exit(1);
});
