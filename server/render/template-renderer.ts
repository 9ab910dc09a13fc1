import nunjucks from "nunjucks";
import type { Environment, runtime } from "nunjucks";

export type RenderResult =
	| { ok: true; html: string }
	| { ok: false; message: string };

export interface TemplateRenderer {
	/** Never throws; failures come back as `{ ok: false }`. */
	render(templateName: string, context: Record<string, unknown>): RenderResult;
}

export interface NunjucksRendererOptions {
	templatesDir: string;
	/** Re-read templates from disk on every render */
	reload?: boolean;
}

export class NunjucksTemplateRenderer implements TemplateRenderer {
	private readonly env: Environment;

	constructor(options: NunjucksRendererOptions) {
		const reload = options.reload ?? false;
		const loader = new nunjucks.FileSystemLoader(options.templatesDir, {
			noCache: reload,
			watch: false,
		});
		this.env = new nunjucks.Environment(loader, {
			autoescape: true,
			throwOnUndefined: false,
		});
		this.env.addFilter("jsonScript", toScriptJson);
	}

	render(templateName: string, context: Record<string, unknown>): RenderResult {
		try {
			return { ok: true, html: this.env.render(templateName, context) };
		} catch (error: unknown) {
			return {
				ok: false,
				message: error instanceof Error ? error.message : String(error),
			};
		}
	}
}

/** JSON safe to inline inside a <script> element. */
export function toScriptJson(value: unknown): runtime.SafeString {
	const json = JSON.stringify(value ?? null)
		.replace(/</g, "\\u003c")
		.replace(/>/g, "\\u003e")
		.replace(/&/g, "\\u0026");
	return new nunjucks.runtime.SafeString(json);
}
