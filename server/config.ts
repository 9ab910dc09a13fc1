import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError } from "./errors";

const ROOT_DIR = resolve(dirname(fileURLToPath(import.meta.url)), "..");

export const DEFAULT_PATHS = {
	sourceRoot: resolve(ROOT_DIR, "showcase"),
	templatesDir: resolve(ROOT_DIR, "templates"),
	staticDir: resolve(ROOT_DIR, "public"),
	siteProfileFile: resolve(ROOT_DIR, "config", "site-profile.json"),
} as const;

const TRUTHY = new Set(["true", "1", "yes"]);

function flag(defaultValue: boolean) {
	return z
		.preprocess(
			(value) =>
				typeof value === "string" && value.trim() !== ""
					? value.trim().toLowerCase()
					: undefined,
			z.enum(["true", "false", "1", "0", "yes", "no"]).optional(),
		)
		.transform((value) =>
			value === undefined ? defaultValue : TRUTHY.has(value),
		);
}

function directory(defaultPath: string) {
	return z
		.string()
		.trim()
		.min(1)
		.optional()
		.transform((value) => resolve(value ?? defaultPath));
}

const envSchema = z.object({
	PORT: z.coerce.number().int().min(1).max(65535).default(5000),
	HOST: z.string().trim().min(1).default("0.0.0.0"),
	PORTFOLIO_DEBUG: flag(false),
	SOURCE_ROOT: directory(DEFAULT_PATHS.sourceRoot),
	TEMPLATES_DIR: directory(DEFAULT_PATHS.templatesDir),
	STATIC_DIR: directory(DEFAULT_PATHS.staticDir),
	SITE_PROFILE_FILE: directory(DEFAULT_PATHS.siteProfileFile),
	SOURCE_DECLARED_ONLY: flag(true),
});

export interface AppConfig {
	port: number;
	host: string;
	debug: boolean;
	sourceRoot: string;
	templatesDir: string;
	staticDir: string;
	siteProfileFile: string;
	sourceDeclaredOnly: boolean;
}

/** Parse the process environment once at startup. Throws ConfigError listing every bad variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	const result = envSchema.safeParse(env);
	if (!result.success) {
		throw new ConfigError(
			result.error.issues.map(
				(issue) => `${issue.path.join(".")}: ${issue.message}`,
			),
		);
	}

	const parsed = result.data;
	return {
		port: parsed.PORT,
		host: parsed.HOST,
		debug: parsed.PORTFOLIO_DEBUG,
		sourceRoot: parsed.SOURCE_ROOT,
		templatesDir: parsed.TEMPLATES_DIR,
		staticDir: parsed.STATIC_DIR,
		siteProfileFile: parsed.SITE_PROFILE_FILE,
		sourceDeclaredOnly: parsed.SOURCE_DECLARED_ONLY,
	};
}
