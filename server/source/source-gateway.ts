import { readFile, realpath, stat } from "node:fs/promises";
import { isAbsolute, relative, resolve, sep } from "node:path";
import { AppError } from "../errors";
import { normalizeSourcePath } from "../projects/project-schema";
import type { Project } from "../projects/project-types";

export interface SourceFile {
	/** Normalized request path, relative to the base directory */
	path: string;
	absolutePath: string;
	content: Buffer;
}

export interface SourceGatewayOptions {
	baseDir: string;
	/** Only serve paths listed in some project's codeFiles */
	declaredOnly: boolean;
}

/**
 * Read-only pass-through for project source files.
 * Never lists directories; every miss is a SOURCE_NOT_FOUND AppError.
 */
export class SourceGateway {
	private readonly baseDir: string;
	private readonly declaredOnly: boolean;
	private readonly declared: ReadonlySet<string>;

	constructor(options: SourceGatewayOptions, projects: readonly Project[]) {
		this.baseDir = resolve(options.baseDir);
		this.declaredOnly = options.declaredOnly;
		this.declared = new Set(
			projects.flatMap((project) =>
				project.codeFiles.map((file) => normalizeSourcePath(file)),
			),
		);
	}

	declaredFiles(): ReadonlySet<string> {
		return this.declared;
	}

	async read(requestPath: string): Promise<SourceFile> {
		const path = normalizeSourcePath(requestPath);
		if (this.declaredOnly && !this.declared.has(path)) {
			throw notFound(requestPath);
		}

		const absolutePath = resolve(this.baseDir, path);
		if (!contains(this.baseDir, absolutePath)) {
			throw notFound(requestPath);
		}

		try {
			// Symlinks may point anywhere; bound the target they resolve to.
			const [realBase, realTarget] = await Promise.all([
				realpath(this.baseDir),
				realpath(absolutePath),
			]);
			if (!contains(realBase, realTarget)) {
				throw notFound(requestPath);
			}
			const info = await stat(realTarget);
			if (!info.isFile()) {
				throw notFound(requestPath);
			}
			const content = await readFile(realTarget);
			return { path, absolutePath, content };
		} catch (err: unknown) {
			if (err instanceof AppError) {
				throw err;
			}
			throw new AppError(
				"SOURCE_NOT_FOUND",
				`Source file not readable: ${requestPath}`,
				err,
			);
		}
	}
}

function contains(baseDir: string, absolutePath: string): boolean {
	const rel = relative(baseDir, absolutePath);
	return (
		rel !== "" &&
		rel !== ".." &&
		!rel.startsWith(`..${sep}`) &&
		!isAbsolute(rel)
	);
}

function notFound(requestPath: string): AppError {
	return new AppError(
		"SOURCE_NOT_FOUND",
		`Source file not found: ${requestPath}`,
	);
}
