import { AppError } from "../errors";
import { type ProjectInput, projectSchema } from "./project-schema";
import type { Project } from "./project-types";

/**
 * Immutable, ordered list of portfolio projects.
 * Built once at startup and handed to the router; nothing mutates it afterwards.
 */
export class CatalogStore {
	private readonly projects: readonly Project[];

	constructor(projects: readonly Project[]) {
		this.projects = Object.freeze(projects.map(freezeProject));
	}

	/** Validate literal definitions and build the store. Throws INVALID_CATALOG. */
	static fromDefinitions(definitions: readonly ProjectInput[]): CatalogStore {
		const projects = definitions.map((definition, index) => {
			const result = projectSchema.safeParse(definition);
			if (!result.success) {
				const issues = result.error.issues
					.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
					.join("; ");
				throw new AppError(
					"INVALID_CATALOG",
					`Invalid project definition at index ${index}: ${issues}`,
				);
			}
			return result.data;
		});
		return new CatalogStore(projects);
	}

	/** All projects in insertion order. */
	listAll(): readonly Project[] {
		return this.projects;
	}

	/** First project with a matching id, or undefined. */
	getById(id: string): Project | undefined {
		return this.projects.find((project) => project.id === id);
	}

	get size(): number {
		return this.projects.length;
	}
}

function freezeProject(project: Project): Project {
	return Object.freeze({
		...project,
		tags: Object.freeze([...project.tags]),
		tabs: Object.freeze([...project.tabs]),
		codeFiles: Object.freeze([...project.codeFiles]),
	});
}
