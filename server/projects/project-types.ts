/** UI panels a project card can show. */
export type ProjectTab = "code" | "preview";

/**
 * One portfolio entry.
 *
 * Used by: catalog-store, project routes, page templates
 */
export interface Project {
	/** URL-safe slug, the routing key */
	readonly id: string;
	readonly name: string;
	readonly description: string;
	/** Display order */
	readonly tags: readonly string[];
	/** Enabled panels, no duplicates */
	readonly tabs: readonly ProjectTab[];
	/** Paths relative to the source root, in display order */
	readonly codeFiles: readonly string[];
	/** Template name rendered for the preview panel; absent means no preview */
	readonly previewTemplate?: string;
}

/** JSON shape returned by the project API. */
export interface ProjectJson {
	id: string;
	name: string;
	description: string;
	tags: string[];
	tabs: ProjectTab[];
	code_files: string[];
	preview_template?: string;
}
