import type { Project, ProjectJson } from "./project-types";

export function serializeProject(project: Project): ProjectJson {
	const json: ProjectJson = {
		id: project.id,
		name: project.name,
		description: project.description,
		tags: [...project.tags],
		tabs: [...project.tabs],
		code_files: [...project.codeFiles],
	};
	if (project.previewTemplate !== undefined) {
		json.preview_template = project.previewTemplate;
	}
	return json;
}

export function serializeProjects(projects: readonly Project[]): ProjectJson[] {
	return projects.map(serializeProject);
}
