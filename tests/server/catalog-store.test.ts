import { describe, expect, it } from "vitest";
import { AppError } from "../../server/errors";
import { CatalogStore } from "../../server/projects/catalog-store";
import type { ProjectInput } from "../../server/projects/project-schema";
import {
	MOCK_PROJECT_A,
	MOCK_PROJECT_B,
	MOCK_PROJECTS,
} from "../fixtures/projects";

function definition(overrides: Partial<ProjectInput> = {}): ProjectInput {
	return {
		id: "sample-project",
		name: "Sample",
		description: "",
		tags: [],
		tabs: ["code"],
		codeFiles: ["sample/main.c"],
		...overrides,
	};
}

describe("CatalogStore", () => {
	it("lists projects in insertion order", () => {
		const catalog = new CatalogStore(MOCK_PROJECTS);

		expect(catalog.listAll().map((project) => project.id)).toEqual([
			"project-alpha",
			"project-beta",
			"project-gamma",
		]);
		expect(catalog.size).toBe(3);
	});

	it("finds a project by id", () => {
		const catalog = new CatalogStore(MOCK_PROJECTS);

		expect(catalog.getById("project-beta")).toEqual(MOCK_PROJECT_B);
	});

	it("returns undefined for an unknown id", () => {
		const catalog = new CatalogStore(MOCK_PROJECTS);

		expect(catalog.getById("nope")).toBeUndefined();
	});

	it("returns the first match when ids repeat", () => {
		const catalog = new CatalogStore([
			MOCK_PROJECT_A,
			{ ...MOCK_PROJECT_A, name: "Shadowed" },
		]);

		expect(catalog.getById(MOCK_PROJECT_A.id)?.name).toBe("Project Alpha");
	});

	it("is frozen and detached from the source array", () => {
		const source = [MOCK_PROJECT_A];
		const catalog = new CatalogStore(source);
		source.push(MOCK_PROJECT_B);

		expect(catalog.size).toBe(1);
		expect(Object.isFrozen(catalog.listAll())).toBe(true);
		expect(Object.isFrozen(catalog.listAll()[0])).toBe(true);
		expect(Object.isFrozen(catalog.listAll()[0]?.tags)).toBe(true);
		expect(Object.isFrozen(catalog.listAll()[0]?.codeFiles)).toBe(true);
	});

	describe("fromDefinitions", () => {
		it("normalizes code file paths", () => {
			const catalog = CatalogStore.fromDefinitions([
				definition({ codeFiles: ["./sample//main.c", "sample/lib/../util.c"] }),
			]);

			expect(catalog.getById("sample-project")?.codeFiles).toEqual([
				"sample/main.c",
				"sample/util.c",
			]);
		});

		it("rejects ids that are not URL-safe slugs", () => {
			expect(() =>
				CatalogStore.fromDefinitions([definition({ id: "Bad Id" })]),
			).toThrow(AppError);
			expect(() =>
				CatalogStore.fromDefinitions([definition({ id: "Bad Id" })]),
			).toThrow(
				"Invalid project definition at index 0: id: must be a lowercase URL-safe slug",
			);
		});

		it("rejects code files that climb out of the source root", () => {
			expect(() =>
				CatalogStore.fromDefinitions([
					definition(),
					definition({ id: "escape", codeFiles: ["../etc/passwd"] }),
				]),
			).toThrow(
				"Invalid project definition at index 1: codeFiles.0: must stay inside the source root",
			);
		});

		it("rejects absolute code file paths", () => {
			expect(() =>
				CatalogStore.fromDefinitions([
					definition({ codeFiles: ["/etc/passwd"] }),
				]),
			).toThrow(/codeFiles\.0: must be a relative path/);
		});

		it("rejects repeated tabs", () => {
			expect(() =>
				CatalogStore.fromDefinitions([definition({ tabs: ["code", "code"] })]),
			).toThrow(/tabs: tabs must not repeat/);
		});

		it("reports the error code INVALID_CATALOG", () => {
			try {
				CatalogStore.fromDefinitions([definition({ name: "" })]);
				expect.unreachable();
			} catch (error) {
				expect(error).toMatchObject({
					name: "AppError",
					code: "INVALID_CATALOG",
				});
			}
		});
	});
});
