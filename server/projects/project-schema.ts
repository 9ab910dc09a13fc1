import { posix } from "node:path";
import { z } from "zod";

const projectIdSchema = z
	.string()
	.regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/, "must be a lowercase URL-safe slug");

/** Relative path that stays under the source root once normalized. */
const codeFileSchema = z
	.string()
	.min(1)
	.refine((path) => !posix.isAbsolute(path) && !/^[A-Za-z]:/.test(path), {
		message: "must be a relative path",
	})
	.transform((path) => normalizeSourcePath(path))
	.refine((path) => path !== "." && path !== ".." && !path.startsWith("../"), {
		message: "must stay inside the source root",
	});

const projectTabSchema = z.enum(["code", "preview"]);

export const projectSchema = z.object({
	id: projectIdSchema,
	name: z.string().min(1),
	description: z.string(),
	tags: z.array(z.string().min(1)),
	tabs: z
		.array(projectTabSchema)
		.refine((tabs) => new Set(tabs).size === tabs.length, {
			message: "tabs must not repeat",
		}),
	codeFiles: z.array(codeFileSchema),
	previewTemplate: z.string().min(1).optional(),
});

export type ProjectInput = z.input<typeof projectSchema>;

/** Posix separators, no "./" segments, no duplicate slashes. */
export function normalizeSourcePath(path: string): string {
	return posix.normalize(path.replace(/\\/g, "/"));
}
