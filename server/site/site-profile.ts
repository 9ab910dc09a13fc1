import { readFile } from "node:fs/promises";
import { z } from "zod";
import { AppError } from "../errors";

const hexColorSchema = z
	.string()
	.regex(/^#[0-9a-fA-F]{6}$/, "must be a #rrggbb colour");

const siteProfileSchema = z.object({
	name: z.string().min(1),
	title: z.string().min(1),
	description: z.string(),
	contact: z.object({
		email: z.string().email(),
		github: z.string().url(),
		linkedin: z.string().url().optional(),
		twitter: z.string().url().optional(),
	}),
	skills: z.array(
		z.object({
			group: z.string().min(1),
			items: z.array(z.string().min(1)),
		}),
	),
	theme: z.object({
		primaryColor: hexColorSchema,
		secondaryColor: hexColorSchema,
		accentColor: hexColorSchema,
		backgroundColor: hexColorSchema,
		fontPrimary: z.string().min(1),
		fontMono: z.string().min(1),
	}),
});

/** Owner details, skills and theme rendered on the index page. */
export type SiteProfile = z.infer<typeof siteProfileSchema>;

export async function loadSiteProfile(filePath: string): Promise<SiteProfile> {
	let raw: string;
	try {
		raw = await readFile(filePath, "utf-8");
	} catch (err: unknown) {
		throw new AppError(
			"INVALID_PROFILE",
			`Site profile not readable: ${filePath}`,
			err,
		);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (err: unknown) {
		throw new AppError(
			"INVALID_PROFILE",
			`Site profile is not valid JSON: ${filePath}`,
			err,
		);
	}

	const result = siteProfileSchema.safeParse(parsed);
	if (!result.success) {
		throw new AppError(
			"INVALID_PROFILE",
			`Invalid site profile: ${result.error.issues
				.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
				.join("; ")}`,
		);
	}
	return result.data;
}
