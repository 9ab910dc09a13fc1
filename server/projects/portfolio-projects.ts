import type { ProjectInput } from "./project-schema";

/** Catalog shown by the site. Paths are relative to the source root. */
export const PORTFOLIO_PROJECTS: readonly ProjectInput[] = [
	{
		id: "memory-allocator",
		name: "Custom Memory Allocator",
		description:
			"First-fit heap allocator with block splitting, coalescing and explicit control over allocation strategy",
		tags: ["C", "Memory Management", "Performance"],
		tabs: ["code", "preview"],
		codeFiles: [
			"memory-allocator/allocator.h",
			"memory-allocator/allocator.c",
		],
		previewTemplate: "projects/memory-allocator.html",
	},
	{
		id: "crypto-primitives",
		name: "Cryptographic Primitives",
		description:
			"Block cipher and hash building blocks written from first principles",
		tags: ["C", "Cryptography", "Security"],
		tabs: ["code", "preview"],
		codeFiles: ["crypto-primitives/crypto.h", "crypto-primitives/rotate.c"],
		previewTemplate: "projects/crypto.html",
	},
	{
		id: "embedded-rtos",
		name: "Real-Time OS Kernel",
		description:
			"Minimal kernel for microcontrollers with priority-based preemptive scheduling",
		tags: ["C", "RTOS", "Embedded"],
		tabs: ["code", "preview"],
		codeFiles: ["rtos-kernel/rtos.h", "rtos-kernel/scheduler.c"],
		previewTemplate: "projects/rtos.html",
	},
	{
		id: "portfolio-server",
		name: "Portfolio Server",
		description:
			"The server behind this page: a read-only catalog with a source viewer",
		tags: ["TypeScript", "Fastify", "Web"],
		tabs: ["code"],
		codeFiles: ["portfolio-server/README.md"],
	},
];
