import { fileURLToPath } from "node:url";
import { defineConfig } from "vite";

export default defineConfig({
	build: {
		lib: {
			// The CLI is the only entry; everything else is reached from it
			entry: {
				cli: fileURLToPath(new URL("./src/bin.ts", import.meta.url)),
			},
			formats: ["es"],
		},
		rollupOptions: {
			external: [
				"@anthropic-ai/sdk",
				"commander",
				"diff",
				"dotenv",
				"minimatch",
				"pino",
				"yaml",
				"zod",
				/^@anthropic-ai\/sdk\/.*/,
				/^node:.*/,
			],
			output: {
				banner: "#!/usr/bin/env node",
			},
		},
		outDir: "dist",
		sourcemap: true,
		ssr: true,
		target: "node20",
	},
});
