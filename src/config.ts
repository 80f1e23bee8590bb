import { z } from "zod";

const configSchema = z.object({
	SWIFT_ANALYZER_MODE: z.enum(["oneshot", "mcp"]).default("oneshot"),
	JSON_INDENT: z.coerce.number().int().min(0).max(8).default(2),
	SWIFT_ANALYZER_VERBOSE: z
		.enum(["true", "false", "1", "0"])
		.default("false")
		.transform((v) => v === "true" || v === "1"),
});

export type Config = z.infer<typeof configSchema>;

let config: Config | null = null;

export function getConfig(): Config {
	if (!config) {
		config = configSchema.parse(process.env);
	}
	return config;
}

export function loadConfig(env: Record<string, string | undefined>): Config {
	return configSchema.parse(env);
}
