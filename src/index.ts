#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { getConfig } from "./config.js";
import { runOneShot } from "./cli.js";
import { createSwiftAnalyzerServer } from "./server.js";
import { SWIFT_RULES } from "./swiftRules.js";

async function main() {
	const config = getConfig();
	const mode = process.argv.includes("--mcp") ? "mcp" : config.SWIFT_ANALYZER_MODE;

	if (mode === "oneshot") {
		process.exitCode = await runOneShot(process.stdin, process.stdout, config);
		return;
	}

	const server = createSwiftAnalyzerServer(config.JSON_INDENT);
	const transport = new StdioServerTransport();
	await server.connect(transport);
	console.error(`Swift HIG Analyzer MCP Server running on stdio with ${SWIFT_RULES.length} rules`);
}

main().catch((error) => {
	console.error("Fatal error in main():", error);
	process.exit(1);
});
