import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { getRelevantKnowledge } from "./higKnowledge.js";
import { formatMarkdownReport } from "./reportFormat.js";
import { analyzeRequestCode } from "./request.js";
import { compareRevisions } from "./revisionDiff.js";
import { listRules } from "./swiftRules.js";

export const SERVER_NAME = "swift-hig-analyzer";
export const SERVER_VERSION = "1.0.0";

function textResult(text: string, isError = false) {
	return {
		content: [{ type: "text" as const, text }],
		...(isError ? { isError: true } : {}),
	};
}

export function createSwiftAnalyzerServer(jsonIndent = 2): McpServer {
	const server = new McpServer({
		name: SERVER_NAME,
		version: SERVER_VERSION,
	});

	server.registerTool(
		"swift_analyze",
		{
			description: "Analyze SwiftUI source for HIG and architecture violations: hardcoded frame sizes, colors and font sizes, force unwrapping, small touch targets, ViewModels without a State enum, and image buttons without accessibility labels.",
			inputSchema: {
				code: z.string().describe("Full Swift source text of one file"),
				format: z.enum(["json", "markdown"]).optional().describe("Response format (default json)"),
			},
		},
		async ({ code, format }) => {
			const { response } = analyzeRequestCode(code);
			const text = format === "markdown"
				? formatMarkdownReport(response)
				: JSON.stringify(response, null, jsonIndent);
			return textResult(text, response.status === "error");
		}
	);

	server.registerTool(
		"swift_list_rules",
		{
			description: "List the fixed rule set with severity and scope, in reporting order.",
			inputSchema: {},
		},
		async () => textResult(JSON.stringify(listRules(), null, jsonIndent))
	);

	server.registerTool(
		"swift_hig_guidance",
		{
			description: "Get Human Interface Guidelines context and fixes for a topic (e.g. 'dynamic type', 'touch target', 'voiceover').",
			inputSchema: {
				query: z.string().describe("Topic or rule name to look up"),
			},
		},
		async ({ query }) => textResult(getRelevantKnowledge(query))
	);

	server.registerTool(
		"swift_compare_revisions",
		{
			description: "Compare two revisions of one Swift file: line diff counts, violations introduced and resolved.",
			inputSchema: {
				before: z.string().describe("Source before the change"),
				after: z.string().describe("Source after the change"),
			},
		},
		async ({ before, after }) => {
			try {
				return textResult(JSON.stringify(compareRevisions(before, after), null, jsonIndent));
			} catch (error) {
				return textResult(`❌ Error comparing revisions: ${error instanceof Error ? error.message : String(error)}`, true);
			}
		}
	);

	return server;
}
