import type { Readable, Writable } from "stream";
import type { Config } from "./config.js";
import { countByRule } from "./swiftAnalyzer.js";
import { handleAnalysisRequest } from "./request.js";

function readAll(input: Readable): Promise<string> {
	return new Promise((resolve, reject) => {
		const chunks: Buffer[] = [];
		input.on("data", (chunk: Buffer | string) => chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk));
		input.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
		input.on("error", reject);
	});
}

/**
 * Read one JSON request from `input`, write the JSON response to `output`.
 * Resolves with the process exit code.
 */
export async function runOneShot(input: Readable, output: Writable, config: Config): Promise<number> {
	const raw = await readAll(input);
	const { response, exitCode } = handleAnalysisRequest(raw);

	if (config.SWIFT_ANALYZER_VERBOSE) {
		if (response.status === "success") {
			console.error(`Analyzed ${Buffer.byteLength(raw, "utf-8")} bytes: ${JSON.stringify(countByRule(response.violations))}`);
		} else {
			console.error(`Request rejected: ${response.message}`);
		}
	}

	output.write(JSON.stringify(response, null, config.JSON_INDENT) + "\n");
	return exitCode;
}
