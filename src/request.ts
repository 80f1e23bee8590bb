import { z } from "zod";
import { analyzeSwiftCode, type AnalysisResult, type AnalysisResponse } from "./swiftAnalyzer.js";

const requestSchema = z
	.object({
		code: z.unknown(),
	})
	.passthrough();

const codeSchema = z.string();

export interface HandledRequest {
	response: AnalysisResponse;
	exitCode: 0 | 1;
}

export const NO_CODE_MESSAGE = "No Swift code provided for analysis.";

export type Analyzer = (code: string) => AnalysisResult;

function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function describeIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
		.join("; ");
}

// Any falsy or empty `code` (false, 0, [], {}, "", null) means none was sent
function isMissingCode(value: unknown): boolean {
	if (Array.isArray(value)) return value.length === 0;
	if (value !== null && typeof value === "object") return Object.keys(value).length === 0;
	return !value;
}

/**
 * Analyze code that has already been pulled out of a request.
 * Missing or empty code is reported, not analyzed.
 */
export function analyzeRequestCode(code: string | null | undefined, analyze: Analyzer = analyzeSwiftCode): HandledRequest {
	if (!code) {
		return { response: { status: "error", message: NO_CODE_MESSAGE }, exitCode: 0 };
	}

	try {
		return { response: analyze(code), exitCode: 0 };
	} catch (error) {
		return {
			response: { status: "error", message: `Analysis failed: ${describeError(error)}` },
			exitCode: 1,
		};
	}
}

/**
 * Decode a raw JSON request body and analyze its `code` field.
 */
export function handleAnalysisRequest(raw: string, analyze: Analyzer = analyzeSwiftCode): HandledRequest {
	let body: unknown;
	try {
		body = JSON.parse(raw);
	} catch (error) {
		return {
			response: { status: "error", message: `Invalid JSON input: ${describeError(error)}` },
			exitCode: 1,
		};
	}

	const parsed = requestSchema.safeParse(body);
	if (!parsed.success) {
		return {
			response: { status: "error", message: `Invalid JSON input: ${describeIssues(parsed.error)}` },
			exitCode: 1,
		};
	}

	if (isMissingCode(parsed.data.code)) {
		return analyzeRequestCode(null, analyze);
	}

	const code = codeSchema.safeParse(parsed.data.code);
	if (!code.success) {
		return {
			response: { status: "error", message: `Invalid JSON input: code: ${describeIssues(code.error)}` },
			exitCode: 1,
		};
	}

	return analyzeRequestCode(code.data, analyze);
}
