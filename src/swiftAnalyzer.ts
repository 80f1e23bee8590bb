import { SWIFT_RULES, type RuleId, type Violation } from './swiftRules.js';

export interface AnalysisSummary {
	total: number;
	errors: number;
	warnings: number;
}

export interface AnalysisResult {
	status: 'success';
	violations: Violation[];
	summary: AnalysisSummary;
}

export interface ErrorResponse {
	status: 'error';
	message: string;
}

export type AnalysisResponse = AnalysisResult | ErrorResponse;

/**
 * Run every Swift rule once over `code`.
 * Violations keep rule order, then match order within a rule.
 */
export function analyzeSwiftCode(code: string): AnalysisResult {
	const violations = SWIFT_RULES.flatMap(rule => rule.check(code));

	return {
		status: 'success',
		violations,
		summary: summarize(violations),
	};
}

export function summarize(violations: readonly Violation[]): AnalysisSummary {
	return {
		total: violations.length,
		errors: violations.filter(v => v.severity === 'error').length,
		warnings: violations.filter(v => v.severity === 'warning').length,
	};
}

export function countByRule(violations: readonly Violation[]): Partial<Record<RuleId, number>> {
	const counts: Partial<Record<RuleId, number>> = {};
	for (const v of violations) {
		counts[v.rule] = (counts[v.rule] ?? 0) + 1;
	}
	return counts;
}
