import type { AnalysisResponse } from "./swiftAnalyzer.js";
import type { Violation } from "./swiftRules.js";

function formatViolation(v: Violation): string {
	const where = v.line !== undefined ? `L${v.line}` : 'file';
	return `- **${where}** \`${v.rule}\` — ${v.message}`;
}

/**
 * Markdown rendering of an analysis response, errors listed before warnings.
 */
export function formatMarkdownReport(response: AnalysisResponse): string {
	if (response.status === 'error') {
		return `❌ ${response.message}`;
	}

	const { violations, summary } = response;
	const errors = violations.filter(v => v.severity === 'error');
	const warnings = violations.filter(v => v.severity === 'warning');

	const sections = [
		`## 🔍 Swift HIG Analysis`,
		`**Total:** ${summary.total} | **Errors:** ${summary.errors} | **Warnings:** ${summary.warnings}`,
	];

	if (violations.length === 0) {
		sections.push('✅ No violations found');
		return sections.join('\n\n');
	}

	if (errors.length > 0) {
		sections.push(`### 🔴 Errors (${errors.length})\n${errors.map(formatViolation).join('\n')}`);
	}
	if (warnings.length > 0) {
		sections.push(`### ⚠️ Warnings (${warnings.length})\n${warnings.map(formatViolation).join('\n')}`);
	}

	return sections.join('\n\n');
}
