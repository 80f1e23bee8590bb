import { readFileSync } from 'fs';
import { describe, it, expect } from 'vitest';
import { analyzeSwiftCode, countByRule, summarize } from '../swiftAnalyzer.js';

function fixture(name: string): string {
	return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf-8');
}

describe('analyzeSwiftCode', () => {
	it('returns an empty success result for empty input', () => {
		expect(analyzeSwiftCode('')).toEqual({
			status: 'success',
			violations: [],
			summary: { total: 0, errors: 0, warnings: 0 },
		});
	});

	it('finds nothing in code without any trigger pattern', () => {
		const result = analyzeSwiftCode('struct Empty: View {\n    var body: some View { Text("Hello") }\n}\n');
		expect(result.violations).toEqual([]);
		expect(result.summary.total).toBe(0);
	});

	it('reports every rule on the profile fixture in rule order', () => {
		const result = analyzeSwiftCode(fixture('ProfileView.swift'));

		expect(result.violations.map(v => [v.rule, v.severity, v.line])).toEqual([
			['hardcoded_frame_size', 'warning', 18],
			['hardcoded_color', 'warning', 14],
			['hardcoded_font_size', 'warning', 13],
			['force_unwrapping', 'error', 23],
			['touch_target_too_small', 'error', 15],
			['missing_viewmodel_state', 'warning', undefined],
			['missing_accessibility_label', 'warning', 15],
		]);
		expect(result.summary).toEqual({ total: 7, errors: 2, warnings: 5 });
	});

	it('finds nothing in the settings fixture', () => {
		expect(analyzeSwiftCode(fixture('SettingsView.swift')).violations).toEqual([]);
	});

	it('orders by rule before line', () => {
		const result = analyzeSwiftCode('let a = b!\nText("x").frame(width: 10)');
		expect(result.violations.map(v => v.rule)).toEqual(['hardcoded_frame_size', 'force_unwrapping']);
	});

	it('reports a pattern at the start of the third line on line 3', () => {
		const result = analyzeSwiftCode('\n\nColor(red: 1, green: 1, blue: 1)');
		expect(result.violations).toHaveLength(1);
		expect(result.violations[0].line).toBe(3);
	});

	it('is idempotent', () => {
		const code = fixture('ProfileView.swift');
		expect(analyzeSwiftCode(code)).toEqual(analyzeSwiftCode(code));
	});

	it('keeps the summary consistent with the violations', () => {
		const inputs = [
			'',
			'x!',
			fixture('ProfileView.swift'),
			'Button(action: go) { Image(systemName: "x") }.frame(width: 12)\nclass AViewModel {}',
			'}}}{{{ Button( {',
		];
		for (const code of inputs) {
			const { violations, summary } = analyzeSwiftCode(code);
			expect(summary.total).toBe(violations.length);
			expect(summary.errors + summary.warnings).toBe(summary.total);
		}
	});

	it('does not throw on unbalanced or unusual text', () => {
		expect(() => analyzeSwiftCode('Button( { { {')).not.toThrow();
		expect(() => analyzeSwiftCode('}'.repeat(1000))).not.toThrow();
		expect(() => analyzeSwiftCode('\u0000\r\n !')).not.toThrow();
	});
});

describe('summarize', () => {
	it('counts by severity', () => {
		expect(summarize([
			{ severity: 'error', rule: 'force_unwrapping', message: 'a', line: 1 },
			{ severity: 'warning', rule: 'hardcoded_color', message: 'b', line: 2 },
			{ severity: 'warning', rule: 'missing_viewmodel_state', message: 'c' },
		])).toEqual({ total: 3, errors: 1, warnings: 2 });
	});
});

describe('countByRule', () => {
	it('counts only rules that fired', () => {
		const { violations } = analyzeSwiftCode('a!\nb!\nColor(red: 1, green: 0, blue: 0)');
		expect(countByRule(violations)).toEqual({ hardcoded_color: 1, force_unwrapping: 2 });
	});
});
