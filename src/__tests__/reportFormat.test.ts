import { describe, it, expect } from 'vitest';
import { formatMarkdownReport } from '../reportFormat.js';
import { analyzeSwiftCode } from '../swiftAnalyzer.js';

describe('formatMarkdownReport', () => {
	it('renders error responses on one line', () => {
		expect(formatMarkdownReport({ status: 'error', message: 'No Swift code provided for analysis.' }))
			.toBe('❌ No Swift code provided for analysis.');
	});

	it('renders a clean result', () => {
		expect(formatMarkdownReport(analyzeSwiftCode('let x = 1'))).toBe(
			'## 🔍 Swift HIG Analysis\n\n**Total:** 0 | **Errors:** 0 | **Warnings:** 0\n\n✅ No violations found'
		);
	});

	it('lists errors before warnings, with file-scoped findings marked', () => {
		const report = formatMarkdownReport(analyzeSwiftCode('class HomeViewModel {}\nlet a = b!'));

		expect(report.split('\n')).toEqual([
			'## 🔍 Swift HIG Analysis',
			'',
			'**Total:** 2 | **Errors:** 1 | **Warnings:** 1',
			'',
			'### 🔴 Errors (1)',
			'- **L2** `force_unwrapping` — Force unwrapping (!) can cause crashes. Use optional binding (if let, guard let) or nil coalescing (??) instead.',
			'',
			'### ⚠️ Warnings (1)',
			'- **file** `missing_viewmodel_state` — ViewModel should expose a State enum (e.g., idle, loading, content, error) for state management.',
		]);
	});
});
