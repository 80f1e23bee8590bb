// Swift HIG rules - each rule scans the raw source text on its own and
// returns its findings. No rule reads another rule's output.

import { advanceCodePoints, findBlockEnd, isInLineComment, lineNumberAt } from './textScanner.js';

export type Severity = 'error' | 'warning';

export const RULE_IDS = [
	'hardcoded_frame_size',
	'hardcoded_color',
	'hardcoded_font_size',
	'force_unwrapping',
	'touch_target_too_small',
	'missing_viewmodel_state',
	'missing_accessibility_label',
] as const;

export type RuleId = typeof RULE_IDS[number];

export interface Violation {
	readonly severity: Severity;
	readonly rule: RuleId;
	readonly message: string;
	/** Omitted for findings about the file as a whole. */
	readonly line?: number;
}

export interface RuleDefinition {
	id: RuleId;
	severity: Severity;
	scope: 'occurrence' | 'file';
	description: string;
	check: (code: string) => Violation[];
}

export const MIN_TOUCH_TARGET = 44;

// Characters (code points) from a Button's closing brace that still count as
// part of it, so trailing modifiers like `.accessibilityLabel(...)` are seen.
const MODIFIER_LOOKAHEAD = 200;

function violationAt(code: string, offset: number, severity: Severity, rule: RuleId, message: string): Violation {
	return { severity, rule, message, line: lineNumberAt(code, offset) };
}

export function checkHardcodedFrameSizes(code: string): Violation[] {
	const violations: Violation[] = [];
	const patterns: Array<[RegExp, string]> = [
		[/\.frame\(width:\s*(\d+)\)/g, 'Hardcoded frame width'],
		[/\.frame\(height:\s*(\d+)\)/g, 'Hardcoded frame height'],
	];

	for (const [pattern, description] of patterns) {
		let match;
		while ((match = pattern.exec(code)) !== null) {
			violations.push(violationAt(
				code,
				match.index,
				'warning',
				'hardcoded_frame_size',
				`${description}: ${match[1]}pt. Consider using minWidth/minHeight or semantic tokens.`
			));
		}
	}

	return violations;
}

export function checkHardcodedColors(code: string): Violation[] {
	const violations: Violation[] = [];
	// Each spelling is scanned separately; overlapping hits are all reported
	const patterns = [
		/Color\(red:\s*[\d.]+/g,
		/Color\(\.sRGB,\s*red:/g,
		/Color\(hue:\s*[\d.]+/g,
		/UIColor\(red:\s*[\d.]+/g,
	];

	for (const pattern of patterns) {
		let match;
		while ((match = pattern.exec(code)) !== null) {
			violations.push(violationAt(
				code,
				match.index,
				'warning',
				'hardcoded_color',
				'Hardcoded RGB/HSB color. Use semantic colors (e.g., .primary, .systemBackground) or Asset Catalog colors.'
			));
		}
	}

	return violations;
}

export function checkHardcodedFonts(code: string): Violation[] {
	const violations: Violation[] = [];
	const pattern = /\.font\(\.system\(size:\s*(\d+)\)/g;

	let match;
	while ((match = pattern.exec(code)) !== null) {
		violations.push(violationAt(
			code,
			match.index,
			'warning',
			'hardcoded_font_size',
			`Hardcoded font size: ${match[1]}pt. Use semantic text styles (e.g., .body, .headline) for Dynamic Type support.`
		));
	}

	return violations;
}

export function checkForceUnwrapping(code: string): Violation[] {
	const violations: Violation[] = [];
	// `!` that is neither `try!` nor the start of `!=`
	const pattern = /(?<!try)!\s*(?!=)/g;

	let match;
	while ((match = pattern.exec(code)) !== null) {
		if (isInLineComment(code, match.index)) continue;

		violations.push(violationAt(
			code,
			match.index,
			'error',
			'force_unwrapping',
			'Force unwrapping (!) can cause crashes. Use optional binding (if let, guard let) or nil coalescing (??) instead.'
		));
	}

	return violations;
}

export function checkTouchTargetSizes(code: string): Violation[] {
	const violations: Violation[] = [];
	// Button label/action block, then the first fixed frame that follows it
	const pattern = /Button\(.*?\)\s*\{[\s\S]*?\}[\s\S]*?\.frame\(.*?(?:width|height):\s*(\d+)\)/g;

	let match;
	while ((match = pattern.exec(code)) !== null) {
		const size = parseInt(match[1], 10);
		if (size < MIN_TOUCH_TARGET) {
			violations.push(violationAt(
				code,
				match.index,
				'error',
				'touch_target_too_small',
				`Touch target size is ${size}pt, which is below the minimum ${MIN_TOUCH_TARGET}pt. Use .frame(minWidth: ${MIN_TOUCH_TARGET}, minHeight: ${MIN_TOUCH_TARGET}) or add .contentShape(Rectangle()).`
			));
		}
	}

	return violations;
}

export function checkViewModelStateEnum(code: string): Violation[] {
	if (!/class\s+\w+ViewModel/.test(code)) {
		return [];
	}

	if (/enum\s+State\s*\{/.test(code)) {
		return [];
	}

	return [{
		severity: 'warning',
		rule: 'missing_viewmodel_state',
		message: 'ViewModel should expose a State enum (e.g., idle, loading, content, error) for state management.',
	}];
}

export function checkAccessibilityLabels(code: string): Violation[] {
	const violations: Violation[] = [];
	const buttonPattern = /Button\(/g;

	let match;
	while ((match = buttonPattern.exec(code)) !== null) {
		const start = match.index;
		const end = findBlockEnd(code, start);
		const snippet = code.slice(start, advanceCodePoints(code, end, MODIFIER_LOOKAHEAD));

		// Buttons with a text label are fine; image-only ones need a label
		if (snippet.includes('Image(') && !snippet.includes('.accessibilityLabel')) {
			violations.push(violationAt(
				code,
				start,
				'warning',
				'missing_accessibility_label',
				'Image-only button should have .accessibilityLabel() for VoiceOver support.'
			));
		}
	}

	return violations;
}

/**
 * The fixed rule set, in reporting order.
 */
export const SWIFT_RULES: readonly RuleDefinition[] = [
	{
		id: 'hardcoded_frame_size',
		severity: 'warning',
		scope: 'occurrence',
		description: 'Fixed .frame(width:) / .frame(height:) literals instead of flexible sizing or semantic tokens',
		check: checkHardcodedFrameSizes,
	},
	{
		id: 'hardcoded_color',
		severity: 'warning',
		scope: 'occurrence',
		description: 'RGB/HSB color literals instead of semantic or Asset Catalog colors',
		check: checkHardcodedColors,
	},
	{
		id: 'hardcoded_font_size',
		severity: 'warning',
		scope: 'occurrence',
		description: 'Point-size system fonts that ignore Dynamic Type',
		check: checkHardcodedFonts,
	},
	{
		id: 'force_unwrapping',
		severity: 'error',
		scope: 'occurrence',
		description: 'Force unwrap operator outside comments (try! and != are ignored)',
		check: checkForceUnwrapping,
	},
	{
		id: 'touch_target_too_small',
		severity: 'error',
		scope: 'occurrence',
		description: `Buttons framed below the ${MIN_TOUCH_TARGET}pt minimum touch target`,
		check: checkTouchTargetSizes,
	},
	{
		id: 'missing_viewmodel_state',
		severity: 'warning',
		scope: 'file',
		description: 'ViewModel classes without a nested State enum',
		check: checkViewModelStateEnum,
	},
	{
		id: 'missing_accessibility_label',
		severity: 'warning',
		scope: 'occurrence',
		description: 'Image buttons without an .accessibilityLabel',
		check: checkAccessibilityLabels,
	},
];

export type RuleSummary = Omit<RuleDefinition, 'check'>;

export function listRules(): RuleSummary[] {
	return SWIFT_RULES.map(({ id, severity, scope, description }) => ({ id, severity, scope, description }));
}
