// HIG Knowledge Base - guidance for each Swift rule
// Served by the swift_hig_guidance tool

import { RULE_IDS, type RuleId } from './swiftRules.js';

export interface HIGGuideline {
	problem: string;
	commonCauses: string[];
	solution: string;
	example: string;
}

/**
 * Human Interface Guidelines context for each rule
 */
export const HIG_GUIDELINES: Record<RuleId, HIGGuideline> = {
	hardcoded_frame_size: {
		problem: "Views pinned to fixed point sizes",
		commonCauses: [
			"Matching a design mock pixel-for-pixel with .frame(width:)",
			"Sizing text containers that must grow with Dynamic Type",
			"Copying layout numbers between iPhone and iPad layouts"
		],
		solution: `
**Prefer flexible frames:**
.frame(minWidth: 44, maxWidth: .infinity)

**Scale custom sizes with the text style:**
@ScaledMetric(relativeTo: .body) private var iconSize: CGFloat = 24
Image(systemName: "star").frame(width: iconSize, height: iconSize)`,
		example: "Card title truncates at accessibility text sizes because the frame is 200pt wide"
	},

	hardcoded_color: {
		problem: "Colors defined as raw RGB/HSB values",
		commonCauses: [
			"Color(red:green:blue:) copied from a design tool",
			"UIColor(red:green:blue:alpha:) helpers in extensions",
			"No Asset Catalog color set for the brand palette"
		],
		solution: `
**Semantic system colors adapt to Dark Mode and Increase Contrast:**
Text("Title").foregroundStyle(.primary)
background(Color(.systemBackground))

**Brand colors belong in the Asset Catalog:**
Color("AccentBrand")`,
		example: "Label unreadable in Dark Mode because it uses Color(red: 0.1, green: 0.1, blue: 0.1)"
	},

	hardcoded_font_size: {
		problem: "Fonts that ignore Dynamic Type",
		commonCauses: [
			".font(.system(size: 17)) instead of a text style",
			"Custom fonts created without relativeTo:"
		],
		solution: `
**Use text styles:**
.font(.body)
.font(.headline)

**Custom fonts still scale when anchored to a style:**
.font(.custom("Brand-Regular", size: 17, relativeTo: .body))`,
		example: "Body copy stays at 14pt when the user raises their preferred text size"
	},

	force_unwrapping: {
		problem: "Force unwrapping optionals",
		commonCauses: [
			"URL(string:)! for constant URLs",
			"Implicitly trusting dictionary or array lookups",
			"IBOutlet-style assumptions carried into SwiftUI state"
		],
		solution: `
**Optional binding:**
guard let url = URL(string: path) else { return }

**Nil coalescing:**
let name = user.nickname ?? user.fullName`,
		example: "Crash on launch when a remote config value is missing"
	},

	touch_target_too_small: {
		problem: "Tappable area below 44x44pt",
		commonCauses: [
			"Icon buttons framed to the glyph size",
			"Dense toolbars that shrink buttons to fit",
			"Hit area limited to visible pixels of a transparent image"
		],
		solution: `
**Give the control a minimum frame:**
Button(action: close) { Image(systemName: "xmark") }
	.frame(minWidth: 44, minHeight: 44)

**Extend the hit area without changing layout:**
.contentShape(Rectangle())`,
		example: "Close button at 24pt is hard to hit with a thumb"
	},

	missing_viewmodel_state: {
		problem: "ViewModel without an explicit State enum",
		commonCauses: [
			"Separate isLoading / error / items properties that can contradict each other",
			"Views deriving state from several optionals"
		],
		solution: `
**Model the screen as one state value:**
@MainActor final class ProfileViewModel: ObservableObject {
	enum State { case idle, loading, content(Profile), error(String) }
	@Published private(set) var state: State = .idle
}`,
		example: "Spinner and error banner shown at the same time"
	},

	missing_accessibility_label: {
		problem: "Image-only buttons with no VoiceOver label",
		commonCauses: [
			"SF Symbol buttons without text",
			"Custom image assets used as toolbar items"
		],
		solution: `
**Describe the action, not the image:**
Button(action: share) { Image(systemName: "square.and.arrow.up") }
	.accessibilityLabel("Share")

**Or use a Label, which VoiceOver reads even when only the icon shows:**
Label("Share", systemImage: "square.and.arrow.up").labelStyle(.iconOnly)`,
		example: "VoiceOver announces \"square and arrow up, button\""
	},
};

const KEYWORDS: Record<RuleId, string[]> = {
	hardcoded_frame_size: ['frame', 'layout', 'size', 'width', 'height'],
	hardcoded_color: ['color', 'colour', 'dark mode', 'rgb', 'contrast'],
	hardcoded_font_size: ['font', 'dynamic type', 'text size', 'typography'],
	force_unwrapping: ['unwrap', 'optional', 'crash', 'nil'],
	touch_target_too_small: ['touch', 'tap', 'hit area', 'target', 'button'],
	missing_viewmodel_state: ['viewmodel', 'view model', 'state', 'architecture'],
	missing_accessibility_label: ['accessibility', 'voiceover', 'label', 'a11y'],
};

/**
 * Get relevant HIG guidance based on keywords in a query
 */
export function getRelevantKnowledge(query: string): string {
	const message = query.toLowerCase();
	let knowledge = "\n# 📚 Relevant HIG Guidance\n\n";

	const matches = RULE_IDS
		.filter(rule => KEYWORDS[rule].some(keyword => message.includes(keyword)));

	if (matches.length === 0) {
		knowledge += `No guidance matched. Topics: ${RULE_IDS.join(', ')}\n`;
		return knowledge;
	}

	for (const rule of matches) {
		knowledge += formatGuideline(rule, HIG_GUIDELINES[rule]);
	}

	return knowledge;
}

export function formatGuideline(rule: RuleId, guideline: HIGGuideline): string {
	return `### ${rule}
**Problem:** ${guideline.problem}

**Common Causes:**
${guideline.commonCauses.map(c => `- ${c}`).join('\n')}
${guideline.solution}

**Example:** ${guideline.example}

`;
}
