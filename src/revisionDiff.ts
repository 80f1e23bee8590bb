import * as diff from 'diff';
import { analyzeSwiftCode, type AnalysisSummary } from './swiftAnalyzer.js';
import type { Violation } from './swiftRules.js';

export interface RevisionAnnotation {
  category: 'accessibility' | 'layout' | 'style' | 'safety';
  message: string;
}

export interface RevisionComparison {
  added: number;
  removed: number;
  introduced: Violation[];
  resolved: Violation[];
  annotations: RevisionAnnotation[];
  before: AnalysisSummary;
  after: AnalysisSummary;
}

// Line numbers shift between revisions, so a finding is identified by rule + message
function violationKey(v: Violation): string {
  return `${v.rule}\u0000${v.message}`;
}

// Violations in `from` with no counterpart left in `against`
function unmatched(from: Violation[], against: Violation[]): Violation[] {
  const remaining = new Map<string, number>();
  for (const v of against) {
    const key = violationKey(v);
    remaining.set(key, (remaining.get(key) ?? 0) + 1);
  }

  return from.filter((v) => {
    const key = violationKey(v);
    const left = remaining.get(key) ?? 0;
    if (left > 0) {
      remaining.set(key, left - 1);
      return false;
    }
    return true;
  });
}

export function compareRevisions(before: string, after: string): RevisionComparison {
  const rawDiff = diff.diffLines(before, after);
  let added = 0, removed = 0;
  const annotations: RevisionAnnotation[] = [];

  rawDiff.forEach((change: diff.Change) => {
    if (change.added) {
      added += change.count || 0;
      if (/\.accessibility(Label|Hint|Value)\(/.test(change.value)) {
        annotations.push({ category: 'accessibility', message: 'Accessibility modifiers added' });
      }
      if (/minWidth:|minHeight:|\.contentShape\(/.test(change.value)) {
        annotations.push({ category: 'layout', message: 'Flexible sizing or hit area introduced' });
      }
      if (/\.font\(\.(body|headline|title|caption|footnote|subheadline|callout|largeTitle)/.test(change.value)) {
        annotations.push({ category: 'style', message: 'Semantic text styles added' });
      }
      if (/\bguard let\b|\bif let\b|\?\?/.test(change.value)) {
        annotations.push({ category: 'safety', message: 'Optional binding or nil coalescing added' });
      }
    } else if (change.removed) {
      removed += change.count || 0;
      if (/\.accessibility(Label|Hint|Value)\(/.test(change.value)) {
        annotations.push({ category: 'accessibility', message: 'Accessibility modifiers removed' });
      }
    }
  });

  const beforeResult = analyzeSwiftCode(before);
  const afterResult = analyzeSwiftCode(after);

  return {
    added,
    removed,
    introduced: unmatched(afterResult.violations, beforeResult.violations),
    resolved: unmatched(beforeResult.violations, afterResult.violations),
    annotations,
    before: beforeResult.summary,
    after: afterResult.summary,
  };
}
