import { describe, it, expect } from 'vitest';
import { compareRevisions } from '../revisionDiff.js';

describe('compareRevisions', () => {
  it('reports resolved and introduced violations', () => {
    const before = 'let a = b!\nlet c = 1\n';
    const after = 'let a = b ?? 0\nlet c = 1\nlet tint = Color(red: 1, green: 0, blue: 0)\n';

    const result = compareRevisions(before, after);

    expect(result.added).toBe(2);
    expect(result.removed).toBe(1);
    expect(result.resolved.map((v) => [v.rule, v.line])).toEqual([['force_unwrapping', 1]]);
    expect(result.introduced.map((v) => [v.rule, v.line])).toEqual([['hardcoded_color', 3]]);
    expect(result.before).toEqual({ total: 1, errors: 1, warnings: 0 });
    expect(result.after).toEqual({ total: 1, errors: 0, warnings: 1 });
    expect(result.annotations).toContainEqual({ category: 'safety', message: 'Optional binding or nil coalescing added' });
  });

  it('does not count moved lines as changes', () => {
    const result = compareRevisions('let a = b!\n', '\n\nlet a = b!\n');

    expect(result.introduced).toEqual([]);
    expect(result.resolved).toEqual([]);
  });

  it('matches repeated findings one for one', () => {
    const result = compareRevisions('a!\n', 'a!\nb!\n');

    expect(result.introduced).toHaveLength(1);
    expect(result.introduced[0].line).toBe(2);
    expect(result.resolved).toEqual([]);
  });

  it('notes accessibility modifiers that were added and removed', () => {
    const labelled = 'Button(action: go) { Image(systemName: "x") }\n.accessibilityLabel("Go")\n';
    const bare = 'Button(action: go) { Image(systemName: "x") }\n';

    expect(compareRevisions(bare, labelled).annotations).toContainEqual({
      category: 'accessibility',
      message: 'Accessibility modifiers added',
    });
    expect(compareRevisions(labelled, bare).annotations).toContainEqual({
      category: 'accessibility',
      message: 'Accessibility modifiers removed',
    });
  });

  it('reports no changes for identical text', () => {
    const code = 'Text("a").font(.system(size: 12))\n';
    const result = compareRevisions(code, code);

    expect(result.added).toBe(0);
    expect(result.removed).toBe(0);
    expect(result.annotations).toEqual([]);
    expect(result.introduced).toEqual([]);
  });
});
