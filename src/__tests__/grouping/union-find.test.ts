import { describe, it, expect } from 'vitest';
import { UnionFind } from '../../grouping/union-find.js';
import { clusterCoChangedFiles } from '../../grouping/co-change.js';

describe('UnionFind', () => {
  it('uses the smallest member as the representative whatever the union order', () => {
    const forest = new UnionFind();
    ['c', 'b', 'a', 'd'].forEach(item => forest.add(item));
    forest.union('c', 'b');
    forest.union('b', 'a');

    expect(forest.representative('c')).toBe('a');
    expect(forest.find('c')).toBe(forest.find('a'));
    expect(forest.clusters()).toEqual(new Map([['a', ['a', 'b', 'c']], ['d', ['d']]]));
  });

  it('throws on an unknown member', () => {
    expect(() => new UnionFind().find('x')).toThrow('Unknown union-find member: x');
  });
});

describe('clusterCoChangedFiles', () => {
  it('ignores pairs naming files outside the change', () => {
    const forest = clusterCoChangedFiles(
      ['a.ts', 'b.ts'],
      { pairs: [{ a: 'a.ts', b: 'z.ts', count: 10 }, { a: 'a.ts', b: 'b.ts', count: 3 }], commitsScanned: 20 },
      2
    );
    expect(forest.has('z.ts')).toBe(false);
    expect(forest.representative('b.ts')).toBe('a.ts');
  });

  it('leaves every file alone without history', () => {
    const forest = clusterCoChangedFiles(['a.ts', 'b.ts'], undefined, 0);
    expect(forest.clusters().size).toBe(2);
  });
});
