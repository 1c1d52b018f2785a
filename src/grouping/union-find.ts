/**
 * Disjoint-set forest with path compression and union by rank. The root of
 * every set is kept as its lexicographically smallest member so cluster keys
 * do not depend on union order.
 */
export class UnionFind {
  private readonly parent = new Map<string, string>();
  private readonly rank = new Map<string, number>();
  private readonly smallest = new Map<string, string>();

  add(item: string): void {
    if (this.parent.has(item)) return;
    this.parent.set(item, item);
    this.rank.set(item, 0);
    this.smallest.set(item, item);
  }

  has(item: string): boolean {
    return this.parent.has(item);
  }

  find(item: string): string {
    const parent = this.parent.get(item);
    if (parent === undefined) {
      throw new Error(`Unknown union-find member: ${item}`);
    }
    if (parent === item) return item;
    const root = this.find(parent);
    this.parent.set(item, root);
    return root;
  }

  union(a: string, b: string): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return;

    const rankA = this.rank.get(rootA) ?? 0;
    const rankB = this.rank.get(rootB) ?? 0;
    const [child, root] = rankA < rankB ? [rootA, rootB] : [rootB, rootA];

    this.parent.set(child, root);
    if (rankA === rankB) {
      this.rank.set(root, rankA + 1);
    }

    const smallestA = this.smallest.get(rootA) ?? rootA;
    const smallestB = this.smallest.get(rootB) ?? rootB;
    this.smallest.set(root, smallestA < smallestB ? smallestA : smallestB);
  }

  /** Smallest member of the item's set. */
  representative(item: string): string {
    const root = this.find(item);
    return this.smallest.get(root) ?? root;
  }

  clusters(): Map<string, string[]> {
    const result = new Map<string, string[]>();
    for (const item of this.parent.keys()) {
      const key = this.representative(item);
      const members = result.get(key);
      if (members) {
        members.push(item);
      } else {
        result.set(key, [item]);
      }
    }
    for (const members of result.values()) {
      members.sort((x, y) => (x < y ? -1 : x > y ? 1 : 0));
    }
    return result;
  }
}
