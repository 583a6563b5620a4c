// Disjoint sets over arbitrary keys, used to group cells into regions

export class UnionFind<T> {
  private parent = new Map<T, T>();
  private rank = new Map<T, number>();

  add(x: T): void {
    if (!this.parent.has(x)) {
      this.parent.set(x, x);
      this.rank.set(x, 0);
    }
  }

  // Root of x's set; every node visited on the way is re-pointed at it
  find(x: T): T {
    this.add(x);

    const path: T[] = [];
    let node = x;
    for (let up = this.parent.get(node); up !== undefined && up !== node; up = this.parent.get(node)) {
      path.push(node);
      node = up;
    }
    for (const member of path) {
      this.parent.set(member, node);
    }
    return node;
  }

  // Joins the sets of x and y, the shallower tree under the deeper one
  union(x: T, y: T): void {
    const a = this.find(x);
    const b = this.find(y);
    if (a === b) return;

    const rankA = this.rank.get(a) ?? 0;
    const rankB = this.rank.get(b) ?? 0;
    if (rankA < rankB) {
      this.parent.set(a, b);
    } else {
      this.parent.set(b, a);
      if (rankA === rankB) this.rank.set(a, rankA + 1);
    }
  }

  // Members grouped by set, in order of first insertion
  groups(): T[][] {
    const byRoot = new Map<T, T[]>();
    for (const member of this.parent.keys()) {
      const root = this.find(member);
      const group = byRoot.get(root);
      if (group) {
        group.push(member);
      } else {
        byRoot.set(root, [member]);
      }
    }
    return [...byRoot.values()];
  }
}
