/**
 * Union-Find (Disjoint Set Union) over the integers [0, size).
 *
 * Path compression plus union by rank; tracks the number of components.
 *
 * @example
 * ```typescript
 * const uf = new UnionFind(4);
 * uf.union(0, 1);
 * uf.union(2, 3);
 * uf.componentCount; // 2
 * ```
 */
export class UnionFind {
  private readonly parent: Int32Array;
  private readonly rank: Uint8Array;
  private components: number;

  constructor(size: number) {
    this.parent = new Int32Array(size);
    this.rank = new Uint8Array(size);
    this.components = size;
    for (let i = 0; i < size; i++) {
      this.parent[i] = i;
    }
  }

  get size(): number {
    return this.parent.length;
  }

  get componentCount(): number {
    return this.components;
  }

  /**
   * Root representative of the set containing x.
   */
  find(x: number): number {
    let root = x;
    while (this.parent[root]! !== root) {
      root = this.parent[root]!;
    }
    let node = x;
    while (node !== root) {
      const next = this.parent[node]!;
      this.parent[node] = root;
      node = next;
    }
    return root;
  }

  /**
   * Merge the sets containing x and y. Returns false when already merged.
   */
  union(x: number, y: number): boolean {
    const rootX = this.find(x);
    const rootY = this.find(y);
    if (rootX === rootY) return false;

    const rankX = this.rank[rootX]!;
    const rankY = this.rank[rootY]!;
    if (rankX < rankY) {
      this.parent[rootX] = rootY;
    } else if (rankX > rankY) {
      this.parent[rootY] = rootX;
    } else {
      this.parent[rootY] = rootX;
      this.rank[rootX] = rankX + 1;
    }
    this.components--;
    return true;
  }

  connected(x: number, y: number): boolean {
    return this.find(x) === this.find(y);
  }
}
