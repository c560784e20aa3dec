import { UnionFind } from "../../../common/helpers/union-find";

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) {
    return 0;
  }
  let shared = 0;
  for (const term of a) {
    if (b.has(term)) {
      shared++;
    }
  }
  return shared / (a.size + b.size - shared);
}

/**
 * Groups term sets whose pairwise Jaccard similarity reaches `threshold`.
 * Returns one cluster id per input, numbered from 0 in order of each
 * cluster's first member.
 */
export function clusterByJaccard(
  termSets: readonly ReadonlySet<string>[],
  threshold: number,
): number[] {
  const forest = new UnionFind(termSets.length);

  for (let i = 0; i < termSets.length; i++) {
    for (let j = i + 1; j < termSets.length; j++) {
      const a = termSets[i];
      const b = termSets[j];
      if (a && b && jaccard(a, b) >= threshold) {
        forest.union(i, j);
      }
    }
  }

  const idsByRoot = new Map<number, number>();
  return termSets.map((_, index) => {
    const root = forest.find(index);
    let id = idsByRoot.get(root);
    if (id === undefined) {
      id = idsByRoot.size;
      idsByRoot.set(root, id);
    }
    return id;
  });
}
