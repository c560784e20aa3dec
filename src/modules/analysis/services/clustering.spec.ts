import { clusterByJaccard, jaccard } from "./clustering";

const set = (...terms: string[]) => new Set(terms);

describe("jaccard", () => {
  it("divides shared terms by the union", () => {
    expect(jaccard(set("a", "b", "c"), set("a", "b", "d"))).toBe(0.5);
  });

  it("is zero for two empty sets", () => {
    expect(jaccard(set(), set())).toBe(0);
  });
});

describe("clusterByJaccard", () => {
  it("groups similar sets and numbers clusters by first member", () => {
    expect(
      clusterByJaccard([set("x", "y"), set("a", "b", "c"), set("a", "b", "d")], 0.3),
    ).toEqual([0, 1, 1]);
  });

  it("links sets transitively", () => {
    expect(
      clusterByJaccard([set("a", "b"), set("b", "c"), set("c", "d")], 0.3),
    ).toEqual([0, 0, 0]);
  });

  it("keeps dissimilar sets apart", () => {
    expect(
      clusterByJaccard([set("a", "b"), set("c", "d"), set("e", "f")], 0.3),
    ).toEqual([0, 1, 2]);
  });

  it("keeps empty keyword sets in their own clusters", () => {
    expect(clusterByJaccard([set(), set()], 0.3)).toEqual([0, 1]);
  });
});
