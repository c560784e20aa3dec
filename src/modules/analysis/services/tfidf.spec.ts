import {
  computeTfIdf,
  documentFrequencies,
  inverseDocumentFrequency,
  scoreDocument,
} from "./tfidf";

describe("tf-idf", () => {
  const corpus = [
    { id: "a", tokens: ["cloud", "api", "cloud"] },
    { id: "b", tokens: ["design", "api"] },
  ];

  it("counts each term once per document", () => {
    expect(documentFrequencies(corpus)).toEqual(
      new Map([
        ["cloud", 1],
        ["api", 2],
        ["design", 1],
      ]),
    );
  });

  it("keeps a term present everywhere at idf 1", () => {
    expect(inverseDocumentFrequency(2, 2)).toBe(1);
    expect(inverseDocumentFrequency(2, 1)).toBeCloseTo(Math.log(1.5) + 1, 12);
  });

  it("ranks keywords by score with rounded values", () => {
    const ranked = computeTfIdf(corpus, 10);

    expect(ranked.get("a")).toEqual([
      { term: "cloud", score: 0.936977 },
      { term: "api", score: 0.333333 },
    ]);
    expect(ranked.get("b")).toEqual([
      { term: "design", score: 0.702733 },
      { term: "api", score: 0.5 },
    ]);
  });

  it("breaks score ties by term", () => {
    const ranked = computeTfIdf([{ id: "c", tokens: ["zeta", "alpha"] }], 10);

    expect(ranked.get("c")).toEqual([
      { term: "alpha", score: 0.5 },
      { term: "zeta", score: 0.5 },
    ]);
  });

  it("orders by term when scores only differ below the rounding precision", () => {
    // raw: zeta 4/13 * idf(27) = 0.5097783, alpha 5/13 * idf(38) = 0.5097778
    const tokens = [
      ...Array<string>(4).fill("zeta"),
      ...Array<string>(5).fill("alpha"),
      ...Array<string>(4).fill("omega"),
    ];
    const df = new Map([
      ["zeta", 27],
      ["alpha", 38],
      ["omega", 53],
    ]);

    expect(scoreDocument(tokens, df, 53)).toEqual([
      { term: "alpha", score: 0.509778 },
      { term: "zeta", score: 0.509778 },
      { term: "omega", score: 0.307692 },
    ]);
  });

  it("keeps only the top k", () => {
    expect(computeTfIdf(corpus, 1).get("a")).toEqual([
      { term: "cloud", score: 0.936977 },
    ]);
  });

  it("uses the closed corpus size when given", () => {
    // N = 3: idf(api) = ln(4/3) + 1
    const ranked = computeTfIdf(corpus, 10, 3);

    expect(ranked.get("b")?.[1]).toEqual({ term: "api", score: 0.643841 });
  });

  it("gives empty documents no keywords", () => {
    expect(computeTfIdf([{ id: "e", tokens: [] }], 10).get("e")).toEqual([]);
  });

  it("is stable across runs", () => {
    expect(computeTfIdf(corpus, 10)).toEqual(computeTfIdf(corpus, 10));
  });
});
