import {
  diceSimilarity,
  normalizeName,
  resolveIdentities,
} from "./identity-resolver";
import { makeDocument } from "../../../../test/helpers/factories";

describe("normalizeName", () => {
  it("drops accents, punctuation and trailing legal forms", () => {
    expect(normalizeName("Société Générale, Inc.")).toBe("societe generale");
    expect(normalizeName("Acme Conseil SARL")).toBe("acme conseil");
  });

  it("keeps a name made only of a legal form", () => {
    expect(normalizeName("SARL")).toBe("sarl");
  });
});

describe("diceSimilarity", () => {
  it("compares character bigrams", () => {
    expect(diceSimilarity("night", "nacht")).toBe(0.25);
    expect(diceSimilarity("nova studio", "nova studios")).toBeCloseTo(18 / 19, 10);
  });

  it("handles identical and degenerate inputs", () => {
    expect(diceSimilarity("acme", "acme")).toBe(1);
    expect(diceSimilarity("a", "b")).toBe(0);
  });
});

describe("resolveIdentities", () => {
  const documents = [
    makeDocument({ id: "d1", entityDomain: "acme.test" }),
    makeDocument({
      id: "d2",
      category: "directory",
      entityDomain: null,
      name: "Nova Studio SAS",
    }),
    makeDocument({
      id: "d3",
      category: "directory",
      entityDomain: null,
      name: "Nova Studios",
    }),
    makeDocument({ id: "d4", entityDomain: null, name: "", title: "" }),
    makeDocument({ id: "d5", entityDomain: null, name: "Zen Garden" }),
  ];

  it("keys by domain, then by similar names, then by document", () => {
    expect(resolveIdentities(documents, 0.85)).toEqual(
      new Map([
        ["d1", "domain:acme.test"],
        ["d4", "document:d4"],
        ["d2", "name:nova studio"],
        ["d3", "name:nova studio"],
        ["d5", "name:zen garden"],
      ]),
    );
  });

  it("does not depend on input order", () => {
    const forward = resolveIdentities(documents, 0.85);
    const backward = resolveIdentities([...documents].reverse(), 0.85);

    for (const document of documents) {
      expect(backward.get(document.id)).toBe(forward.get(document.id));
    }
  });

  it("keeps distinct names apart under a strict threshold", () => {
    const keys = resolveIdentities(documents, 0.99);

    expect(keys.get("d2")).toBe("name:nova studio");
    expect(keys.get("d3")).toBe("name:nova studios");
  });
});
