import { Test } from "@nestjs/testing";
import { AggregatorService } from "./aggregator.service";
import {
  PIPELINE_SETTINGS,
  buildPipelineSettings,
} from "../../../common/config/pipeline-settings";
import {
  emptySections,
  makeAnalysis,
  makeDocument,
} from "../../../../test/helpers/factories";

const WEEK_ONE = makeDocument({
  id: "acme-1",
  capturedAt: "2024-03-01T09:00:00.000Z",
  location: "Lyon",
  sections: { ...emptySections(), about: "Old about" },
  technologies: ["Docker"],
  services: ["Cloud"],
  emails: ["hello@acme.test"],
});

const WEEK_TWO = makeDocument({
  id: "acme-2",
  url: "https://acme.test/about",
  capturedAt: "2024-03-08T09:00:00.000Z",
  text: "Acme now ships Kubernetes platforms",
  sections: { ...emptySections(), about: "New about" },
  technologies: ["docker", "Kubernetes"],
  services: ["Cloud", "DevOps"],
  emails: ["sales@acme.test"],
  language: "en",
});

const NOVA = makeDocument({
  id: "nova-1",
  sourceId: "https://nova.test",
  url: "https://nova.test",
  domain: "nova.test",
  entityDomain: "nova.test",
  name: "Nova Studio",
  text: "Nova designs brand identities",
});

const ANALYSES = [
  makeAnalysis({
    documentId: "acme-1",
    keywords: [{ term: "cloud", score: 0.5 }],
    theme: "technology",
    clusterId: 0,
  }),
  makeAnalysis({
    documentId: "acme-2",
    keywords: [
      { term: "design", score: 0.4 },
      { term: "cloud", score: 0.3 },
    ],
    theme: "design",
    clusterId: 1,
  }),
  makeAnalysis({ documentId: "nova-1", theme: "design", clusterId: 1 }),
];

describe("AggregatorService", () => {
  let aggregator: AggregatorService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      providers: [
        AggregatorService,
        {
          provide: PIPELINE_SETTINGS,
          useValue: buildPipelineSettings({ nameSimilarity: 0.85 }),
        },
      ],
    }).compile();
    aggregator = moduleRef.get(AggregatorService);
  });

  it("merges captures of one site taken a week apart", () => {
    const [acme] = aggregator.aggregate([WEEK_ONE, WEEK_TWO], ANALYSES);

    expect(acme).toMatchObject({
      identityKey: "domain:acme.test",
      entityType: "company",
      domain: "acme.test",
      technologies: ["Docker", "Kubernetes"],
      services: ["Cloud", "DevOps"],
      emails: ["hello@acme.test", "sales@acme.test"],
      keywords: ["cloud", "design"],
      clusterIds: [0, 1],
      languages: ["en", "und"],
      documentIds: ["acme-1", "acme-2"],
      sourceUrls: ["https://acme.test", "https://acme.test/about"],
      lastCapturedAt: "2024-03-08T09:00:00.000Z",
    });
  });

  it("takes each text field from the most recent capture that has it", () => {
    const [acme] = aggregator.aggregate([WEEK_TWO, WEEK_ONE], ANALYSES);

    expect(acme?.fields.about).toEqual({
      value: "New about",
      provenance: {
        documentId: "acme-2",
        captureId: "acme-2",
        url: "https://acme.test/about",
        capturedAt: "2024-03-08T09:00:00.000Z",
      },
    });
    expect(acme?.fields.location).toEqual({
      value: "Lyon",
      provenance: {
        documentId: "acme-1",
        captureId: "acme-1",
        url: "https://acme.test",
        capturedAt: "2024-03-01T09:00:00.000Z",
      },
    });
    expect(acme?.fields.jobs).toEqual({ value: "", provenance: null });
  });

  it("breaks a theme tie in favour of the most recent capture", () => {
    const [acme] = aggregator.aggregate([WEEK_ONE, WEEK_TWO], ANALYSES);

    expect(acme?.theme).toBe("design");
  });

  it("takes the majority theme", () => {
    const third = makeDocument({
      id: "acme-3",
      capturedAt: "2024-03-15T09:00:00.000Z",
      text: "Acme third capture",
    });
    const [acme] = aggregator.aggregate(
      [WEEK_ONE, WEEK_TWO, third],
      [
        ...ANALYSES,
        makeAnalysis({ documentId: "acme-3", theme: "technology" }),
      ],
    );

    expect(acme?.theme).toBe("technology");
  });

  it("produces the same profiles whatever the input order", () => {
    const forward = aggregator.aggregate([WEEK_ONE, WEEK_TWO, NOVA], ANALYSES);
    const shuffled = aggregator.aggregate(
      [NOVA, WEEK_TWO, WEEK_ONE],
      [...ANALYSES].reverse(),
    );

    expect(shuffled).toEqual(forward);
    expect(forward.map((profile) => profile.identityKey)).toEqual([
      "domain:acme.test",
      "domain:nova.test",
    ]);
  });

  it("orders captures with equal timestamps by id", () => {
    const early = makeDocument({ id: "x-1", name: "Acme One" });
    const late = makeDocument({ id: "x-2", name: "Acme Two" });

    const [profile] = aggregator.aggregate([late, early], []);

    expect(profile?.name.value).toBe("Acme Two");
    expect(profile?.documentIds).toEqual(["x-1", "x-2"]);
  });

  it("does not type an entity as a directory when its own site was seen", () => {
    const listing = makeDocument({
      id: "listing-1",
      category: "directory",
      url: "https://listing.test/agencies/nova",
      domain: "listing.test",
      entityDomain: "nova.test",
      capturedAt: "2024-03-09T09:00:00.000Z",
      text: "Nova Studio listed agency",
    });

    const [nova] = aggregator.aggregate([listing, NOVA], []);

    expect(nova?.identityKey).toBe("domain:nova.test");
    expect(nova?.entityType).toBe("company");
    expect(nova?.documentIds).toEqual(["nova-1", "listing-1"]);
  });

  it("groups listings without a website by name", () => {
    const listings = [
      makeDocument({
        id: "l-1",
        category: "directory",
        entityDomain: null,
        name: "Nova Studio SAS",
        text: "Nova on the first directory",
      }),
      makeDocument({
        id: "l-2",
        category: "directory",
        entityDomain: null,
        name: "Nova Studio",
        text: "Nova on the second directory",
      }),
    ];

    const profiles = aggregator.aggregate(listings, []);

    expect(profiles).toHaveLength(1);
    expect(profiles[0]).toMatchObject({
      identityKey: "name:nova studio",
      entityType: "directory",
      domain: null,
      theme: null,
      keywords: [],
      documentIds: ["l-1", "l-2"],
    });
  });
});
