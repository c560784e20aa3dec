import {
  assessStaticContent,
  isAntiBotChallenge,
  selectInitialStrategy,
  shouldEscalate,
} from "./fetch-strategy";

describe("selectInitialStrategy", () => {
  it("honours explicit hints", () => {
    expect(selectInitialStrategy("static", "https://www.malt.fr/profile/x")).toBe(
      "static",
    );
    expect(selectInitialStrategy("dynamic", "https://acme.test")).toBe("dynamic");
  });

  it("starts auto sources on known script-heavy domains with rendering", () => {
    expect(selectInitialStrategy("auto", "https://www.malt.fr/profile/x")).toBe(
      "dynamic",
    );
    expect(selectInitialStrategy("auto", "https://fr.upwork.com/agencies")).toBe(
      "dynamic",
    );
  });

  it("starts other auto sources static", () => {
    expect(selectInitialStrategy("auto", "https://acme.test")).toBe("static");
  });
});

describe("assessStaticContent", () => {
  it("flags an empty application mount point as a client shell", () => {
    const assessment = assessStaticContent(
      '<html><body><div id="root"></div><script>boot()</script></body></html>',
      10,
    );

    expect(assessment).toEqual({
      visibleTextLength: 0,
      clientShell: true,
      antiBot: false,
      empty: true,
    });
  });

  it("flags a noscript notice asking for javascript", () => {
    const assessment = assessStaticContent(
      "<body><noscript>Please enable JavaScript to continue.</noscript><p>Loading the application interface for you now</p></body>",
      10,
    );

    expect(assessment.clientShell).toBe(true);
    expect(assessment.visibleTextLength).toBe(45);
    expect(assessment.empty).toBe(true);
  });

  it("accepts a page with enough visible text", () => {
    const html = `<body><main><p>${"Acme designs shops. ".repeat(10)}</p></main></body>`;

    expect(assessStaticContent(html, 100)).toEqual({
      visibleTextLength: 199,
      clientShell: false,
      antiBot: false,
      empty: false,
    });
  });

  it("does not treat a filled mount point as a shell", () => {
    const html = `<body><div id="app"><p>${"Server rendered content. ".repeat(8)}</p></div></body>`;

    expect(assessStaticContent(html, 50).clientShell).toBe(false);
  });

  it("reports short pages as empty", () => {
    expect(assessStaticContent("<body><p>Hello</p></body>", 50).empty).toBe(true);
  });

  it("treats a bot-protection interstitial as an empty result", () => {
    const html = `<html><head><title>Attention Required! | Cloudflare</title></head>
      <body><h1>Sorry, you have been blocked</h1></body></html>`;

    expect(assessStaticContent(html, 10)).toEqual({
      visibleTextLength: 28,
      clientShell: false,
      antiBot: true,
      empty: true,
    });
  });
});

describe("isAntiBotChallenge", () => {
  it("recognises challenge markup", () => {
    expect(
      isAntiBotChallenge(
        '<body><form id="challenge-form"></form><p>One moment please.</p></body>',
      ),
    ).toBe(true);
  });

  it("recognises English and French notices", () => {
    expect(
      isAntiBotChallenge("<body><p>Please verify you are human.</p></body>"),
    ).toBe(true);
    expect(
      isAntiBotChallenge(
        "<body><p>Veuillez vérifier que vous êtes un humain.</p></body>",
      ),
    ).toBe(true);
  });

  it("ignores a long page that mentions a captcha", () => {
    const html = `<body><p>${"Our contact form is protected by a captcha. ".repeat(20)}</p></body>`;

    expect(isAntiBotChallenge(html)).toBe(false);
  });

  it("ignores ordinary pages", () => {
    expect(
      isAntiBotChallenge("<body><h1>Acme</h1><p>Cloud consulting</p></body>"),
    ).toBe(false);
  });
});

describe("shouldEscalate", () => {
  const empty = {
    visibleTextLength: 0,
    clientShell: true,
    antiBot: false,
    empty: true,
  };

  it("escalates only auto sources", () => {
    expect(shouldEscalate("auto", empty)).toBe(true);
    expect(shouldEscalate("static", empty)).toBe(false);
  });

  it("keeps non-empty static results", () => {
    expect(
      shouldEscalate("auto", {
        visibleTextLength: 500,
        clientShell: false,
        antiBot: false,
        empty: false,
      }),
    ).toBe(false);
  });
});
