import { detectLanguage } from "./language-detector";

describe("detectLanguage", () => {
  it("recognises English", () => {
    expect(
      detectLanguage("The team builds software for the companies that need it"),
    ).toBe("en");
  });

  it("recognises French", () => {
    expect(
      detectLanguage(
        "Nous sommes une agence de conseil et nous accompagnons les entreprises",
      ),
    ).toBe("fr");
  });

  it("is undetermined on too little text", () => {
    expect(detectLanguage("Kubernetes Docker")).toBe("und");
  });

  it("is undetermined without stop words", () => {
    expect(detectLanguage("Kubernetes Docker Terraform Ansible")).toBe("und");
  });
});
