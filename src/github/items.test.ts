import { describe, it, expect } from "vitest";
import { parseItemReference } from "./items";

describe("parseItemReference", () => {
  it("should expand owner/repo shorthand to a repository", () => {
    expect(parseItemReference("octo/widgets")).toEqual({
      kind: "repository",
      url: "https://github.com/octo/widgets",
      owner: "octo",
      repo: "widgets",
      number: null,
    });
  });

  it("should canonicalize repository URLs", () => {
    expect(parseItemReference("https://www.github.com/octo/widgets.git/")?.url).toBe(
      "https://github.com/octo/widgets",
    );
  });

  it("should recognize issues, pull requests and releases", () => {
    expect(parseItemReference("https://github.com/octo/widgets/issues/12")).toEqual({
      kind: "issue",
      url: "https://github.com/octo/widgets/issues/12",
      owner: "octo",
      repo: "widgets",
      number: 12,
    });
    expect(parseItemReference("https://github.com/octo/widgets/pull/7")).toEqual({
      kind: "pull_request",
      url: "https://github.com/octo/widgets/pull/7",
      owner: "octo",
      repo: "widgets",
      number: 7,
    });
    expect(parseItemReference("https://github.com/octo/widgets/releases")).toEqual({
      kind: "release",
      url: "https://github.com/octo/widgets/releases",
      owner: "octo",
      repo: "widgets",
      number: null,
    });
  });

  it("should reject references it cannot watch", () => {
    for (const reference of [
      "widgets",
      "octo/widgets/extra",
      "https://gitlab.com/octo/widgets",
      "https://github.com/octo",
      "https://github.com/octo/widgets/issues/abc",
      "https://github.com/octo/widgets/issues/0",
      "https://github.com/octo/widgets/issues/12/files",
      "https://github.com/octo/widgets/wiki",
      "ftp://github.com/octo/widgets",
    ]) {
      expect(parseItemReference(reference)).toBeNull();
    }
  });
});
