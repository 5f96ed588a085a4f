import { describe, it, expect } from "vitest";
import { z } from "zod";
import { parseArg, render, resolveProject } from "../lib/helpers.js";
import { FakeProvider } from "./fake-provider.js";

describe("resolveProject", () => {
  it("uses configured defaults when no project is given", async () => {
    const provider = new FakeProvider();
    const ctx = { config: { owner: "octo-org", projectNumber: 3 }, provider };

    const project = await resolveProject(ctx, {});

    expect(project.id).toBe("PVT_1");
    expect(provider.fetchProject).toHaveBeenCalledWith("octo-org", 3);
  });

  it("prefers an explicit owner/number reference", async () => {
    const provider = new FakeProvider();
    const ctx = { config: { owner: "octo-org", projectNumber: 3 }, provider };

    await resolveProject(ctx, { project: "octo-user/9" });

    expect(provider.fetchProject).toHaveBeenCalledWith("octo-user", 9);
  });

  it("rejects before fetching when nothing identifies a project", async () => {
    const provider = new FakeProvider();
    const ctx = { config: {}, provider };

    await expect(resolveProject(ctx, {})).rejects.toThrow(/owner is required/);
    expect(provider.fetchProject).not.toHaveBeenCalled();
  });
});

describe("parseArg", () => {
  it("returns parsed output", () => {
    expect(parseArg(z.coerce.number(), "4", "limit")).toBe(4);
  });

  it("reports failures with the argument label", () => {
    expect(() => parseArg(z.string().min(3, "too short"), "ab", "name")).toThrow(
      "Invalid name: too short",
    );
  });
});

describe("render", () => {
  it("returns JSON or text by format", () => {
    expect(render("json", { a: 1 }, () => "table").content[0].text).toBe('{\n  "a": 1\n}');
    expect(render("table", { a: 1 }, () => "table").content[0].text).toBe("table");
  });
});
