import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ProfileError } from "../core/errors.js";
import {
  createSampleProfile,
  loadProfile,
  profileExists,
  saveProfile,
  summarizeProfile,
} from "./profile.js";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "profile-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("loadProfile", () => {
  it("returns null when the file does not exist", async () => {
    expect(await loadProfile(path.join(dir, "missing.json"))).toBeNull();
  });

  it("fills list defaults for a minimal record", async () => {
    const file = path.join(dir, "profile.json");
    await fs.writeFile(file, JSON.stringify({ companyName: " Acme ", industry: "Retail" }));

    expect(await loadProfile(file)).toEqual({
      companyName: "Acme",
      industry: "Retail",
      targetCustomers: [],
      competitors: [],
      strategicGoals: [],
      challenges: [],
      researchFocusAreas: [],
    });
  });

  it("rejects invalid JSON", async () => {
    const file = path.join(dir, "profile.json");
    await fs.writeFile(file, "{ not json");

    await expect(loadProfile(file)).rejects.toBeInstanceOf(ProfileError);
  });

  it("reports each schema issue", async () => {
    const file = path.join(dir, "profile.json");
    await fs.writeFile(file, JSON.stringify({ companyName: "", competitors: "Zapier" }));

    await expect(loadProfile(file)).rejects.toThrow(
      `Caller profile at ${file} is invalid: companyName: String must contain at least 1 character(s); industry: Required; competitors: Expected array, received string`
    );
  });
});

describe("saveProfile", () => {
  it("creates directories, stamps timestamps and round-trips", async () => {
    const file = path.join(dir, "nested", "company_profile.json");
    const saved = await saveProfile(createSampleProfile(), file);

    expect(saved.createdAt).toBeDefined();
    expect(saved.updatedAt).toBe(saved.createdAt);
    expect(await profileExists(file)).toBe(true);
    expect(await loadProfile(file)).toEqual(saved);
  });

  it("keeps the original creation time", async () => {
    const file = path.join(dir, "profile.json");
    const saved = await saveProfile({ ...createSampleProfile(), createdAt: "2024-01-01T00:00:00.000Z" }, file);
    expect(saved.createdAt).toBe("2024-01-01T00:00:00.000Z");
  });
});

describe("summarizeProfile", () => {
  it("lists customers, competitors and goals", () => {
    expect(summarizeProfile(createSampleProfile())).toBe(
      "Northwind Workflow (Enterprise Software) | Customers: Mid-market enterprises, Operations managers | Competitors: Zapier, Microsoft Power Automate, UiPath | Goals: Expand market share, Launch AI-assisted features"
    );
  });
});
