import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_PREFERENCES, DirectoryError, createFileDirectory, loadPreferences, parseDirectory } from "./directory.js";

describe("parseDirectory", () => {
  it("maps snake_case entries onto providers", () => {
    const providers = parseDirectory([
      {
        id: 1,
        name: "Brightside Dental",
        phone: "+15550000001",
        distance_miles: 2.1,
        rating: 4.8,
        availability_score: 0.9,
        specialty: "dentist"
      }
    ]);
    expect(providers).toEqual([
      {
        id: "1",
        name: "Brightside Dental",
        phone: "+15550000001",
        distanceMiles: 2.1,
        rating: 4.8,
        availability: 0.9,
        specialty: "dentist"
      }
    ]);
  });

  it("accepts a wrapped list and the short field names", () => {
    const providers = parseDirectory({
      providers: [{ id: "a", name: "Clinic A", phone: "+15550000002", distance: 0.5, rating: 4.2, availability: 0.95 }]
    });
    expect(providers).toHaveLength(1);
    expect(providers[0].distanceMiles).toBe(0.5);
    expect(providers[0].availability).toBe(0.95);
    expect(providers[0].specialty).toBe("");
  });

  it("rejects entries without a distance", () => {
    expect(() =>
      parseDirectory([{ id: "x", name: "No Distance", phone: "+15550000003", rating: 4, availability_score: 0.5 }])
    ).toThrow(DirectoryError);
  });
});

describe("file-backed directory", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "providers-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("re-reads the file on every load", async () => {
    const path = join(dir, "providers.json");
    const entry = { id: "1", name: "First", phone: "+15550000001", distance_miles: 1, rating: 4, availability_score: 0.5 };
    await writeFile(path, JSON.stringify([entry]));
    const directory = createFileDirectory(path);
    expect((await directory.load()).map((p) => p.name)).toEqual(["First"]);

    await writeFile(path, JSON.stringify([entry, { ...entry, id: "2", name: "Second" }]));
    expect((await directory.load()).map((p) => p.name)).toEqual(["First", "Second"]);
  });

  it("reports a missing file", async () => {
    const path = join(dir, "absent.json");
    await expect(createFileDirectory(path).load()).rejects.toThrow(`providers file not found: ${path}`);
  });

  it("reports unparseable JSON", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "{not json");
    await expect(createFileDirectory(path).load()).rejects.toBeInstanceOf(DirectoryError);
  });

  it("falls back to default preferences when the file is missing", async () => {
    expect(await loadPreferences(join(dir, "nope.json"))).toEqual({
      maxDistance: 5,
      minRating: 4,
      preferredTime: "morning"
    });
  });

  it("fills unset preference fields from the defaults", async () => {
    const path = join(dir, "prefs.json");
    await writeFile(path, JSON.stringify({ min_rating: 4.5 }));
    expect(await loadPreferences(path)).toEqual({ ...DEFAULT_PREFERENCES, minRating: 4.5 });
  });
});
