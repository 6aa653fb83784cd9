import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { createCategoryCatalog, defaultCategoryCatalog, loadCategoryCatalog } from "./categoryCatalog";

describe("category catalog", () => {
  const tmpFiles: string[] = [];

  afterEach(() => {
    for (const file of tmpFiles.splice(0)) fs.rmSync(file, { force: true });
  });

  function writeCatalog(contents: unknown): string {
    const file = path.join(os.tmpdir(), `categories-${process.pid}-${tmpFiles.length}.json`);
    fs.writeFileSync(file, JSON.stringify(contents));
    tmpFiles.push(file);
    return file;
  }

  it("ships the bundled categories", () => {
    const catalog = defaultCategoryCatalog({});
    expect(catalog.findCategory("home-decor-fragile")?.defaultUpliftRate.toString()).toBe("0.25");
    expect(catalog.list()).toHaveLength(8);
  });

  it("returns undefined for an unknown id", () => {
    expect(defaultCategoryCatalog({}).findCategory("spaceships")).toBeUndefined();
  });

  it("loads the file named by FINANCE_CATEGORIES_FILE", () => {
    const file = writeCatalog([{ id: "ceramics", name: "Ceramics", defaultUpliftRate: "0.3" }]);
    const catalog = defaultCategoryCatalog({ FINANCE_CATEGORIES_FILE: file });
    expect(catalog.list().map((c) => c.id)).toEqual(["ceramics"]);
    expect(loadCategoryCatalog(file).findCategory("ceramics")?.name).toBe("Ceramics");
  });

  it("rejects duplicate ids and out-of-range rates", () => {
    expect(() =>
      createCategoryCatalog([
        { id: "a", name: "A", defaultUpliftRate: "0.1" },
        { id: "a", name: "A again", defaultUpliftRate: "0.2" },
      ])
    ).toThrow("Duplicate category id: a");
    expect(() => createCategoryCatalog([{ id: "b", name: "B", defaultUpliftRate: "1.5" }])).toThrow();
  });
});
