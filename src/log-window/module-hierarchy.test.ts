import { describe, expect, it } from "vitest";
import { ModuleHierarchy } from "./module-hierarchy.js";

describe("ModuleHierarchy", () => {
  it("adds an edge for every prefix of a dotted path", () => {
    const hierarchy = new ModuleHierarchy();
    hierarchy.add("a.b.c");

    expect(hierarchy.snapshot()).toEqual({
      root: ["a"],
      a: ["a.b"],
      "a.b": ["a.b.c"],
    });
  });

  it("groups siblings under their parent", () => {
    const hierarchy = new ModuleHierarchy();
    hierarchy.add("auth.login");
    hierarchy.add("auth.logout");

    const snapshot = hierarchy.snapshot();
    expect(snapshot.root).toEqual(["auth"]);
    expect([...(snapshot.auth ?? [])].sort()).toEqual(["auth.login", "auth.logout"]);
  });

  it("ignores paths it has already seen", () => {
    const hierarchy = new ModuleHierarchy();
    hierarchy.add("db.pool");
    hierarchy.add("db.pool");
    hierarchy.add("db");

    expect(hierarchy.snapshot()).toEqual({ root: ["db"], db: ["db.pool"] });
    expect(hierarchy.has("db.pool")).toBe(true);
  });

  it("returns snapshots detached from later additions", () => {
    const hierarchy = new ModuleHierarchy();
    hierarchy.add("api");
    const before = hierarchy.snapshot();

    hierarchy.add("api.v1");
    before.root?.push("tampered");

    expect(before).toEqual({ root: ["api", "tampered"] });
    expect(hierarchy.snapshot()).toEqual({ root: ["api"], api: ["api.v1"] });
  });

  it("forgets everything on clear", () => {
    const hierarchy = new ModuleHierarchy();
    hierarchy.add("auth.login");
    hierarchy.clear();

    expect(hierarchy.snapshot()).toEqual({});
    expect(hierarchy.has("auth.login")).toBe(false);
    expect(hierarchy.size).toBe(0);
  });
});
