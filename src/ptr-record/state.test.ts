import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ValidationError } from "../errors.js";
import { FilePtrRecordState, InMemoryPtrRecordState } from "./state.js";
import type { PtrRecordAttributes } from "./types.js";

const attributes: PtrRecordAttributes = {
  name: "ptr1",
  resourceGroupName: "rg1",
  zoneName: "zone1",
  ttl: 300,
  etag: "etag-1",
  records: ["host1.example.com"],
  tags: { env: "prod" },
};

const PTR_ID = "/subscriptions/sub-1/resourceGroups/rg1/providers/Microsoft.Network/dnszones/zone1/PTR/ptr1";

describe("InMemoryPtrRecordState", () => {
  it("starts empty", () => {
    const state = new InMemoryPtrRecordState();
    expect(state.getId()).toBeUndefined();
    expect(state.get()).toBeUndefined();
    expect(state.toJSON()).toEqual({});
  });

  it("stores the ID and attributes", () => {
    const state = new InMemoryPtrRecordState();
    state.setId(PTR_ID);
    state.set(attributes);
    expect(state.getId()).toBe(PTR_ID);
    expect(state.get()).toEqual(attributes);
    expect(state.toJSON()).toEqual({ id: PTR_ID, attributes });
  });

  it("hands out copies", () => {
    const state = new InMemoryPtrRecordState({ id: PTR_ID, attributes });
    state.get()?.records.push("mutated.example.com");
    expect(state.get()?.records).toEqual(["host1.example.com"]);
  });

  it("clears ID and attributes together", () => {
    const state = new InMemoryPtrRecordState({ id: PTR_ID, attributes });
    state.clear();
    expect(state.getId()).toBeUndefined();
    expect(state.get()).toBeUndefined();
  });
});

describe("FilePtrRecordState", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "ptr-state-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("treats a missing file as empty state", () => {
    const state = FilePtrRecordState.load(join(dir, "state.json"));
    expect(state.getId()).toBeUndefined();
  });

  it("writes through on every mutation and reloads", () => {
    const path = join(dir, "nested", "state.json");
    const state = FilePtrRecordState.load(path);
    state.setId(PTR_ID);
    state.set(attributes);

    expect(JSON.parse(readFileSync(path, "utf-8"))).toEqual({ id: PTR_ID, attributes });

    const reloaded = FilePtrRecordState.load(path);
    expect(reloaded.getId()).toBe(PTR_ID);
    expect(reloaded.get()).toEqual(attributes);

    reloaded.clear();
    expect(JSON.parse(readFileSync(path, "utf-8"))).toEqual({});
  });

  it("rejects a malformed state file", () => {
    const path = join(dir, "state.json");
    writeFileSync(path, JSON.stringify({ id: 42 }));
    expect(() => FilePtrRecordState.load(path)).toThrow(ValidationError);
  });
});
