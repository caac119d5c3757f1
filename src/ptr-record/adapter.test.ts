/**
 * DNS PTR Record Adapter — Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { InMemoryDnsService } from "../dns/memory-service.js";
import { ParseError, ProtocolError, RemoteError, ValidationError } from "../errors.js";
import { PtrRecordAdapter, isSamePtrRecord } from "./adapter.js";
import { InMemoryPtrRecordState } from "./state.js";
import type { PtrRecordDesired } from "./types.js";

const PTR_ID = "/subscriptions/sub-1/resourceGroups/rg1/providers/Microsoft.Network/dnszones/zone1/PTR/ptr1";

const desired: PtrRecordDesired = {
  name: "ptr1",
  resourceGroupName: "rg1",
  zoneName: "zone1",
  records: ["host1.example.com", "host2.example.com"],
  ttl: 300,
  tags: { env: "prod" },
};

function silentLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

describe("PtrRecordAdapter", () => {
  let dns: InMemoryDnsService;
  let logger: ReturnType<typeof silentLogger>;
  let adapter: PtrRecordAdapter;
  let state: InMemoryPtrRecordState;

  beforeEach(() => {
    dns = new InMemoryDnsService({ subscriptionId: "sub-1" }).addZone("rg1", "zone1");
    logger = silentLogger();
    adapter = new PtrRecordAdapter(dns, { logger });
    state = new InMemoryPtrRecordState();
  });

  describe("createOrUpdate", () => {
    it("creates the record set and refreshes state from the service", async () => {
      const id = await adapter.createOrUpdate(desired, state);

      expect(id).toEqual({ subscriptionId: "sub-1", resourceGroup: "rg1", zoneName: "zone1", recordName: "ptr1" });
      expect(state.getId()).toBe(PTR_ID);
      expect(state.get()).toEqual({
        name: "ptr1",
        resourceGroupName: "rg1",
        zoneName: "zone1",
        ttl: 300,
        etag: expect.any(String),
        records: ["host1.example.com", "host2.example.com"],
        tags: { env: "prod" },
      });
      expect(logger.info).toHaveBeenCalledWith(
        "Creating or updating DNS PTR Record ptr1 in zone zone1 (resource group rg1)",
      );
    });

    it("stores records as a set", async () => {
      await adapter.createOrUpdate(
        { ...desired, records: ["host2.example.com", "host1.example.com", "host2.example.com"] },
        state,
      );
      const remote = await adapter.read(state);
      expect(remote?.records).toEqual(["host1.example.com", "host2.example.com"]);
    });

    it("is idempotent for the same desired state", async () => {
      await adapter.createOrUpdate(desired, state);
      const first = state.get();
      await adapter.createOrUpdate(desired, state);
      const second = state.get();

      expect(dns.size).toBe(1);
      expect(second?.records).toEqual(first?.records);
      expect(second?.ttl).toBe(first?.ttl);
      expect(second?.tags).toEqual(first?.tags);
    });

    it("applies changes to ttl, records and tags", async () => {
      await adapter.createOrUpdate(desired, state);
      await adapter.createOrUpdate({ ...desired, ttl: 60, records: ["host3.example.com"], tags: {} }, state);

      expect(state.get()).toMatchObject({ ttl: 60, records: ["host3.example.com"], tags: {} });
    });

    it("sends the cached etag as If-Match and never If-None-Match", async () => {
      const spy = vi.spyOn(dns, "createOrUpdate");
      await adapter.createOrUpdate(desired, state);
      const etag = state.get()?.etag;
      await adapter.createOrUpdate(desired, state);

      expect(spy.mock.calls[0][0]).toMatchObject({ ifMatch: "", ifNoneMatch: "" });
      expect(spy.mock.calls[1][0]).toMatchObject({ ifMatch: etag, ifNoneMatch: "" });
      expect(spy.mock.calls[0][0].properties).toEqual({
        metadata: { env: "prod" },
        ttl: 300,
        ptrRecords: [{ ptrdname: "host1.example.com" }, { ptrdname: "host2.example.com" }],
      });
    });

    it("prefers an explicit desired etag", async () => {
      await adapter.createOrUpdate(desired, state);
      await expect(adapter.createOrUpdate({ ...desired, etag: "stale" }, state)).rejects.toThrow(
        "Error creating or updating DNS PTR Record ptr1: HTTP 412: Etag mismatch for record set ptr1",
      );
    });

    const moved: Array<[string, PtrRecordDesired]> = [
      ["name", { ...desired, name: "ptr2" }],
      ["zone", { ...desired, zoneName: "zone2" }],
      ["resource group", { ...desired, resourceGroupName: "rg2" }],
    ];

    it.each(moved)("does not send the cached etag when the %s changes", async (_field, next) => {
      dns.addZone("rg1", "zone2").addZone("rg2", "zone1");
      await adapter.createOrUpdate(desired, state);
      const spy = vi.spyOn(dns, "createOrUpdate");

      await adapter.createOrUpdate(next, state);

      expect(spy.mock.calls[0][0]).toMatchObject({ ifMatch: "", ifNoneMatch: "" });
      expect(dns.size).toBe(2);
    });

    it("validates before any remote call", async () => {
      const spy = vi.spyOn(dns, "createOrUpdate");

      await expect(adapter.createOrUpdate({ ...desired, zoneName: "" }, state)).rejects.toBeInstanceOf(
        ValidationError,
      );
      expect(spy).not.toHaveBeenCalled();
      expect(state.getId()).toBeUndefined();
    });

    it("reports a non-success status as a RemoteError", async () => {
      const error = await adapter.createOrUpdate({ ...desired, zoneName: "missing" }, state).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RemoteError);
      if (error instanceof RemoteError) {
        expect(error.statusCode).toBe(404);
        expect(error.message).toBe(
          "Error creating or updating DNS PTR Record ptr1: HTTP 404: The resource 'dnszones/missing' was not found",
        );
      }
      expect(logger.error).toHaveBeenCalledWith(
        "Error creating or updating DNS PTR Record ptr1: HTTP 404: The resource 'dnszones/missing' was not found",
      );
      expect(state.getId()).toBeUndefined();
    });

    it("wraps transport failures", async () => {
      vi.spyOn(dns, "createOrUpdate").mockRejectedValue(new Error("socket hang up"));

      await expect(adapter.createOrUpdate(desired, state)).rejects.toThrow(
        "Error creating or updating DNS PTR Record ptr1: socket hang up",
      );
    });

    it("fails when the service returns no ID", async () => {
      vi.spyOn(dns, "createOrUpdate").mockResolvedValue({ status: 200, etag: "etag-1" });

      await expect(adapter.createOrUpdate(desired, state)).rejects.toThrow(
        new ProtocolError("Cannot read DNS PTR Record ptr1 (resource group rg1) ID"),
      );
      expect(state.getId()).toBeUndefined();
    });

    it("fails when the written record cannot be read back", async () => {
      vi.spyOn(dns, "get").mockResolvedValue({ status: 404 });

      await expect(adapter.createOrUpdate(desired, state)).rejects.toThrow(
        "DNS PTR Record ptr1 (resource group rg1) was not found after it was written",
      );
    });
  });

  describe("isSamePtrRecord", () => {
    const id = { subscriptionId: "sub-1", resourceGroup: "RG1", zoneName: "Zone1", recordName: "PTR1" };

    it("matches resource group, zone and name case-insensitively", () => {
      expect(isSamePtrRecord(id, desired)).toBe(true);
    });

    it("rejects a different record set", () => {
      expect(isSamePtrRecord(id, { ...desired, name: "ptr2" })).toBe(false);
      expect(isSamePtrRecord(id, { ...desired, zoneName: "zone2" })).toBe(false);
      expect(isSamePtrRecord(id, { ...desired, resourceGroupName: "rg2" })).toBe(false);
    });
  });

  describe("read", () => {
    it("returns null without an ID", async () => {
      await expect(adapter.read(state)).resolves.toBeNull();
    });

    it("clears state when the record is gone", async () => {
      state.setId(PTR_ID);

      await expect(adapter.read(state)).resolves.toBeNull();
      expect(state.getId()).toBeUndefined();
      expect(logger.warn).toHaveBeenCalledWith("DNS PTR record ptr1 (resource group rg1) not found, removing from state");
    });

    it("returns the remote view including fqdn", async () => {
      await adapter.createOrUpdate(desired, state);
      const remote = await adapter.read(state);

      expect(remote).toMatchObject({
        id: PTR_ID,
        name: "ptr1",
        fqdn: "ptr1.zone1.",
        ttl: 300,
        records: ["host1.example.com", "host2.example.com"],
      });
    });

    it("raises RemoteError on a server error", async () => {
      state.setId(PTR_ID);
      vi.spyOn(dns, "get").mockResolvedValue({ status: 500, error: new Error("Internal error") });

      await expect(adapter.read(state)).rejects.toThrow("Error reading DNS PTR record ptr1: HTTP 500: Internal error");
      expect(state.getId()).toBe(PTR_ID);
    });

    it("raises ProtocolError when the TTL is missing", async () => {
      state.setId(PTR_ID);
      vi.spyOn(dns, "get").mockResolvedValue({ status: 200, recordSet: { id: PTR_ID, ptrRecords: [] } });

      await expect(adapter.read(state)).rejects.toThrow(ProtocolError);
    });

    it("rejects a malformed stored ID", async () => {
      state.setId("not-an-id");
      await expect(adapter.read(state)).rejects.toBeInstanceOf(ParseError);
    });
  });

  describe("delete", () => {
    it("removes the record set unconditionally", async () => {
      await adapter.createOrUpdate(desired, state);
      const spy = vi.spyOn(dns, "delete");

      await adapter.delete(state);

      expect(spy).toHaveBeenCalledWith({
        resourceGroup: "rg1",
        zoneName: "zone1",
        recordName: "ptr1",
        recordType: "PTR",
        ifMatch: "",
      });
      await expect(adapter.read(state)).resolves.toBeNull();
    });

    it("succeeds when the record is already gone", async () => {
      state.setId(PTR_ID);
      await expect(adapter.delete(state)).resolves.toBeUndefined();
    });

    it("ignores an error reported next to a success status", async () => {
      state.setId(PTR_ID);
      vi.spyOn(dns, "delete").mockResolvedValue({ status: 200, error: new Error("stream closed") });

      await expect(adapter.delete(state)).resolves.toBeUndefined();
    });

    it("raises RemoteError on a conflict", async () => {
      state.setId(PTR_ID);
      const conflict = Object.assign(new Error("Conflict"), { statusCode: 409 });
      vi.spyOn(dns, "delete").mockResolvedValue({ status: 409, error: conflict });

      const error = await adapter.delete(state).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(RemoteError);
      if (error instanceof RemoteError) {
        expect(error.statusCode).toBe(409);
        expect(error.message).toBe("Error deleting DNS PTR Record ptr1: (HTTP 409) Conflict");
        expect(error.cause).toBe(conflict);
      }
    });

    it("requires a tracked ID", async () => {
      await expect(adapter.delete(state)).rejects.toBeInstanceOf(ParseError);
    });
  });

  describe("import", () => {
    it("stores the ID and reads the existing record", async () => {
      await adapter.createOrUpdate(desired, new InMemoryPtrRecordState());

      const id = adapter.import(PTR_ID, state);
      const remote = await adapter.read(state);

      expect(id.recordName).toBe("ptr1");
      expect(state.getId()).toBe(PTR_ID);
      expect(remote?.records).toEqual(["host1.example.com", "host2.example.com"]);
      expect(remote?.tags).toEqual({ env: "prod" });
    });

    it("rejects IDs that do not address a PTR record", () => {
      expect(() =>
        adapter.import("/subscriptions/sub-1/resourceGroups/rg1/providers/Microsoft.Network/dnszones/zone1/A/www", state),
      ).toThrow(ParseError);
      expect(state.getId()).toBeUndefined();
    });
  });
});
