import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { DatabaseHandle } from "../db";
import { addProperty, createTestDatabase } from "../test-utils/createTestDatabase";
import { MaintenanceStore } from "./maintenanceStore";
import { DeleteNotConfirmedError, RecordNotFoundError } from "./storeErrors";

let handle: DatabaseHandle;
let store: MaintenanceStore;

beforeEach(() => {
  handle = createTestDatabase();
  store = new MaintenanceStore(handle.db);
});

afterEach(() => {
  handle.close();
});

describe("MaintenanceStore", () => {
  it("creates open requests with a medium default priority", async () => {
    const property = await addProperty(handle, {
      address: "40 Lakeview Ct",
      unit_number: "2B",
    });

    const request = await store.create({
      property_id: property.id,
      request_type: "Common Area",
      title: "Gate sensor stuck",
      estimated_cost: 120,
    });

    expect(request).toMatchObject({
      property_id: property.id,
      property_address: "40 Lakeview Ct",
      property_unit: "2B",
      request_type: "Common Area",
      priority: "Medium",
      status: "Open",
      estimated_cost: 120,
      actual_cost: null,
      completed_date: null,
    });
  });

  it("lists newest first and filters by status and type", async () => {
    const property = await addProperty(handle);
    const first = await store.create({
      property_id: property.id,
      request_type: "Irrigation",
      title: "Broken sprinkler",
    });
    const second = await store.create({
      property_id: property.id,
      request_type: "Landscaping",
      title: "Dead shrub",
      priority: "Low",
    });
    await store.updateStatus(first.id, "In Progress");

    expect((await store.list()).map((request) => request.id)).toEqual([
      second.id,
      first.id,
    ]);
    expect(
      (await store.list({ status: "Open" })).map((request) => request.id),
    ).toEqual([second.id]);
    expect(
      (await store.list({ request_type: "Irrigation" })).map(
        (request) => request.id,
      ),
    ).toEqual([first.id]);
    expect(
      await store.list({ status: "Open", request_type: "Irrigation" }),
    ).toEqual([]);
  });

  it("stamps completed_date the first time a request is completed", async () => {
    const property = await addProperty(handle);
    const request = await store.create({
      property_id: property.id,
      request_type: "Other",
      title: "Mailbox loose",
    });

    const completed = await store.updateStatus(request.id, "Completed");
    expect(completed.status).toBe("Completed");
    expect(completed.completed_date).not.toBeNull();

    const reopened = await store.updateStatus(request.id, "Open");
    expect(reopened.status).toBe("Open");
    expect(reopened.completed_date).toBe(completed.completed_date);

    const again = await store.update(request.id, {
      status: "Completed",
      actual_cost: 35,
      notes: "Re-secured post",
    });
    expect(again.completed_date).toBe(completed.completed_date);
    expect(again.actual_cost).toBe(35);
    expect(again.notes).toBe("Re-secured post");
  });

  it("returns the record unchanged for an empty update", async () => {
    const property = await addProperty(handle);
    const request = await store.create({
      property_id: property.id,
      request_type: "Other",
      title: "Noise",
    });

    expect(await store.update(request.id, {})).toEqual(request);
  });

  it("reports a missing request", async () => {
    await expect(store.updateStatus(8, "Cancelled")).rejects.toThrow(
      RecordNotFoundError,
    );
    expect(await store.findById(8)).toBeNull();
  });

  it("deletes with the request phrase", async () => {
    const property = await addProperty(handle);
    const request = await store.create({
      property_id: property.id,
      request_type: "Other",
      title: "Graffiti",
    });

    await expect(store.delete(request.id, `DELETE ${request.id}`)).rejects.toThrow(
      DeleteNotConfirmedError,
    );
    await store.delete(request.id, `DELETE REQUEST ${request.id}`);
    expect(await store.findById(request.id)).toBeNull();
  });
});
