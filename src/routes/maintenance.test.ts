import type { Express } from "express";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { DatabaseHandle } from "../db";
import { createTestApp } from "../test-utils/createTestApp";
import { addProperty } from "../test-utils/createTestDatabase";

let app: Express;
let handle: DatabaseHandle;
let propertyId: number;

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  ({ app, handle } = createTestApp());
  propertyId = (await addProperty(handle, { address: "7 Aspen Row" })).id;
});

afterEach(() => {
  handle.close();
  vi.restoreAllMocks();
});

async function createRequest(fields: Record<string, unknown>): Promise<number> {
  const response = await request(app)
    .post("/api/maintenance-requests")
    .send({ property_id: propertyId, ...fields });
  expect(response.status).toBe(201);
  return response.body.request.id;
}

describe("maintenance routes", () => {
  it("creates a request against an existing property", async () => {
    const response = await request(app)
      .post("/api/maintenance-requests")
      .send({
        property_id: propertyId,
        request_type: "Landscaping",
        title: "Trim hedges",
        estimated_cost: 220,
      });

    expect(response.status).toBe(201);
    expect(response.body.request).toMatchObject({
      property_address: "7 Aspen Row",
      priority: "Medium",
      status: "Open",
      estimated_cost: 220,
    });

    const orphan = await request(app)
      .post("/api/maintenance-requests")
      .send({ property_id: 999, request_type: "Other", title: "x" });
    expect(orphan.status).toBe(404);

    const negative = await request(app)
      .post("/api/maintenance-requests")
      .send({
        property_id: propertyId,
        request_type: "Other",
        title: "x",
        estimated_cost: -5,
      });
    expect(negative.status).toBe(400);
  });

  it("filters by status and type, treating All as no filter", async () => {
    const leak = await createRequest({ request_type: "Irrigation", title: "Leak" });
    await createRequest({ request_type: "Common Area", title: "Lights" });
    await request(app)
      .patch(`/api/maintenance-requests/${leak}/status`)
      .send({ status: "In Progress" })
      .expect(200);

    const all = await request(app).get(
      "/api/maintenance-requests?status=All&request_type=All",
    );
    expect(all.body.requests).toHaveLength(2);

    const inProgress = await request(app).get(
      "/api/maintenance-requests?status=In%20Progress",
    );
    expect(
      inProgress.body.requests.map((item: { id: number }) => item.id),
    ).toEqual([leak]);

    const invalid = await request(app).get(
      "/api/maintenance-requests?status=Paused",
    );
    expect(invalid.status).toBe(400);
  });

  it("stamps the completion date through a status change", async () => {
    const id = await createRequest({ request_type: "Other", title: "Sign" });

    const response = await request(app)
      .patch(`/api/maintenance-requests/${id}/status`)
      .send({ status: "Completed" });

    expect(response.body.request.status).toBe("Completed");
    expect(typeof response.body.request.completed_date).toBe("string");

    const bad = await request(app)
      .patch(`/api/maintenance-requests/${id}/status`)
      .send({ status: "Done" });
    expect(bad.status).toBe(400);
  });

  it("edits and deletes a request", async () => {
    const id = await createRequest({ request_type: "Other", title: "Fence" });

    const edited = await request(app)
      .put(`/api/maintenance-requests/${id}`)
      .send({ assigned_to: "Greenway Landscaping", priority: "High" });
    expect(edited.body.request).toMatchObject({
      assigned_to: "Greenway Landscaping",
      priority: "High",
      title: "Fence",
    });

    const refused = await request(app)
      .delete(`/api/maintenance-requests/${id}`)
      .send({ confirmation: `DELETE ${id}` });
    expect(refused.status).toBe(400);
    expect(refused.body.error.expected_confirmation).toBe(`DELETE REQUEST ${id}`);

    await request(app)
      .delete(`/api/maintenance-requests/${id}`)
      .send({ confirmation: `DELETE REQUEST ${id}` })
      .expect(200);
    await request(app).get(`/api/maintenance-requests/${id}`).expect(404);
  });
});
