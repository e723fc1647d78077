import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { DatabaseHandle } from "../db";
import { addProperty, createTestDatabase } from "../test-utils/createTestDatabase";
import { MaintenanceStore } from "./maintenanceStore";
import { ReportService } from "./reportService";
import { TransactionStore } from "./transactionStore";

let handle: DatabaseHandle;
let maintenance: MaintenanceStore;
let transactions: TransactionStore;
let reports: ReportService;
let alphaId: number;
let betaId: number;
let requestIds: number[];

beforeEach(async () => {
  handle = createTestDatabase();
  maintenance = new MaintenanceStore(handle.db);
  transactions = new TransactionStore(handle.db);
  reports = new ReportService(handle.db, maintenance, transactions);

  alphaId = (await addProperty(handle, { address: "1 Alpha St" })).id;
  betaId = (await addProperty(handle, { address: "2 Beta St" }, null)).id;

  const sprinkler = await maintenance.create({
    property_id: alphaId,
    request_type: "Irrigation",
    priority: "High",
    title: "Sprinkler",
    estimated_cost: 100,
  });
  await maintenance.update(sprinkler.id, { status: "Completed", actual_cost: 90 });
  const hedge = await maintenance.create({
    property_id: alphaId,
    request_type: "Landscaping",
    title: "Hedge",
    estimated_cost: 50,
  });
  const valve = await maintenance.create({
    property_id: betaId,
    request_type: "Irrigation",
    priority: "Low",
    title: "Valve",
  });
  requestIds = [sprinkler.id, hedge.id, valve.id];

  await transactions.create({
    property_id: alphaId,
    transaction_type: "Assessment",
    amount: 200,
  });
  await transactions.create({
    property_id: alphaId,
    transaction_type: "Payment",
    amount: -50,
  });
});

afterEach(() => {
  handle.close();
});

describe("ReportService", () => {
  it("builds the dashboard", async () => {
    const dashboard = await reports.dashboard();

    expect(dashboard.total_properties).toBe(2);
    expect(dashboard.open_requests).toBe(2);
    expect(dashboard.net_balance).toBe(150);
    expect(dashboard.recent_requests.map((request) => request.id)).toEqual([
      ...requestIds,
    ].reverse());
  });

  it("groups maintenance by status, priority and type", async () => {
    expect(await reports.maintenanceReport()).toEqual({
      by_status: [
        { key: "Completed", count: 1 },
        { key: "Open", count: 2 },
      ],
      by_priority: [
        { key: "High", count: 1 },
        { key: "Low", count: 1 },
        { key: "Medium", count: 1 },
      ],
      by_type: [
        { key: "Irrigation", count: 2, estimated_cost: 100, actual_cost: 90 },
        { key: "Landscaping", count: 1, estimated_cost: 50, actual_cost: 0 },
      ],
    });
  });

  it("reports balances for every property, including ones with no activity", async () => {
    const report = await reports.financialReport();

    expect(report.summary).toEqual({
      total_properties: 1,
      total_assessments: 200,
      total_payments: 50,
      net_balance: 150,
    });
    expect(report.by_type).toEqual([
      { key: "Assessment", count: 1, total: 200 },
      { key: "Payment", count: 1, total: -50 },
    ]);
    expect(report.balances).toEqual([
      { property_id: alphaId, display_label: "1 Alpha St", balance: 150 },
      { property_id: betaId, display_label: "2 Beta St", balance: 0 },
    ]);
    expect(report.monthly).toEqual([
      {
        month: new Date().toISOString().slice(0, 7),
        charges: 200,
        payments: 50,
      },
    ]);
  });
});
