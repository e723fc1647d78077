import { asc, desc, eq, sql } from "drizzle-orm";
import type { AnySQLiteColumn } from "drizzle-orm/sqlite-core";

import { HoaDatabase } from "../db";
import {
  financialTransactions,
  maintenanceRequests,
  properties,
} from "../db/schema";
import {
  FinancialSummary,
  MaintenanceRequestRecord,
} from "../types/hoa";
import { roundCents } from "../utils/money";
import { formatDisplayLabel } from "../utils/propertyLabel";
import { MaintenanceStore } from "./maintenanceStore";
import { runStatement } from "./storeErrors";
import { TransactionStore } from "./transactionStore";

const RECENT_REQUEST_COUNT = 10;

export type DashboardView = {
  total_properties: number;
  open_requests: number;
  net_balance: number;
  recent_requests: MaintenanceRequestRecord[];
};

export type CountBucket = {
  key: string;
  count: number;
};

export type CostBucket = CountBucket & {
  estimated_cost: number;
  actual_cost: number;
};

export type MaintenanceReport = {
  by_status: CountBucket[];
  by_priority: CountBucket[];
  by_type: CostBucket[];
};

export type PropertyBalance = {
  property_id: number;
  display_label: string;
  balance: number;
};

export type MonthlyTotal = {
  month: string; // YYYY-MM
  charges: number;
  payments: number;
};

export type FinancialReport = {
  summary: FinancialSummary;
  by_type: Array<{ key: string; count: number; total: number }>;
  balances: PropertyBalance[];
  monthly: MonthlyTotal[];
};

export class ReportService {
  constructor(
    private readonly db: HoaDatabase,
    private readonly maintenance: MaintenanceStore,
    private readonly transactions: TransactionStore,
  ) {}

  async dashboard(): Promise<DashboardView> {
    const propertyCount = runStatement("count properties", () =>
      this.db
        .select({ count: sql<number>`count(*)`.mapWith(Number) })
        .from(properties)
        .get(),
    );
    const openCount = runStatement("count open requests", () =>
      this.db
        .select({ count: sql<number>`count(*)`.mapWith(Number) })
        .from(maintenanceRequests)
        .where(eq(maintenanceRequests.status, "Open"))
        .get(),
    );
    const summary = await this.transactions.summary();
    const requests = await this.maintenance.list();

    return {
      total_properties: propertyCount?.count ?? 0,
      open_requests: openCount?.count ?? 0,
      net_balance: summary.net_balance,
      recent_requests: requests.slice(0, RECENT_REQUEST_COUNT),
    };
  }

  async maintenanceReport(): Promise<MaintenanceReport> {
    const countBy = (
      column: AnySQLiteColumn,
      operation: string,
    ): CountBucket[] =>
      runStatement(operation, () =>
        this.db
          .select({
            key: sql<string>`${column}`,
            count: sql<number>`count(*)`.mapWith(Number),
          })
          .from(maintenanceRequests)
          .groupBy(column)
          .orderBy(asc(column))
          .all(),
      );

    const byType = runStatement("maintenance cost by type", () =>
      this.db
        .select({
          key: maintenanceRequests.requestType,
          count: sql<number>`count(*)`.mapWith(Number),
          estimated_cost:
            sql<number>`coalesce(sum(${maintenanceRequests.estimatedCost}), 0)`.mapWith(
              Number,
            ),
          actual_cost:
            sql<number>`coalesce(sum(${maintenanceRequests.actualCost}), 0)`.mapWith(
              Number,
            ),
        })
        .from(maintenanceRequests)
        .groupBy(maintenanceRequests.requestType)
        .orderBy(asc(maintenanceRequests.requestType))
        .all(),
    );

    return {
      by_status: countBy(maintenanceRequests.status, "maintenance by status"),
      by_priority: countBy(
        maintenanceRequests.priority,
        "maintenance by priority",
      ),
      by_type: byType.map((bucket) => ({
        ...bucket,
        estimated_cost: roundCents(bucket.estimated_cost),
        actual_cost: roundCents(bucket.actual_cost),
      })),
    };
  }

  async financialReport(): Promise<FinancialReport> {
    const amount = financialTransactions.amount;
    const summary = await this.transactions.summary();

    const byType = runStatement("transactions by type", () =>
      this.db
        .select({
          key: financialTransactions.transactionType,
          count: sql<number>`count(*)`.mapWith(Number),
          total: sql<number>`coalesce(sum(${amount}), 0)`.mapWith(Number),
        })
        .from(financialTransactions)
        .groupBy(financialTransactions.transactionType)
        .orderBy(asc(financialTransactions.transactionType))
        .all(),
    );

    // Outer join so properties with no transactions report a zero balance.
    const balances = runStatement("balances by property", () =>
      this.db
        .select({
          property_id: properties.id,
          address: properties.address,
          unit: properties.unitNumber,
          balance: sql<number>`coalesce(sum(${amount}), 0)`.mapWith(Number),
        })
        .from(properties)
        .leftJoin(
          financialTransactions,
          eq(financialTransactions.propertyId, properties.id),
        )
        .groupBy(properties.id)
        .orderBy(desc(sql`coalesce(sum(${amount}), 0)`), asc(properties.address))
        .all(),
    );

    const month = sql<string>`substr(${financialTransactions.createdDate}, 1, 7)`;
    const monthly = runStatement("monthly transaction totals", () =>
      this.db
        .select({
          month,
          charges:
            sql<number>`coalesce(sum(case when ${amount} > 0 then ${amount} else 0 end), 0)`.mapWith(
              Number,
            ),
          payments:
            sql<number>`coalesce(sum(case when ${amount} < 0 then abs(${amount}) else 0 end), 0)`.mapWith(
              Number,
            ),
        })
        .from(financialTransactions)
        .groupBy(month)
        .orderBy(asc(month))
        .all(),
    );

    return {
      summary,
      by_type: byType.map((bucket) => ({
        ...bucket,
        total: roundCents(bucket.total),
      })),
      balances: balances.map((row) => ({
        property_id: row.property_id,
        display_label: formatDisplayLabel(row.address, row.unit),
        balance: roundCents(row.balance),
      })),
      monthly: monthly.map((row) => ({
        month: row.month,
        charges: roundCents(row.charges),
        payments: roundCents(row.payments),
      })),
    };
  }
}
