import { and, desc, eq, gt, isNotNull, isNull, sql } from "drizzle-orm";

import { HoaDatabase } from "../db";
import {
  financialTransactions,
  properties,
  type FinancialTransactionRow,
} from "../db/schema";
import {
  FinancialSummary,
  FinancialTransactionRecord,
  PaymentMethod,
  TransactionType,
} from "../types/hoa";
import { assertDeleteConfirmed } from "../utils/deleteConfirmation";
import { roundCents } from "../utils/money";
import { RecordNotFoundError, ValidationError, runStatement } from "./storeErrors";

export const DEFAULT_TRANSACTION_LIMIT = 50;

export type TransactionInput = {
  property_id: number;
  transaction_type: TransactionType;
  category?: string | null;
  amount: number;
  description?: string | null;
  due_date?: string | null;
};

export type TransactionUpdate = {
  transaction_type?: TransactionType;
  category?: string | null;
  amount?: number;
  description?: string | null;
  due_date?: string | null;
  paid_date?: string | null;
  payment_method?: PaymentMethod | null;
  reference_number?: string | null;
};

export type PropertyFinancialContext = {
  current_balance: number;
  // earliest due date among unpaid charges
  due_date: string | null;
};

function toTransactionRecord(row: {
  txn: FinancialTransactionRow;
  address: string;
  unit: string | null;
}): FinancialTransactionRecord {
  const { txn } = row;
  return {
    id: txn.id,
    property_id: txn.propertyId,
    property_address: row.address,
    property_unit: row.unit,
    transaction_type: txn.transactionType,
    category: txn.category,
    amount: txn.amount,
    description: txn.description,
    due_date: txn.dueDate,
    paid_date: txn.paidDate,
    payment_method: txn.paymentMethod,
    reference_number: txn.referenceNumber,
    created_date: txn.createdDate,
  };
}

function assertNonZero(amount: number): void {
  if (amount === 0) {
    throw new ValidationError("Transaction amount must not be zero.");
  }
}

export class TransactionStore {
  constructor(private readonly db: HoaDatabase) {}

  private selectWithProperty() {
    return this.db
      .select({
        txn: financialTransactions,
        address: properties.address,
        unit: properties.unitNumber,
      })
      .from(financialTransactions)
      .innerJoin(properties, eq(financialTransactions.propertyId, properties.id));
  }

  async list(
    limit: number = DEFAULT_TRANSACTION_LIMIT,
  ): Promise<FinancialTransactionRecord[]> {
    const rows = runStatement("list transactions", () =>
      this.selectWithProperty()
        .orderBy(
          desc(financialTransactions.createdDate),
          desc(financialTransactions.id),
        )
        .limit(limit)
        .all(),
    );
    return rows.map(toTransactionRecord);
  }

  async findById(id: number): Promise<FinancialTransactionRecord | null> {
    const row = runStatement("find transaction", () =>
      this.selectWithProperty().where(eq(financialTransactions.id, id)).get(),
    );
    return row ? toTransactionRecord(row) : null;
  }

  async create(input: TransactionInput): Promise<FinancialTransactionRecord> {
    assertNonZero(input.amount);

    const inserted = runStatement("insert transaction", () =>
      this.db
        .insert(financialTransactions)
        .values({
          propertyId: input.property_id,
          transactionType: input.transaction_type,
          category: input.category ?? null,
          amount: input.amount,
          description: input.description ?? null,
          dueDate: input.due_date ?? null,
          createdDate: new Date().toISOString(),
        })
        .returning({ id: financialTransactions.id })
        .get(),
    );
    return this.requireTransaction(inserted.id);
  }

  async update(
    id: number,
    input: TransactionUpdate,
  ): Promise<FinancialTransactionRecord> {
    if (input.amount !== undefined) {
      assertNonZero(input.amount);
    }

    const changes = {
      transactionType: input.transaction_type,
      category: input.category,
      amount: input.amount,
      description: input.description,
      dueDate: input.due_date,
      paidDate: input.paid_date,
      paymentMethod: input.payment_method,
      referenceNumber: input.reference_number,
    };
    if (Object.values(changes).every((value) => value === undefined)) {
      return this.requireTransaction(id);
    }

    const result = runStatement("update transaction", () =>
      this.db
        .update(financialTransactions)
        .set(changes)
        .where(eq(financialTransactions.id, id))
        .run(),
    );
    if (result.changes === 0) {
      throw new RecordNotFoundError("Transaction", id);
    }
    return this.requireTransaction(id);
  }

  async summary(): Promise<FinancialSummary> {
    const amount = financialTransactions.amount;
    const row = runStatement("summarize transactions", () =>
      this.db
        .select({
          total_properties:
            sql<number>`count(distinct ${financialTransactions.propertyId})`.mapWith(
              Number,
            ),
          total_assessments:
            sql<number>`coalesce(sum(case when ${amount} > 0 then ${amount} else 0 end), 0)`.mapWith(
              Number,
            ),
          total_payments:
            sql<number>`coalesce(sum(case when ${amount} < 0 then abs(${amount}) else 0 end), 0)`.mapWith(
              Number,
            ),
          net_balance: sql<number>`coalesce(sum(${amount}), 0)`.mapWith(Number),
        })
        .from(financialTransactions)
        .get(),
    );

    return {
      total_properties: row?.total_properties ?? 0,
      total_assessments: roundCents(row?.total_assessments ?? 0),
      total_payments: roundCents(row?.total_payments ?? 0),
      net_balance: roundCents(row?.net_balance ?? 0),
    };
  }

  async financialContext(propertyId: number): Promise<PropertyFinancialContext> {
    const balance = runStatement("property balance", () =>
      this.db
        .select({
          total: sql<number>`coalesce(sum(${financialTransactions.amount}), 0)`.mapWith(
            Number,
          ),
        })
        .from(financialTransactions)
        .where(eq(financialTransactions.propertyId, propertyId))
        .get(),
    );
    const nextDue = runStatement("property next due date", () =>
      this.db
        .select({
          dueDate: sql<string | null>`min(${financialTransactions.dueDate})`,
        })
        .from(financialTransactions)
        .where(
          and(
            eq(financialTransactions.propertyId, propertyId),
            gt(financialTransactions.amount, 0),
            isNull(financialTransactions.paidDate),
            isNotNull(financialTransactions.dueDate),
          ),
        )
        .get(),
    );

    return {
      current_balance: roundCents(balance?.total ?? 0),
      due_date: nextDue?.dueDate ?? null,
    };
  }

  async delete(id: number, confirmation: string | null): Promise<void> {
    assertDeleteConfirmed("TRANSACTION", id, confirmation);

    const result = runStatement("delete transaction", () =>
      this.db
        .delete(financialTransactions)
        .where(eq(financialTransactions.id, id))
        .run(),
    );
    if (result.changes === 0) {
      throw new RecordNotFoundError("Transaction", id);
    }
  }

  private async requireTransaction(
    id: number,
  ): Promise<FinancialTransactionRecord> {
    const record = await this.findById(id);
    if (!record) {
      throw new RecordNotFoundError("Transaction", id);
    }
    return record;
  }
}
