import express, { Request, Response } from "express";

import { PropertyStore } from "../services/propertyStore";
import { RecordNotFoundError } from "../services/storeErrors";
import {
  DEFAULT_TRANSACTION_LIMIT,
  TransactionStore,
  TransactionUpdate,
} from "../services/transactionStore";
import { PAYMENT_METHODS, TRANSACTION_TYPES } from "../types/hoa";
import {
  parseIdParam,
  readConfirmation,
  readNullableEnum,
  readOptionalDate,
  readOptionalEnum,
  readOptionalString,
  readRequiredEnum,
  readRequiredNumber,
  requireBody,
} from "../utils/requestBody";
import { respondWithError } from "./respondWithError";

function readLimit(value: unknown): number {
  const limit = Number(value);
  return typeof value === "string" && Number.isInteger(limit) && limit > 0
    ? limit
    : DEFAULT_TRANSACTION_LIMIT;
}

export function createTransactionsRouter(
  transactionStore: TransactionStore,
  propertyStore: PropertyStore,
) {
  const router = express.Router();

  router.get("/transactions", async (req: Request, res: Response) => {
    try {
      const transactions = await transactionStore.list(
        readLimit(req.query.limit),
      );
      res.json({ transactions });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  router.get("/transactions/summary", async (_req: Request, res: Response) => {
    try {
      const summary = await transactionStore.summary();
      res.json({ summary });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  // -------------------------------------------------------------------------
  // POST /transactions
  //
  // amount is signed: positive for charges (assessments, fees, fines),
  // negative for payments and credits. Zero is rejected.
  // -------------------------------------------------------------------------
  router.post("/transactions", async (req: Request, res: Response) => {
    try {
      const body = requireBody(req.body);
      const propertyId = readRequiredNumber(body, "property_id");
      const input = {
        property_id: propertyId,
        transaction_type: readRequiredEnum(
          body,
          "transaction_type",
          TRANSACTION_TYPES,
        ),
        category: readOptionalString(body, "category"),
        amount: readRequiredNumber(body, "amount"),
        description: readOptionalString(body, "description"),
        due_date: readOptionalDate(body, "due_date"),
      };

      if (!(await propertyStore.findById(propertyId))) {
        throw new RecordNotFoundError("Property", propertyId);
      }

      const transaction = await transactionStore.create(input);
      res.status(201).json({ transaction });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  router.get("/transactions/:id", async (req: Request, res: Response) => {
    try {
      const id = parseIdParam(req.params.id);
      const transaction = await transactionStore.findById(id);
      if (!transaction) {
        throw new RecordNotFoundError("Transaction", id);
      }
      res.json({ transaction });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  router.put("/transactions/:id", async (req: Request, res: Response) => {
    try {
      const id = parseIdParam(req.params.id);
      const body = requireBody(req.body);
      const changes: TransactionUpdate = {
        transaction_type: readOptionalEnum(
          body,
          "transaction_type",
          TRANSACTION_TYPES,
        ),
        category: readOptionalString(body, "category"),
        amount:
          body.amount === undefined
            ? undefined
            : readRequiredNumber(body, "amount"),
        description: readOptionalString(body, "description"),
        due_date: readOptionalDate(body, "due_date"),
        paid_date: readOptionalDate(body, "paid_date"),
        payment_method: readNullableEnum(
          body,
          "payment_method",
          PAYMENT_METHODS,
        ),
        reference_number: readOptionalString(body, "reference_number"),
      };

      const transaction = await transactionStore.update(id, changes);
      res.json({ transaction });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  router.delete("/transactions/:id", async (req: Request, res: Response) => {
    try {
      const id = parseIdParam(req.params.id);
      await transactionStore.delete(id, readConfirmation(req.body));
      res.json({ deleted: { id } });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  return router;
}
