import cors from "cors";
import express, { NextFunction, Request, Response } from "express";

import { HoaDatabase } from "./db";
import { createEmailCenterRouter } from "./routes/emailCenter";
import { createMaintenanceRouter } from "./routes/maintenance";
import { createPropertiesRouter } from "./routes/properties";
import { createReportsRouter } from "./routes/reports";
import { createTransactionsRouter } from "./routes/transactions";
import { BatchEmailDispatcher } from "./services/batchEmailDispatcher";
import { DrizzlePropertyStore } from "./services/drizzlePropertyStore";
import { EmailLogStore } from "./services/emailLogStore";
import { EmailTemplateStore } from "./services/emailTemplateStore";
import { MailTransport } from "./services/mailTransport";
import { MaintenanceStore } from "./services/maintenanceStore";
import { ReportService } from "./services/reportService";
import { ResidentStore } from "./services/residentStore";
import { TransactionStore } from "./services/transactionStore";
import { logError } from "./utils/log";

export function createApp(db: HoaDatabase, transport: MailTransport) {
  const propertyStore = new DrizzlePropertyStore(db);
  const residentStore = new ResidentStore(db);
  const maintenanceStore = new MaintenanceStore(db);
  const transactionStore = new TransactionStore(db);
  const templateStore = new EmailTemplateStore(db);
  const emailLogStore = new EmailLogStore(db);
  const reportService = new ReportService(db, maintenanceStore, transactionStore);
  const dispatcher = new BatchEmailDispatcher({
    properties: propertyStore,
    transport,
    emailLog: emailLogStore,
    financialContext: (propertyId) =>
      transactionStore.financialContext(propertyId),
  });

  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      timestamp: Date.now(),
      message: "Backend is running",
    });
  });

  app.use("/api", createReportsRouter(reportService));
  app.use("/api", createPropertiesRouter(propertyStore, residentStore));
  app.use("/api", createMaintenanceRouter(maintenanceStore, propertyStore));
  app.use("/api", createTransactionsRouter(transactionStore, propertyStore));
  app.use(
    "/api",
    createEmailCenterRouter({
      templateStore,
      emailLogStore,
      propertyStore,
      transactionStore,
      dispatcher,
    }),
  );

  app.use(
    (error: unknown, req: Request, res: Response, _next: NextFunction) => {
      // express.json() rejects malformed bodies with a 400 status on the error
      const status =
        error instanceof SyntaxError && "status" in error && error.status === 400
          ? 400
          : 500;
      const message =
        error instanceof Error ? error.message : "Internal server error";

      logError("request_failed", {
        method: req.method,
        path: req.path,
        status,
        message,
      });
      res.status(status).json({
        error: {
          message,
        },
      });
    },
  );

  return app;
}
