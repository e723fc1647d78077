import express, { Request, Response } from "express";

import { ReportService } from "../services/reportService";
import { respondWithError } from "./respondWithError";

export function createReportsRouter(reportService: ReportService) {
  const router = express.Router();

  router.get("/dashboard", async (_req: Request, res: Response) => {
    try {
      const dashboard = await reportService.dashboard();
      res.json({ dashboard });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  router.get("/reports/maintenance", async (_req: Request, res: Response) => {
    try {
      const report = await reportService.maintenanceReport();
      res.json({ report });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  router.get("/reports/financial", async (_req: Request, res: Response) => {
    try {
      const report = await reportService.financialReport();
      res.json({ report });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  return router;
}
