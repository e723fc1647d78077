import express, { Request, Response } from "express";

import {
  MaintenanceRequestFilter,
  MaintenanceRequestUpdate,
  MaintenanceStore,
} from "../services/maintenanceStore";
import { PropertyStore } from "../services/propertyStore";
import { RecordNotFoundError } from "../services/storeErrors";
import {
  REQUEST_PRIORITIES,
  REQUEST_STATUSES,
  REQUEST_TYPES,
} from "../types/hoa";
import {
  parseIdParam,
  readConfirmation,
  readOptionalEnum,
  readOptionalNumber,
  readOptionalString,
  readRequiredEnum,
  readRequiredNumber,
  readRequiredString,
  requireBody,
} from "../utils/requestBody";
import { respondWithError } from "./respondWithError";

function readFilter(query: Request["query"]): MaintenanceRequestFilter {
  const filter: Record<string, unknown> = {};
  // "All" is what the filter dropdowns send for no filter
  for (const key of ["status", "request_type"]) {
    const value = query[key];
    if (typeof value === "string" && value !== "" && value !== "All") {
      filter[key] = value;
    }
  }

  return {
    status: readOptionalEnum(filter, "status", REQUEST_STATUSES),
    request_type: readOptionalEnum(filter, "request_type", REQUEST_TYPES),
  };
}

export function createMaintenanceRouter(
  maintenanceStore: MaintenanceStore,
  propertyStore: PropertyStore,
) {
  const router = express.Router();

  router.get("/maintenance-requests", async (req: Request, res: Response) => {
    try {
      const requests = await maintenanceStore.list(readFilter(req.query));
      res.json({ requests });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  router.post("/maintenance-requests", async (req: Request, res: Response) => {
    try {
      const body = requireBody(req.body);
      const propertyId = readRequiredNumber(body, "property_id");
      const input = {
        property_id: propertyId,
        request_type: readRequiredEnum(body, "request_type", REQUEST_TYPES),
        priority: readOptionalEnum(body, "priority", REQUEST_PRIORITIES),
        title: readRequiredString(body, "title"),
        description: readOptionalString(body, "description"),
        reported_by: readOptionalString(body, "reported_by"),
        estimated_cost: readOptionalNumber(body, "estimated_cost", { min: 0 }),
      };

      if (!(await propertyStore.findById(propertyId))) {
        throw new RecordNotFoundError("Property", propertyId);
      }

      const request = await maintenanceStore.create(input);
      res.status(201).json({ request });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  router.get(
    "/maintenance-requests/:id",
    async (req: Request, res: Response) => {
      try {
        const id = parseIdParam(req.params.id);
        const request = await maintenanceStore.findById(id);
        if (!request) {
          throw new RecordNotFoundError("Maintenance request", id);
        }
        res.json({ request });
      } catch (error) {
        respondWithError(res, error);
      }
    },
  );

  router.put(
    "/maintenance-requests/:id",
    async (req: Request, res: Response) => {
      try {
        const id = parseIdParam(req.params.id);
        const body = requireBody(req.body);
        const changes: MaintenanceRequestUpdate = {
          request_type: readOptionalEnum(body, "request_type", REQUEST_TYPES),
          priority: readOptionalEnum(body, "priority", REQUEST_PRIORITIES),
          title:
            body.title === undefined
              ? undefined
              : readRequiredString(body, "title"),
          description: readOptionalString(body, "description"),
          assigned_to: readOptionalString(body, "assigned_to"),
          estimated_cost: readOptionalNumber(body, "estimated_cost", {
            min: 0,
          }),
          actual_cost: readOptionalNumber(body, "actual_cost", { min: 0 }),
          status: readOptionalEnum(body, "status", REQUEST_STATUSES),
          notes: readOptionalString(body, "notes"),
        };

        const request = await maintenanceStore.update(id, changes);
        res.json({ request });
      } catch (error) {
        respondWithError(res, error);
      }
    },
  );

  // Quick status update from the request list.
  router.patch(
    "/maintenance-requests/:id/status",
    async (req: Request, res: Response) => {
      try {
        const id = parseIdParam(req.params.id);
        const body = requireBody(req.body);
        const status = readRequiredEnum(body, "status", REQUEST_STATUSES);
        const request = await maintenanceStore.updateStatus(id, status);
        res.json({ request });
      } catch (error) {
        respondWithError(res, error);
      }
    },
  );

  router.delete(
    "/maintenance-requests/:id",
    async (req: Request, res: Response) => {
      try {
        const id = parseIdParam(req.params.id);
        await maintenanceStore.delete(id, readConfirmation(req.body));
        res.json({ deleted: { id } });
      } catch (error) {
        respondWithError(res, error);
      }
    },
  );

  return router;
}
