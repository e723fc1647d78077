import express, { Request, Response } from "express";

import {
  PrimaryContactInput,
  PropertyInput,
  PropertyStore,
  PropertyUpdate,
} from "../services/propertyStore";
import {
  ResidentInput,
  ResidentStore,
  ResidentUpdate,
} from "../services/residentStore";
import { RecordNotFoundError, ValidationError } from "../services/storeErrors";
import { PROPERTY_TYPES } from "../types/hoa";
import {
  isRecord,
  parseIdParam,
  readConfirmation,
  readOptionalBoolean,
  readOptionalDate,
  readOptionalEnum,
  readOptionalNumber,
  readOptionalString,
  readRequiredString,
  requireBody,
} from "../utils/requestBody";
import { respondWithError } from "./respondWithError";

function readPropertyFields(body: Record<string, unknown>): PropertyUpdate {
  return {
    unit_number: readOptionalString(body, "unit_number"),
    property_type: readOptionalEnum(body, "property_type", PROPERTY_TYPES),
    square_footage: readOptionalNumber(body, "square_footage", { min: 0 }),
    lot_size_sqft: readOptionalNumber(body, "lot_size_sqft", { min: 0 }),
    hoa_fees_monthly: readOptionalNumber(body, "hoa_fees_monthly", { min: 0 }),
  };
}

function readPrimaryContact(
  body: Record<string, unknown>,
): PrimaryContactInput | null {
  const contact = body.primary_contact;
  if (contact === undefined || contact === null) {
    return null;
  }
  if (!isRecord(contact)) {
    throw new ValidationError("Field 'primary_contact' must be an object.");
  }

  return {
    first_name: readRequiredString(contact, "first_name"),
    last_name: readRequiredString(contact, "last_name"),
    email: readOptionalString(contact, "email"),
    phone: readOptionalString(contact, "phone"),
    is_owner: readOptionalBoolean(contact, "is_owner"),
    move_in_date: readOptionalDate(contact, "move_in_date"),
  };
}

function readResidentFields(body: Record<string, unknown>): ResidentUpdate {
  return {
    email: readOptionalString(body, "email"),
    phone: readOptionalString(body, "phone"),
    is_owner: readOptionalBoolean(body, "is_owner"),
    is_primary_contact: readOptionalBoolean(body, "is_primary_contact"),
    move_in_date: readOptionalDate(body, "move_in_date"),
  };
}

export function createPropertiesRouter(
  propertyStore: PropertyStore,
  residentStore: ResidentStore,
) {
  const router = express.Router();

  router.get("/properties", async (_req: Request, res: Response) => {
    try {
      const properties = await propertyStore.list();
      res.json({ properties });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  // -------------------------------------------------------------------------
  // POST /properties
  //
  // Request body:
  //   {
  //     address: string;                 // required
  //     unit_number?: string | null;
  //     property_type?: "Single Family" | "Condo" | "Townhome";
  //     square_footage?: number;
  //     lot_size_sqft?: number;
  //     hoa_fees_monthly?: number;
  //     primary_contact?: { first_name, last_name, email?, phone?, is_owner?, move_in_date? }
  //   }
  // -------------------------------------------------------------------------
  router.post("/properties", async (req: Request, res: Response) => {
    try {
      const body = requireBody(req.body);
      const property: PropertyInput = {
        ...readPropertyFields(body),
        address: readRequiredString(body, "address"),
      };
      const contact = readPrimaryContact(body);

      const record = await propertyStore.create(property, contact);
      res.status(201).json({ property: record });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  router.get("/properties/:id", async (req: Request, res: Response) => {
    try {
      const id = parseIdParam(req.params.id);
      const property = await propertyStore.findById(id);
      if (!property) {
        throw new RecordNotFoundError("Property", id);
      }
      res.json({ property });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  router.put("/properties/:id", async (req: Request, res: Response) => {
    try {
      const id = parseIdParam(req.params.id);
      const body = requireBody(req.body);
      const changes: PropertyUpdate = {
        ...readPropertyFields(body),
        address:
          body.address === undefined
            ? undefined
            : readRequiredString(body, "address"),
      };

      const property = await propertyStore.update(
        id,
        changes,
        readPrimaryContact(body),
      );
      res.json({ property });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  // Shown before the delete form: what else goes with the property.
  router.get(
    "/properties/:id/deletion-summary",
    async (req: Request, res: Response) => {
      try {
        const id = parseIdParam(req.params.id);
        const summary = await propertyStore.deletionSummary(id);
        if (!summary) {
          throw new RecordNotFoundError("Property", id);
        }
        res.json({ summary });
      } catch (error) {
        respondWithError(res, error);
      }
    },
  );

  router.delete("/properties/:id", async (req: Request, res: Response) => {
    try {
      const id = parseIdParam(req.params.id);
      await propertyStore.delete(id, readConfirmation(req.body));
      res.json({ deleted: { id } });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  // -------------------------------------------------------------------------
  // Residents
  // -------------------------------------------------------------------------

  router.get(
    "/properties/:id/residents",
    async (req: Request, res: Response) => {
      try {
        const propertyId = parseIdParam(req.params.id);
        const residents = await residentStore.listByProperty(propertyId);
        res.json({ residents });
      } catch (error) {
        respondWithError(res, error);
      }
    },
  );

  router.post(
    "/properties/:id/residents",
    async (req: Request, res: Response) => {
      try {
        const propertyId = parseIdParam(req.params.id);
        const body = requireBody(req.body);
        if (!(await propertyStore.findById(propertyId))) {
          throw new RecordNotFoundError("Property", propertyId);
        }

        const input: ResidentInput = {
          ...readResidentFields(body),
          first_name: readRequiredString(body, "first_name"),
          last_name: readRequiredString(body, "last_name"),
        };
        const resident = await residentStore.create(propertyId, input);
        res.status(201).json({ resident });
      } catch (error) {
        respondWithError(res, error);
      }
    },
  );

  router.put("/residents/:id", async (req: Request, res: Response) => {
    try {
      const id = parseIdParam(req.params.id);
      const body = requireBody(req.body);
      const resident = await residentStore.update(id, {
        ...readResidentFields(body),
        first_name:
          body.first_name === undefined
            ? undefined
            : readRequiredString(body, "first_name"),
        last_name:
          body.last_name === undefined
            ? undefined
            : readRequiredString(body, "last_name"),
      });
      res.json({ resident });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  router.delete("/residents/:id", async (req: Request, res: Response) => {
    try {
      const id = parseIdParam(req.params.id);
      await residentStore.delete(id, readConfirmation(req.body));
      res.json({ deleted: { id } });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  return router;
}
