import { and, desc, eq, sql, type SQL } from "drizzle-orm";

import { HoaDatabase } from "../db";
import {
  maintenanceRequests,
  properties,
  type MaintenanceRequestRow,
} from "../db/schema";
import {
  MaintenanceRequestRecord,
  RequestPriority,
  RequestStatus,
  RequestType,
} from "../types/hoa";
import { assertDeleteConfirmed } from "../utils/deleteConfirmation";
import { RecordNotFoundError, runStatement } from "./storeErrors";

export type MaintenanceRequestInput = {
  property_id: number;
  request_type: RequestType;
  priority?: RequestPriority;
  title: string;
  description?: string | null;
  reported_by?: string | null;
  estimated_cost?: number | null;
};

export type MaintenanceRequestUpdate = {
  request_type?: RequestType;
  priority?: RequestPriority;
  title?: string;
  description?: string | null;
  assigned_to?: string | null;
  estimated_cost?: number | null;
  actual_cost?: number | null;
  status?: RequestStatus;
  notes?: string | null;
};

export type MaintenanceRequestFilter = {
  status?: RequestStatus;
  request_type?: RequestType;
};

function toRequestRecord(row: {
  request: MaintenanceRequestRow;
  address: string;
  unit: string | null;
}): MaintenanceRequestRecord {
  const { request } = row;
  return {
    id: request.id,
    property_id: request.propertyId,
    property_address: row.address,
    property_unit: row.unit,
    request_type: request.requestType,
    priority: request.priority,
    title: request.title,
    description: request.description,
    reported_by: request.reportedBy,
    assigned_to: request.assignedTo,
    estimated_cost: request.estimatedCost,
    actual_cost: request.actualCost,
    status: request.status,
    notes: request.notes,
    created_date: request.createdDate,
    completed_date: request.completedDate,
  };
}

/**
 * Status moves freely between Open, In Progress, Completed and Cancelled.
 * The only side effect is stamping completed_date the first time a request
 * is completed.
 */
function completedDateFor(
  status: RequestStatus | undefined,
  now: string,
): SQL | undefined {
  if (status !== "Completed") {
    return undefined;
  }
  return sql`coalesce(${maintenanceRequests.completedDate}, ${now})`;
}

export class MaintenanceStore {
  constructor(private readonly db: HoaDatabase) {}

  private selectWithProperty() {
    return this.db
      .select({
        request: maintenanceRequests,
        address: properties.address,
        unit: properties.unitNumber,
      })
      .from(maintenanceRequests)
      .innerJoin(properties, eq(maintenanceRequests.propertyId, properties.id));
  }

  async list(
    filter: MaintenanceRequestFilter = {},
  ): Promise<MaintenanceRequestRecord[]> {
    const conditions: SQL[] = [];
    if (filter.status) {
      conditions.push(eq(maintenanceRequests.status, filter.status));
    }
    if (filter.request_type) {
      conditions.push(eq(maintenanceRequests.requestType, filter.request_type));
    }

    const rows = runStatement("list maintenance requests", () =>
      this.selectWithProperty()
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(
          desc(maintenanceRequests.createdDate),
          desc(maintenanceRequests.id),
        )
        .all(),
    );
    return rows.map(toRequestRecord);
  }

  async findById(id: number): Promise<MaintenanceRequestRecord | null> {
    const row = runStatement("find maintenance request", () =>
      this.selectWithProperty().where(eq(maintenanceRequests.id, id)).get(),
    );
    return row ? toRequestRecord(row) : null;
  }

  async create(
    input: MaintenanceRequestInput,
  ): Promise<MaintenanceRequestRecord> {
    const inserted = runStatement("insert maintenance request", () =>
      this.db
        .insert(maintenanceRequests)
        .values({
          propertyId: input.property_id,
          requestType: input.request_type,
          priority: input.priority ?? "Medium",
          title: input.title,
          description: input.description ?? null,
          reportedBy: input.reported_by ?? null,
          estimatedCost: input.estimated_cost ?? null,
          status: "Open",
          createdDate: new Date().toISOString(),
        })
        .returning({ id: maintenanceRequests.id })
        .get(),
    );
    return this.requireRequest(inserted.id);
  }

  async update(
    id: number,
    input: MaintenanceRequestUpdate,
  ): Promise<MaintenanceRequestRecord> {
    const changes = {
      requestType: input.request_type,
      priority: input.priority,
      title: input.title,
      description: input.description,
      assignedTo: input.assigned_to,
      estimatedCost: input.estimated_cost,
      actualCost: input.actual_cost,
      status: input.status,
      notes: input.notes,
    };
    if (Object.values(changes).every((value) => value === undefined)) {
      return this.requireRequest(id);
    }

    const result = runStatement("update maintenance request", () =>
      this.db
        .update(maintenanceRequests)
        .set({
          ...changes,
          completedDate: completedDateFor(
            input.status,
            new Date().toISOString(),
          ),
        })
        .where(eq(maintenanceRequests.id, id))
        .run(),
    );
    if (result.changes === 0) {
      throw new RecordNotFoundError("Maintenance request", id);
    }
    return this.requireRequest(id);
  }

  async updateStatus(
    id: number,
    status: RequestStatus,
  ): Promise<MaintenanceRequestRecord> {
    return this.update(id, { status });
  }

  async delete(id: number, confirmation: string | null): Promise<void> {
    assertDeleteConfirmed("REQUEST", id, confirmation);

    const result = runStatement("delete maintenance request", () =>
      this.db
        .delete(maintenanceRequests)
        .where(eq(maintenanceRequests.id, id))
        .run(),
    );
    if (result.changes === 0) {
      throw new RecordNotFoundError("Maintenance request", id);
    }
  }

  private async requireRequest(id: number): Promise<MaintenanceRequestRecord> {
    const record = await this.findById(id);
    if (!record) {
      throw new RecordNotFoundError("Maintenance request", id);
    }
    return record;
  }
}
