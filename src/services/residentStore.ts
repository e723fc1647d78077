import { and, asc, desc, eq, ne } from "drizzle-orm";

import { HoaDatabase } from "../db";
import { residents, type ResidentRow } from "../db/schema";
import { ResidentRecord } from "../types/hoa";
import { assertDeleteConfirmed } from "../utils/deleteConfirmation";
import { RecordNotFoundError, runStatement } from "./storeErrors";

export type ResidentInput = {
  first_name: string;
  last_name: string;
  email?: string | null;
  phone?: string | null;
  is_owner?: boolean;
  is_primary_contact?: boolean;
  move_in_date?: string | null;
};

export type ResidentUpdate = Partial<ResidentInput>;

function toResidentRecord(row: ResidentRow): ResidentRecord {
  return {
    id: row.id,
    property_id: row.propertyId,
    first_name: row.firstName,
    last_name: row.lastName,
    email: row.email,
    phone: row.phone,
    is_owner: row.isOwner,
    is_primary_contact: row.isPrimaryContact,
    move_in_date: row.moveInDate,
    created_date: row.createdDate,
  };
}

export class ResidentStore {
  constructor(private readonly db: HoaDatabase) {}

  async listByProperty(propertyId: number): Promise<ResidentRecord[]> {
    const rows = runStatement("list residents", () =>
      this.db
        .select()
        .from(residents)
        .where(eq(residents.propertyId, propertyId))
        .orderBy(desc(residents.isPrimaryContact), asc(residents.lastName))
        .all(),
    );
    return rows.map(toResidentRecord);
  }

  async findById(id: number): Promise<ResidentRecord | null> {
    const row = runStatement("find resident", () =>
      this.db.select().from(residents).where(eq(residents.id, id)).get(),
    );
    return row ? toResidentRecord(row) : null;
  }

  async create(
    propertyId: number,
    input: ResidentInput,
  ): Promise<ResidentRecord> {
    const row = runStatement("insert resident", () =>
      this.db
        .insert(residents)
        .values({
          propertyId,
          firstName: input.first_name,
          lastName: input.last_name,
          email: input.email ?? null,
          phone: input.phone ?? null,
          isOwner: input.is_owner ?? true,
          isPrimaryContact: input.is_primary_contact ?? false,
          moveInDate: input.move_in_date ?? null,
          createdDate: new Date().toISOString(),
        })
        .returning()
        .get(),
    );

    if (row.isPrimaryContact) {
      this.clearOtherPrimaryContacts(propertyId, row.id);
    }

    return toResidentRecord(row);
  }

  async update(id: number, input: ResidentUpdate): Promise<ResidentRecord> {
    const changes = {
      firstName: input.first_name,
      lastName: input.last_name,
      email: input.email,
      phone: input.phone,
      isOwner: input.is_owner,
      isPrimaryContact: input.is_primary_contact,
      moveInDate: input.move_in_date,
    };
    if (Object.values(changes).every((value) => value === undefined)) {
      const existing = await this.findById(id);
      if (!existing) {
        throw new RecordNotFoundError("Resident", id);
      }
      return existing;
    }

    const row = runStatement("update resident", () =>
      this.db
        .update(residents)
        .set(changes)
        .where(eq(residents.id, id))
        .returning()
        .get(),
    );

    if (!row) {
      throw new RecordNotFoundError("Resident", id);
    }

    if (input.is_primary_contact) {
      this.clearOtherPrimaryContacts(row.propertyId, row.id);
    }

    return toResidentRecord(row);
  }

  async delete(id: number, confirmation: string | null): Promise<void> {
    assertDeleteConfirmed("RESIDENT", id, confirmation);

    const result = runStatement("delete resident", () =>
      this.db.delete(residents).where(eq(residents.id, id)).run(),
    );
    if (result.changes === 0) {
      throw new RecordNotFoundError("Resident", id);
    }
  }

  // A property has at most one primary contact.
  private clearOtherPrimaryContacts(propertyId: number, keepId: number): void {
    runStatement("clear primary contacts", () =>
      this.db
        .update(residents)
        .set({ isPrimaryContact: false })
        .where(and(eq(residents.propertyId, propertyId), ne(residents.id, keepId)))
        .run(),
    );
  }
}
