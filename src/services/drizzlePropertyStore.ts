import { and, asc, eq, sql } from "drizzle-orm";

import { HoaDatabase } from "../db";
import {
  financialTransactions,
  maintenanceRequests,
  properties,
  residents,
  type NewPropertyRow,
  type PropertyRow,
  type ResidentRow,
} from "../db/schema";
import { PropertyDeletionSummary, PropertyRecord } from "../types/hoa";
import {
  assertDeleteConfirmed,
  deleteConfirmationPhrase,
} from "../utils/deleteConfirmation";
import { formatContactName, formatDisplayLabel } from "../utils/propertyLabel";
import {
  PrimaryContactInput,
  PropertyInput,
  PropertyStore,
  PropertyUpdate,
} from "./propertyStore";
import { RecordNotFoundError, runStatement } from "./storeErrors";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function nowIso(): string {
  return new Date().toISOString();
}

function toPropertyRecord(
  row: PropertyRow,
  contact: ResidentRow | null,
): PropertyRecord {
  return {
    id: row.id,
    address: row.address,
    unit_number: row.unitNumber,
    display_label: formatDisplayLabel(row.address, row.unitNumber),
    property_type: row.propertyType,
    square_footage: row.squareFootage,
    lot_size_sqft: row.lotSizeSqft,
    hoa_fees_monthly: row.hoaFeesMonthly,
    created_date: row.createdDate,
    updated_date: row.updatedDate,
    primary_contact: contact
      ? {
          resident_id: contact.id,
          first_name: contact.firstName,
          last_name: contact.lastName,
          email: contact.email,
          phone: contact.phone,
          is_owner: contact.isOwner,
          move_in_date: contact.moveInDate,
        }
      : null,
  };
}

function toPropertyColumns(input: PropertyUpdate): Partial<NewPropertyRow> {
  return {
    address: input.address,
    unitNumber: input.unit_number,
    propertyType: input.property_type,
    squareFootage: input.square_footage,
    lotSizeSqft: input.lot_size_sqft,
    hoaFeesMonthly: input.hoa_fees_monthly,
  };
}

// ---------------------------------------------------------------------------
// DrizzlePropertyStore
// ---------------------------------------------------------------------------

export class DrizzlePropertyStore implements PropertyStore {
  constructor(private readonly db: HoaDatabase) {}

  /**
   * Properties outer-joined with their primary contact. A property without a
   * primary resident still comes back, with `contact` null.
   */
  private selectWithContact() {
    return this.db
      .select({ property: properties, contact: residents })
      .from(properties)
      .leftJoin(
        residents,
        and(
          eq(residents.propertyId, properties.id),
          eq(residents.isPrimaryContact, true),
        ),
      );
  }

  async list(): Promise<PropertyRecord[]> {
    const rows = runStatement("list properties", () =>
      this.selectWithContact()
        .orderBy(asc(properties.address), asc(properties.unitNumber))
        .all(),
    );
    return rows.map((row) => toPropertyRecord(row.property, row.contact));
  }

  async findById(id: number): Promise<PropertyRecord | null> {
    const row = runStatement("find property", () =>
      this.selectWithContact().where(eq(properties.id, id)).get(),
    );
    return row ? toPropertyRecord(row.property, row.contact) : null;
  }

  async findByDisplayLabel(label: string): Promise<PropertyRecord | null> {
    const records = await this.list();
    return records.find((record) => record.display_label === label) ?? null;
  }

  /**
   * The property and its primary contact are two separate statements; if the
   * contact insert fails the property stays.
   */
  async create(
    property: PropertyInput,
    contact?: PrimaryContactInput | null,
  ): Promise<PropertyRecord> {
    const now = nowIso();
    const inserted = runStatement("insert property", () =>
      this.db
        .insert(properties)
        .values({
          address: property.address,
          unitNumber: property.unit_number ?? null,
          propertyType: property.property_type ?? null,
          squareFootage: property.square_footage ?? null,
          lotSizeSqft: property.lot_size_sqft ?? null,
          hoaFeesMonthly: property.hoa_fees_monthly ?? null,
          createdDate: now,
          updatedDate: now,
        })
        .returning({ id: properties.id })
        .get(),
    );

    if (contact) {
      this.insertPrimaryContact(inserted.id, contact, now);
    }

    return this.requireProperty(inserted.id);
  }

  async update(
    id: number,
    property: PropertyUpdate,
    contact?: PrimaryContactInput | null,
  ): Promise<PropertyRecord> {
    const existing = await this.findById(id);
    if (!existing) {
      throw new RecordNotFoundError("Property", id);
    }

    const now = nowIso();
    runStatement("update property", () =>
      this.db
        .update(properties)
        .set({ ...toPropertyColumns(property), updatedDate: now })
        .where(eq(properties.id, id))
        .run(),
    );

    if (contact && existing.primary_contact) {
      const residentId = existing.primary_contact.resident_id;
      runStatement("update primary contact", () =>
        this.db
          .update(residents)
          .set({
            firstName: contact.first_name,
            lastName: contact.last_name,
            email: contact.email,
            phone: contact.phone,
            isOwner: contact.is_owner,
            moveInDate: contact.move_in_date,
          })
          .where(eq(residents.id, residentId))
          .run(),
      );
    } else if (contact) {
      this.insertPrimaryContact(id, contact, now);
    }

    return this.requireProperty(id);
  }

  async deletionSummary(id: number): Promise<PropertyDeletionSummary | null> {
    const property = await this.findById(id);
    if (!property) {
      return null;
    }

    const maintenance = runStatement("count maintenance requests", () =>
      this.db
        .select({ count: sql<number>`count(*)`.mapWith(Number) })
        .from(maintenanceRequests)
        .where(eq(maintenanceRequests.propertyId, id))
        .get(),
    );
    const transactions = runStatement("count transactions", () =>
      this.db
        .select({ count: sql<number>`count(*)`.mapWith(Number) })
        .from(financialTransactions)
        .where(eq(financialTransactions.propertyId, id))
        .get(),
    );

    return {
      property_id: property.id,
      address: property.address,
      unit_number: property.unit_number,
      hoa_fees_monthly: property.hoa_fees_monthly,
      primary_contact_name: property.primary_contact
        ? formatContactName(
            property.primary_contact.first_name,
            property.primary_contact.last_name,
          )
        : null,
      maintenance_count: maintenance?.count ?? 0,
      transaction_count: transactions?.count ?? 0,
      confirmation_phrase: deleteConfirmationPhrase("PROPERTY", id),
    };
  }

  /**
   * Residents, maintenance requests and transactions go with the property
   * through ON DELETE CASCADE.
   */
  async delete(id: number, confirmation: string | null): Promise<void> {
    assertDeleteConfirmed("PROPERTY", id, confirmation);

    const result = runStatement("delete property", () =>
      this.db.delete(properties).where(eq(properties.id, id)).run(),
    );
    if (result.changes === 0) {
      throw new RecordNotFoundError("Property", id);
    }
  }

  private insertPrimaryContact(
    propertyId: number,
    contact: PrimaryContactInput,
    now: string,
  ): void {
    runStatement("insert primary contact", () =>
      this.db
        .insert(residents)
        .values({
          propertyId,
          firstName: contact.first_name,
          lastName: contact.last_name,
          email: contact.email ?? null,
          phone: contact.phone ?? null,
          isOwner: contact.is_owner ?? true,
          isPrimaryContact: true,
          moveInDate: contact.move_in_date ?? null,
          createdDate: now,
        })
        .run(),
    );
  }

  private async requireProperty(id: number): Promise<PropertyRecord> {
    const record = await this.findById(id);
    if (!record) {
      throw new RecordNotFoundError("Property", id);
    }
    return record;
  }
}
