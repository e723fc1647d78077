import { openDatabase, type DatabaseHandle } from "../db";
import { DrizzlePropertyStore } from "../services/drizzlePropertyStore";
import { PrimaryContactInput, PropertyInput } from "../services/propertyStore";
import { PropertyRecord } from "../types/hoa";

export function createTestDatabase(): DatabaseHandle {
  return openDatabase(":memory:");
}

export async function addProperty(
  handle: DatabaseHandle,
  property: Partial<PropertyInput> = {},
  contact: PrimaryContactInput | null = {
    first_name: "Jane",
    last_name: "Doe",
    email: "jane@example.test",
  },
): Promise<PropertyRecord> {
  const store = new DrizzlePropertyStore(handle.db);
  return store.create(
    {
      address: "100 Oak St",
      unit_number: null,
      hoa_fees_monthly: 150,
      ...property,
    },
    contact,
  );
}
