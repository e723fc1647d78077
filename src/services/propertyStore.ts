import {
  PropertyDeletionSummary,
  PropertyRecord,
  PropertyType,
} from "../types/hoa";

export type PropertyInput = {
  address: string;
  unit_number?: string | null;
  property_type?: PropertyType | null;
  square_footage?: number | null;
  lot_size_sqft?: number | null;
  hoa_fees_monthly?: number | null;
};

export type PropertyUpdate = Partial<PropertyInput>;

export type PrimaryContactInput = {
  first_name: string;
  last_name: string;
  email?: string | null;
  phone?: string | null;
  is_owner?: boolean;
  move_in_date?: string | null;
};

export interface PropertyStore {
  list(): Promise<PropertyRecord[]>;
  findById(id: number): Promise<PropertyRecord | null>;
  findByDisplayLabel(label: string): Promise<PropertyRecord | null>;
  create(
    property: PropertyInput,
    contact?: PrimaryContactInput | null,
  ): Promise<PropertyRecord>;
  update(
    id: number,
    property: PropertyUpdate,
    contact?: PrimaryContactInput | null,
  ): Promise<PropertyRecord>;
  deletionSummary(id: number): Promise<PropertyDeletionSummary | null>;
  delete(id: number, confirmation: string | null): Promise<void>;
}
