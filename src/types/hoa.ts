export const PROPERTY_TYPES = ["Single Family", "Condo", "Townhome"] as const;
export type PropertyType = (typeof PROPERTY_TYPES)[number];

export const REQUEST_TYPES = [
  "Irrigation",
  "Landscaping",
  "Common Area",
  "Other",
] as const;
export type RequestType = (typeof REQUEST_TYPES)[number];

export const REQUEST_PRIORITIES = ["Low", "Medium", "High", "Emergency"] as const;
export type RequestPriority = (typeof REQUEST_PRIORITIES)[number];

export const REQUEST_STATUSES = [
  "Open",
  "In Progress",
  "Completed",
  "Cancelled",
] as const;
export type RequestStatus = (typeof REQUEST_STATUSES)[number];

export const TRANSACTION_TYPES = [
  "Assessment",
  "Payment",
  "Fee",
  "Fine",
  "Credit",
] as const;
export type TransactionType = (typeof TRANSACTION_TYPES)[number];

export const PAYMENT_METHODS = [
  "",
  "Check",
  "ACH",
  "Credit Card",
  "Cash",
  "Online",
] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const TEMPLATE_TYPES = [
  "Monthly Statement",
  "Maintenance Notice",
  "General",
  "Assessment Notice",
  "Meeting Notice",
  "Violation Notice",
] as const;
export type TemplateType = (typeof TEMPLATE_TYPES)[number];

// ---------------------------------------------------------------------------
// Records returned by the stores
// ---------------------------------------------------------------------------

export type PrimaryContact = {
  resident_id: number;
  first_name: string;
  last_name: string;
  email: string | null;
  phone: string | null;
  is_owner: boolean;
  move_in_date: string | null;
};

export type PropertyRecord = {
  id: number;
  address: string;
  unit_number: string | null;
  display_label: string;
  property_type: string | null;
  square_footage: number | null;
  lot_size_sqft: number | null;
  hoa_fees_monthly: number | null;
  created_date: string;
  updated_date: string;
  // null when the property has no primary resident
  primary_contact: PrimaryContact | null;
};

export type PropertyDeletionSummary = {
  property_id: number;
  address: string;
  unit_number: string | null;
  hoa_fees_monthly: number | null;
  primary_contact_name: string | null;
  maintenance_count: number;
  transaction_count: number;
  confirmation_phrase: string;
};

export type ResidentRecord = {
  id: number;
  property_id: number;
  first_name: string;
  last_name: string;
  email: string | null;
  phone: string | null;
  is_owner: boolean;
  is_primary_contact: boolean;
  move_in_date: string | null;
  created_date: string;
};

export type MaintenanceRequestRecord = {
  id: number;
  property_id: number;
  property_address: string;
  property_unit: string | null;
  request_type: string;
  priority: string;
  title: string;
  description: string | null;
  reported_by: string | null;
  assigned_to: string | null;
  estimated_cost: number | null;
  actual_cost: number | null;
  status: string;
  notes: string | null;
  created_date: string;
  completed_date: string | null;
};

export type FinancialTransactionRecord = {
  id: number;
  property_id: number;
  property_address: string;
  property_unit: string | null;
  transaction_type: string;
  category: string | null;
  amount: number;
  description: string | null;
  due_date: string | null;
  paid_date: string | null;
  payment_method: string | null;
  reference_number: string | null;
  created_date: string;
};

export type FinancialSummary = {
  total_properties: number;
  total_assessments: number;
  total_payments: number;
  net_balance: number;
};

export type EmailTemplateRecord = {
  id: number;
  template_name: string;
  subject_line: string;
  body_template: string;
  template_type: string | null;
  is_active: boolean;
  created_date: string;
};

export type EmailLogStatus = "sent" | "failed";

export type EmailLogRecord = {
  id: number;
  template_id: number | null;
  property_id: number | null;
  recipient_email: string;
  subject: string;
  status: EmailLogStatus;
  error_message: string | null;
  sent_at: string;
};
