import { sqliteTable, text, integer, real } from "drizzle-orm/sqlite-core";

export const properties = sqliteTable("properties", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  address: text("address").notNull(),
  unitNumber: text("unit_number"),
  propertyType: text("property_type"), // "Single Family" | "Condo" | "Townhome"
  squareFootage: integer("square_footage"),
  lotSizeSqft: integer("lot_size_sqft"),
  hoaFeesMonthly: real("hoa_fees_monthly"),
  createdDate: text("created_date").notNull(),
  updatedDate: text("updated_date").notNull(),
});

export type PropertyRow = typeof properties.$inferSelect;
export type NewPropertyRow = typeof properties.$inferInsert;

// ---------------------------------------------------------------------------
// Residents — at most one per property is flagged as primary contact
// ---------------------------------------------------------------------------

export const residents = sqliteTable("residents", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  propertyId: integer("property_id")
    .notNull()
    .references(() => properties.id, { onDelete: "cascade" }),
  firstName: text("first_name").notNull(),
  lastName: text("last_name").notNull(),
  email: text("email"),
  phone: text("phone"),
  isOwner: integer("is_owner", { mode: "boolean" }).notNull().default(true),
  isPrimaryContact: integer("is_primary_contact", { mode: "boolean" })
    .notNull()
    .default(false),
  moveInDate: text("move_in_date"), // YYYY-MM-DD
  createdDate: text("created_date").notNull(),
});

export type ResidentRow = typeof residents.$inferSelect;

// ---------------------------------------------------------------------------
// Maintenance requests
// ---------------------------------------------------------------------------

export const maintenanceRequests = sqliteTable("maintenance_requests", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  propertyId: integer("property_id")
    .notNull()
    .references(() => properties.id, { onDelete: "cascade" }),
  requestType: text("request_type").notNull(),
  priority: text("priority").notNull().default("Medium"),
  title: text("title").notNull(),
  description: text("description"),
  reportedBy: text("reported_by"),
  assignedTo: text("assigned_to"),
  estimatedCost: real("estimated_cost"),
  actualCost: real("actual_cost"),
  status: text("status").notNull().default("Open"),
  // "Open" | "In Progress" | "Completed" | "Cancelled"
  notes: text("notes"),
  createdDate: text("created_date").notNull(),
  completedDate: text("completed_date"),
});

export type MaintenanceRequestRow = typeof maintenanceRequests.$inferSelect;

// ---------------------------------------------------------------------------
// Financial transactions — positive amount = charge, negative = payment
// ---------------------------------------------------------------------------

export const financialTransactions = sqliteTable("financial_transactions", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  propertyId: integer("property_id")
    .notNull()
    .references(() => properties.id, { onDelete: "cascade" }),
  transactionType: text("transaction_type").notNull(),
  category: text("category"),
  amount: real("amount").notNull(),
  description: text("description"),
  dueDate: text("due_date"),
  paidDate: text("paid_date"),
  paymentMethod: text("payment_method"),
  referenceNumber: text("reference_number"),
  createdDate: text("created_date").notNull(),
});

export type FinancialTransactionRow = typeof financialTransactions.$inferSelect;

// ---------------------------------------------------------------------------
// Email templates and the send log
// ---------------------------------------------------------------------------

export const emailTemplates = sqliteTable("email_templates", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  templateName: text("template_name").notNull(),
  subjectLine: text("subject_line").notNull(),
  bodyTemplate: text("body_template").notNull(),
  templateType: text("template_type"),
  isActive: integer("is_active", { mode: "boolean" }).notNull().default(true),
  createdDate: text("created_date").notNull(),
});

export type EmailTemplateRow = typeof emailTemplates.$inferSelect;

export const emailLog = sqliteTable("email_log", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  templateId: integer("template_id").references(() => emailTemplates.id, {
    onDelete: "set null",
  }),
  propertyId: integer("property_id").references(() => properties.id, {
    onDelete: "set null",
  }),
  recipientEmail: text("recipient_email").notNull(),
  subject: text("subject").notNull(),
  status: text("status").notNull(), // "sent" | "failed"
  errorMessage: text("error_message"),
  sentAt: text("sent_at").notNull(),
});

export type EmailLogRow = typeof emailLog.$inferSelect;
