import type Database from "better-sqlite3";

// Mirrors ./schema.ts. Kept idempotent so it can run on every start-up.
const CREATE_TABLES = `
  CREATE TABLE IF NOT EXISTS properties (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    address TEXT NOT NULL,
    unit_number TEXT,
    property_type TEXT,
    square_footage INTEGER,
    lot_size_sqft INTEGER,
    hoa_fees_monthly REAL,
    created_date TEXT NOT NULL,
    updated_date TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS residents (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    property_id INTEGER NOT NULL REFERENCES properties(id) ON DELETE CASCADE,
    first_name TEXT NOT NULL,
    last_name TEXT NOT NULL,
    email TEXT,
    phone TEXT,
    is_owner INTEGER NOT NULL DEFAULT 1,
    is_primary_contact INTEGER NOT NULL DEFAULT 0,
    move_in_date TEXT,
    created_date TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS maintenance_requests (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    property_id INTEGER NOT NULL REFERENCES properties(id) ON DELETE CASCADE,
    request_type TEXT NOT NULL,
    priority TEXT NOT NULL DEFAULT 'Medium',
    title TEXT NOT NULL,
    description TEXT,
    reported_by TEXT,
    assigned_to TEXT,
    estimated_cost REAL,
    actual_cost REAL,
    status TEXT NOT NULL DEFAULT 'Open',
    notes TEXT,
    created_date TEXT NOT NULL,
    completed_date TEXT
  );

  CREATE TABLE IF NOT EXISTS financial_transactions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    property_id INTEGER NOT NULL REFERENCES properties(id) ON DELETE CASCADE,
    transaction_type TEXT NOT NULL,
    category TEXT,
    amount REAL NOT NULL,
    description TEXT,
    due_date TEXT,
    paid_date TEXT,
    payment_method TEXT,
    reference_number TEXT,
    created_date TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS email_templates (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    template_name TEXT NOT NULL,
    subject_line TEXT NOT NULL,
    body_template TEXT NOT NULL,
    template_type TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_date TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS email_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    template_id INTEGER REFERENCES email_templates(id) ON DELETE SET NULL,
    property_id INTEGER REFERENCES properties(id) ON DELETE SET NULL,
    recipient_email TEXT NOT NULL,
    subject TEXT NOT NULL,
    status TEXT NOT NULL,
    error_message TEXT,
    sent_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS residents_property_idx ON residents(property_id);
  CREATE INDEX IF NOT EXISTS maintenance_property_idx ON maintenance_requests(property_id);
  CREATE INDEX IF NOT EXISTS transactions_property_idx ON financial_transactions(property_id);
  CREATE INDEX IF NOT EXISTS email_log_template_idx ON email_log(template_id);
`;

export function createTables(sqlite: Database.Database): void {
  sqlite.exec(CREATE_TABLES);
}
