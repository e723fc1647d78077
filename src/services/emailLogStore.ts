import { desc } from "drizzle-orm";

import { HoaDatabase } from "../db";
import { emailLog, type EmailLogRow } from "../db/schema";
import { EmailLogRecord, EmailLogStatus } from "../types/hoa";
import { runStatement } from "./storeErrors";

export type EmailLogEntry = {
  template_id: number | null;
  property_id: number | null;
  recipient_email: string;
  subject: string;
  status: EmailLogStatus;
  error_message?: string | null;
};

function toLogRecord(row: EmailLogRow): EmailLogRecord {
  return {
    id: row.id,
    template_id: row.templateId,
    property_id: row.propertyId,
    recipient_email: row.recipientEmail,
    subject: row.subject,
    status: row.status === "sent" ? "sent" : "failed",
    error_message: row.errorMessage,
    sent_at: row.sentAt,
  };
}

export class EmailLogStore {
  constructor(private readonly db: HoaDatabase) {}

  async record(entry: EmailLogEntry): Promise<EmailLogRecord> {
    const row = runStatement("insert email log", () =>
      this.db
        .insert(emailLog)
        .values({
          templateId: entry.template_id,
          propertyId: entry.property_id,
          recipientEmail: entry.recipient_email,
          subject: entry.subject,
          status: entry.status,
          errorMessage: entry.error_message ?? null,
          sentAt: new Date().toISOString(),
        })
        .returning()
        .get(),
    );
    return toLogRecord(row);
  }

  async listRecent(limit = 50): Promise<EmailLogRecord[]> {
    const rows = runStatement("list email log", () =>
      this.db
        .select()
        .from(emailLog)
        .orderBy(desc(emailLog.sentAt), desc(emailLog.id))
        .limit(limit)
        .all(),
    );
    return rows.map(toLogRecord);
  }
}
