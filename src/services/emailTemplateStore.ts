import { asc, eq, sql } from "drizzle-orm";

import { HoaDatabase } from "../db";
import { emailLog, emailTemplates, type EmailTemplateRow } from "../db/schema";
import { EmailTemplateRecord, TemplateType } from "../types/hoa";
import { assertDeleteConfirmed } from "../utils/deleteConfirmation";
import { RecordNotFoundError, runStatement } from "./storeErrors";

export type EmailTemplateInput = {
  template_name: string;
  subject_line: string;
  body_template: string;
  template_type?: TemplateType | null;
  is_active?: boolean;
};

export type EmailTemplateUpdate = Partial<EmailTemplateInput>;

function toTemplateRecord(row: EmailTemplateRow): EmailTemplateRecord {
  return {
    id: row.id,
    template_name: row.templateName,
    subject_line: row.subjectLine,
    body_template: row.bodyTemplate,
    template_type: row.templateType,
    is_active: row.isActive,
    created_date: row.createdDate,
  };
}

export class EmailTemplateStore {
  constructor(private readonly db: HoaDatabase) {}

  async list(): Promise<EmailTemplateRecord[]> {
    const rows = runStatement("list email templates", () =>
      this.db
        .select()
        .from(emailTemplates)
        .orderBy(asc(emailTemplates.templateName))
        .all(),
    );
    return rows.map(toTemplateRecord);
  }

  async listActive(): Promise<EmailTemplateRecord[]> {
    const rows = runStatement("list active email templates", () =>
      this.db
        .select()
        .from(emailTemplates)
        .where(eq(emailTemplates.isActive, true))
        .orderBy(asc(emailTemplates.templateName))
        .all(),
    );
    return rows.map(toTemplateRecord);
  }

  async findById(id: number): Promise<EmailTemplateRecord | null> {
    const row = runStatement("find email template", () =>
      this.db
        .select()
        .from(emailTemplates)
        .where(eq(emailTemplates.id, id))
        .get(),
    );
    return row ? toTemplateRecord(row) : null;
  }

  async create(input: EmailTemplateInput): Promise<EmailTemplateRecord> {
    const row = runStatement("insert email template", () =>
      this.db
        .insert(emailTemplates)
        .values({
          templateName: input.template_name,
          subjectLine: input.subject_line,
          bodyTemplate: input.body_template,
          templateType: input.template_type ?? null,
          isActive: input.is_active ?? true,
          createdDate: new Date().toISOString(),
        })
        .returning()
        .get(),
    );
    return toTemplateRecord(row);
  }

  async update(
    id: number,
    input: EmailTemplateUpdate,
  ): Promise<EmailTemplateRecord> {
    const changes = {
      templateName: input.template_name,
      subjectLine: input.subject_line,
      bodyTemplate: input.body_template,
      templateType: input.template_type,
      isActive: input.is_active,
    };
    if (Object.values(changes).every((value) => value === undefined)) {
      return this.requireTemplate(id);
    }

    const row = runStatement("update email template", () =>
      this.db
        .update(emailTemplates)
        .set(changes)
        .where(eq(emailTemplates.id, id))
        .returning()
        .get(),
    );
    if (!row) {
      throw new RecordNotFoundError("Email template", id);
    }
    return toTemplateRecord(row);
  }

  async setActive(id: number, active: boolean): Promise<EmailTemplateRecord> {
    return this.update(id, { is_active: active });
  }

  async usageCount(id: number): Promise<number> {
    const row = runStatement("count template usage", () =>
      this.db
        .select({ count: sql<number>`count(*)`.mapWith(Number) })
        .from(emailLog)
        .where(eq(emailLog.templateId, id))
        .get(),
    );
    return row?.count ?? 0;
  }

  /**
   * Sent-mail history survives: email_log.template_id is set to null.
   */
  async delete(id: number, confirmation: string | null): Promise<void> {
    assertDeleteConfirmed("TEMPLATE", id, confirmation);

    const result = runStatement("delete email template", () =>
      this.db.delete(emailTemplates).where(eq(emailTemplates.id, id)).run(),
    );
    if (result.changes === 0) {
      throw new RecordNotFoundError("Email template", id);
    }
  }

  private async requireTemplate(id: number): Promise<EmailTemplateRecord> {
    const record = await this.findById(id);
    if (!record) {
      throw new RecordNotFoundError("Email template", id);
    }
    return record;
  }
}
