import type { Express } from "express";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { DatabaseHandle } from "../db";
import { TransactionStore } from "../services/transactionStore";
import { addProperty } from "../test-utils/createTestDatabase";
import {
  createTestApp,
  RecordingMailTransport,
} from "../test-utils/createTestApp";

let app: Express;
let handle: DatabaseHandle;
let transport: RecordingMailTransport;
let oakId: number;

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  ({ app, handle, transport } = createTestApp());

  oakId = (await addProperty(handle, { address: "100 Oak St" })).id;
  await addProperty(
    handle,
    { address: "9 Birch Ln" },
    { first_name: "Priya", last_name: "Nair", email: null },
  );
  await new TransactionStore(handle.db).create({
    property_id: oakId,
    transaction_type: "Assessment",
    amount: 185,
    due_date: "2026-11-01",
  });
});

afterEach(() => {
  handle.close();
  vi.restoreAllMocks();
});

async function createTemplate(
  fields: Record<string, unknown> = {},
): Promise<number> {
  const response = await request(app)
    .post("/api/email-templates")
    .send({
      template_name: "Monthly Statement",
      subject_line: "Statement for {{property_address}}",
      body_template:
        "Dear {{resident_name}}, your balance is ${{current_balance}}, due {{due_date}}.",
      template_type: "Monthly Statement",
      ...fields,
    });
  expect(response.status).toBe(201);
  return response.body.template.id;
}

describe("email template routes", () => {
  it("lists the supported placeholders", async () => {
    const response = await request(app).get("/api/email-templates/variables");

    expect(response.body.variables).toEqual([
      "{{property_address}}",
      "{{resident_name}}",
      "{{monthly_fee}}",
      "{{current_balance}}",
      "{{due_date}}",
      "{{request_title}}",
      "{{status}}",
      "{{notes}}",
    ]);
  });

  it("flags unknown placeholders on save", async () => {
    const response = await request(app)
      .post("/api/email-templates")
      .send({
        template_name: "Meeting",
        subject_line: "Meeting on {{meeting_date}}",
        body_template: "Hi {{resident_name}}, bring {{item}}.",
      });

    expect(response.status).toBe(201);
    expect(response.body.template.is_active).toBe(true);
    expect(response.body.unknown_placeholders).toEqual(["meeting_date", "item"]);
  });

  it("toggles and filters active templates", async () => {
    const id = await createTemplate();
    await createTemplate({ template_name: "Archived" });

    await request(app)
      .patch(`/api/email-templates/${id}/active`)
      .send({ is_active: false })
      .expect(200);

    const active = await request(app).get("/api/email-templates?active=true");
    expect(
      active.body.templates.map(
        (template: { template_name: string }) => template.template_name,
      ),
    ).toEqual(["Archived"]);

    const all = await request(app).get("/api/email-templates");
    expect(all.body.templates).toHaveLength(2);

    const missingFlag = await request(app)
      .patch(`/api/email-templates/${id}/active`)
      .send({});
    expect(missingFlag.status).toBe(400);
  });

  it("deletes a template only with its phrase", async () => {
    const id = await createTemplate();

    const detail = await request(app).get(`/api/email-templates/${id}`);
    expect(detail.body.usage_count).toBe(0);
    expect(detail.body.confirmation_phrase).toBe(`DELETE TEMPLATE ${id}`);

    await request(app)
      .delete(`/api/email-templates/${id}`)
      .send({ confirmation: `DELETE PROPERTY ${id}` })
      .expect(400);
    await request(app)
      .delete(`/api/email-templates/${id}`)
      .send({ confirmation: `DELETE TEMPLATE ${id}` })
      .expect(200);
    await request(app).get(`/api/email-templates/${id}`).expect(404);
  });
});

describe("email preview", () => {
  it("renders against a recipient's data", async () => {
    const templateId = await createTemplate();

    const response = await request(app)
      .post("/api/email/preview")
      .send({ template_id: templateId, recipient: "100 Oak St" });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      subject: "Statement for 100 Oak St",
      body: "Dear Jane Doe, your balance is $185.00, due 2026-11-01.",
      unknown_placeholders: [],
    });
  });

  it("renders defaults without a recipient", async () => {
    const response = await request(app)
      .post("/api/email/preview")
      .send({
        subject: "Hi {{resident_name}}",
        body: "Balance {{current_balance}} due {{due_date}} {{custom}}",
      });

    expect(response.body).toEqual({
      subject: "Hi {{resident_name}}",
      body: "Balance 0.00 due End of Month {{custom}}",
      unknown_placeholders: ["custom"],
    });
  });

  it("rejects an unknown recipient and a missing message", async () => {
    const unknown = await request(app)
      .post("/api/email/preview")
      .send({ subject: "s", body: "b", recipient: "1 Nowhere Rd" });
    expect(unknown.status).toBe(400);
    expect(unknown.body.error.message).toBe("Unknown recipient '1 Nowhere Rd'.");

    const empty = await request(app)
      .post("/api/email/preview")
      .send({ subject: "s" });
    expect(empty.status).toBe(400);
    expect(empty.body.error.message).toBe(
      "Provide 'subject' and 'body', or a 'template_id'.",
    );

    const missingTemplate = await request(app)
      .post("/api/email/preview")
      .send({ template_id: 404 });
    expect(missingTemplate.status).toBe(404);
  });
});

describe("email sending", () => {
  it("lists recipients with the default selection", async () => {
    const response = await request(app).get("/api/email/recipients");

    expect(response.body).toEqual({
      recipients: [
        { label: "100 Oak St", property_id: oakId, email: "jane@example.test" },
        { label: "9 Birch Ln", property_id: oakId + 1, email: null },
      ],
      default_selection: ["100 Oak St", "9 Birch Ln"],
    });
  });

  it("sends to every recipient with an email and reports the rest", async () => {
    const templateId = await createTemplate();

    const response = await request(app)
      .post("/api/email/send")
      .send({
        recipients: ["9 Birch Ln", "100 Oak St"],
        template_id: templateId,
      });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      sent: 1,
      failed: 1,
      results: [
        { recipient: "9 Birch Ln", status: "failed", reason: "no email on file" },
        { recipient: "100 Oak St", status: "sent", email: "jane@example.test" },
      ],
    });
    expect(transport.sent).toEqual([
      {
        to: "jane@example.test",
        subject: "Statement for 100 Oak St",
        body: "Dear Jane Doe, your balance is $185.00, due 2026-11-01.",
      },
    ]);

    const log = await request(app).get("/api/email/log");
    expect(log.body.entries).toHaveLength(1);
    expect(log.body.entries[0]).toMatchObject({
      template_id: templateId,
      property_id: oakId,
      recipient_email: "jane@example.test",
      subject: "Statement for 100 Oak St",
      status: "sent",
      error_message: null,
    });

    const detail = await request(app).get(`/api/email-templates/${templateId}`);
    expect(detail.body.usage_count).toBe(1);
  });

  it("keeps template text exactly as typed", async () => {
    const bodyTemplate = "    Dues reminder for {{property_address}}\n\n-- \nBoard\n";
    const templateId = await createTemplate({
      subject_line: "  Reminder ",
      body_template: bodyTemplate,
    });

    const stored = await request(app).get(`/api/email-templates/${templateId}`);
    expect(stored.body.template.body_template).toBe(bodyTemplate);
    expect(stored.body.template.subject_line).toBe("  Reminder ");

    await request(app)
      .post("/api/email/send")
      .send({ recipients: ["100 Oak St"], template_id: templateId })
      .expect(200);
    await request(app)
      .post("/api/email/send")
      .send({
        recipients: ["100 Oak St"],
        subject: "Note",
        body: "    indented line\n\n-- \nBoard\n",
      })
      .expect(200);

    expect(transport.sent).toEqual([
      {
        to: "jane@example.test",
        subject: "  Reminder ",
        body: "    Dues reminder for 100 Oak St\n\n-- \nBoard\n",
      },
      {
        to: "jane@example.test",
        subject: "Note",
        body: "    indented line\n\n-- \nBoard\n",
      },
    ]);
  });

  it("validates the recipient list", async () => {
    const empty = await request(app)
      .post("/api/email/send")
      .send({ recipients: [], subject: "s", body: "b" });
    expect(empty.status).toBe(400);
    expect(empty.body.error.message).toBe("Select at least one recipient.");

    const wrongType = await request(app)
      .post("/api/email/send")
      .send({ recipients: "100 Oak St", subject: "s", body: "b" });
    expect(wrongType.status).toBe(400);
    expect(transport.sent).toEqual([]);
  });
});
