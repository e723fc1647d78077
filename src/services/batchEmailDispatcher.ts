import { PropertyRecord } from "../types/hoa";
import { logError, logEvent } from "../utils/log";
import { EmailLogEntry } from "./emailLogStore";
import { MailTransport } from "./mailTransport";
import { PropertyStore } from "./propertyStore";
import {
  FinancialContext,
  propertyContextFromRecord,
  renderTemplate,
} from "./templateRenderer";

export const NO_EMAIL_REASON = "no email on file";
export const PROPERTY_NOT_FOUND_REASON = "property not found";

export type BatchEmailRequest = {
  // property display labels, in the order they were selected
  recipients: string[];
  subject: string;
  body: string;
  template_id?: number | null;
};

export type RecipientResult = {
  recipient: string;
  status: "sent" | "failed";
  email?: string;
  reason?: string;
};

export type BatchEmailSummary = {
  sent: number;
  failed: number;
  results: RecipientResult[];
};

export type BatchEmailDispatcherDeps = {
  properties: Pick<PropertyStore, "findByDisplayLabel">;
  transport: MailTransport;
  emailLog?: { record(entry: EmailLogEntry): Promise<unknown> };
  financialContext?: (propertyId: number) => Promise<FinancialContext | null>;
};

/**
 * Sends one rendered message per selected property, strictly in order.
 * A missing address or a transport error marks that recipient failed and the
 * loop moves on; nothing is retried.
 */
export class BatchEmailDispatcher {
  constructor(private readonly deps: BatchEmailDispatcherDeps) {}

  async dispatch(request: BatchEmailRequest): Promise<BatchEmailSummary> {
    const results: RecipientResult[] = [];

    for (const recipient of request.recipients) {
      try {
        results.push(await this.dispatchOne(recipient, request));
      } catch (error) {
        // lookup failures (store errors) count against this recipient only
        const reason = error instanceof Error ? error.message : String(error);
        logError("email_failed", { recipient, reason });
        results.push({ recipient, status: "failed", reason });
      }
    }

    const sent = results.filter((result) => result.status === "sent").length;
    const summary: BatchEmailSummary = {
      sent,
      failed: results.length - sent,
      results,
    };

    logEvent("email_batch_complete", {
      recipients: results.length,
      sent: summary.sent,
      failed: summary.failed,
      template_id: request.template_id ?? null,
    });

    return summary;
  }

  private async dispatchOne(
    recipient: string,
    request: BatchEmailRequest,
  ): Promise<RecipientResult> {
    const property = await this.deps.properties.findByDisplayLabel(recipient);
    if (!property) {
      return { recipient, status: "failed", reason: PROPERTY_NOT_FOUND_REASON };
    }

    const email = property.primary_contact?.email?.trim();
    if (!email) {
      return { recipient, status: "failed", reason: NO_EMAIL_REASON };
    }

    const context = {
      property: propertyContextFromRecord(property),
      financial: await this.loadFinancialContext(property),
    };
    const subject = renderTemplate(request.subject, context);
    const body = renderTemplate(request.body, context);

    try {
      await this.deps.transport.send(email, subject, body);
    } catch (error) {
      const reason = error instanceof Error ? error.message : "send failed";
      logError("email_failed", { recipient, email, reason });
      await this.writeLog(request, property, email, subject, reason);
      return { recipient, status: "failed", email, reason };
    }

    logEvent("email_sent", { recipient, email });
    await this.writeLog(request, property, email, subject, null);
    return { recipient, status: "sent", email };
  }

  private async loadFinancialContext(
    property: PropertyRecord,
  ): Promise<FinancialContext | null> {
    if (!this.deps.financialContext) {
      return null;
    }
    return this.deps.financialContext(property.id);
  }

  // The send already happened; a log failure must not change its outcome.
  private async writeLog(
    request: BatchEmailRequest,
    property: PropertyRecord,
    email: string,
    subject: string,
    errorMessage: string | null,
  ): Promise<void> {
    if (!this.deps.emailLog) {
      return;
    }

    try {
      await this.deps.emailLog.record({
        template_id: request.template_id ?? null,
        property_id: property.id,
        recipient_email: email,
        subject,
        status: errorMessage ? "failed" : "sent",
        error_message: errorMessage,
      });
    } catch (error) {
      logError("email_log_failed", {
        email,
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
