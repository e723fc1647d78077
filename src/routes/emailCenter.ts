import express, { Request, Response } from "express";

import { BatchEmailDispatcher } from "../services/batchEmailDispatcher";
import { EmailLogStore } from "../services/emailLogStore";
import {
  EmailTemplateStore,
  EmailTemplateUpdate,
} from "../services/emailTemplateStore";
import { PropertyStore } from "../services/propertyStore";
import { RecordNotFoundError, ValidationError } from "../services/storeErrors";
import {
  findPlaceholders,
  listTemplateVariables,
  propertyContextFromRecord,
  renderTemplate,
  type TemplateContext,
} from "../services/templateRenderer";
import { TransactionStore } from "../services/transactionStore";
import { TEMPLATE_TYPES } from "../types/hoa";
import { deleteConfirmationPhrase } from "../utils/deleteConfirmation";
import {
  parseIdParam,
  readConfirmation,
  readOptionalBoolean,
  readOptionalEnum,
  readOptionalNumber,
  readOptionalString,
  readOptionalText,
  readRequiredString,
  readRequiredText,
  requireBody,
} from "../utils/requestBody";
import { respondWithError } from "./respondWithError";

// The recipient picker starts with this many properties selected.
const DEFAULT_SELECTION_SIZE = 5;

type MessageSource = {
  subject: string;
  body: string;
  template_id: number | null;
};

function unknownPlaceholders(...texts: string[]): string[] {
  const unknown = new Set<string>();
  for (const text of texts) {
    findPlaceholders(text).unknown.forEach((name) => unknown.add(name));
  }
  return Array.from(unknown);
}

function readTemplateId(body: Record<string, unknown>): number | null {
  const templateId = readOptionalNumber(body, "template_id");
  if (templateId === undefined || templateId === null) {
    return null;
  }
  return parseIdParam(String(templateId), "template_id");
}

function readRecipients(body: Record<string, unknown>): string[] {
  const recipients = body.recipients;
  if (
    !Array.isArray(recipients) ||
    !recipients.every((recipient) => typeof recipient === "string")
  ) {
    throw new ValidationError("Field 'recipients' must be a list of strings.");
  }
  if (recipients.length === 0) {
    throw new ValidationError("Select at least one recipient.");
  }
  return recipients;
}

export function createEmailCenterRouter(deps: {
  templateStore: EmailTemplateStore;
  emailLogStore: EmailLogStore;
  propertyStore: PropertyStore;
  transactionStore: TransactionStore;
  dispatcher: BatchEmailDispatcher;
}) {
  const {
    templateStore,
    emailLogStore,
    propertyStore,
    transactionStore,
    dispatcher,
  } = deps;
  const router = express.Router();

  /**
   * Subject and body come from the request, falling back to the stored
   * template when template_id is given.
   */
  async function resolveMessage(
    body: Record<string, unknown>,
  ): Promise<MessageSource> {
    const templateId = readTemplateId(body);
    const subject = readOptionalText(body, "subject");
    const text = readOptionalText(body, "body");

    if (templateId === null) {
      if (!subject || !text) {
        throw new ValidationError(
          "Provide 'subject' and 'body', or a 'template_id'.",
        );
      }
      return { subject, body: text, template_id: null };
    }

    const template = await templateStore.findById(templateId);
    if (!template) {
      throw new RecordNotFoundError("Email template", templateId);
    }
    return {
      subject: subject ?? template.subject_line,
      body: text ?? template.body_template,
      template_id: template.id,
    };
  }

  // -------------------------------------------------------------------------
  // Templates
  // -------------------------------------------------------------------------

  router.get("/email-templates", async (req: Request, res: Response) => {
    try {
      const templates =
        req.query.active === "true"
          ? await templateStore.listActive()
          : await templateStore.list();
      res.json({ templates });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  router.get("/email-templates/variables", (_req: Request, res: Response) => {
    res.json({
      variables: listTemplateVariables().map((name) => `{{${name}}}`),
    });
  });

  router.post("/email-templates", async (req: Request, res: Response) => {
    try {
      const body = requireBody(req.body);
      const template = await templateStore.create({
        template_name: readRequiredString(body, "template_name"),
        subject_line: readRequiredText(body, "subject_line"),
        body_template: readRequiredText(body, "body_template"),
        template_type: readOptionalEnum(body, "template_type", TEMPLATE_TYPES),
        is_active: readOptionalBoolean(body, "is_active"),
      });
      res.status(201).json({
        template,
        unknown_placeholders: unknownPlaceholders(
          template.subject_line,
          template.body_template,
        ),
      });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  router.get("/email-templates/:id", async (req: Request, res: Response) => {
    try {
      const id = parseIdParam(req.params.id);
      const template = await templateStore.findById(id);
      if (!template) {
        throw new RecordNotFoundError("Email template", id);
      }
      res.json({
        template,
        usage_count: await templateStore.usageCount(id),
        confirmation_phrase: deleteConfirmationPhrase("TEMPLATE", id),
      });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  router.put("/email-templates/:id", async (req: Request, res: Response) => {
    try {
      const id = parseIdParam(req.params.id);
      const body = requireBody(req.body);
      const changes: EmailTemplateUpdate = {
        template_name:
          body.template_name === undefined
            ? undefined
            : readRequiredString(body, "template_name"),
        subject_line:
          body.subject_line === undefined
            ? undefined
            : readRequiredText(body, "subject_line"),
        body_template:
          body.body_template === undefined
            ? undefined
            : readRequiredText(body, "body_template"),
        template_type: readOptionalEnum(body, "template_type", TEMPLATE_TYPES),
        is_active: readOptionalBoolean(body, "is_active"),
      };

      const template = await templateStore.update(id, changes);
      res.json({
        template,
        unknown_placeholders: unknownPlaceholders(
          template.subject_line,
          template.body_template,
        ),
      });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  router.patch(
    "/email-templates/:id/active",
    async (req: Request, res: Response) => {
      try {
        const id = parseIdParam(req.params.id);
        const active = readOptionalBoolean(requireBody(req.body), "is_active");
        if (active === undefined) {
          throw new ValidationError("Missing or invalid 'is_active' field.");
        }
        const template = await templateStore.setActive(id, active);
        res.json({ template });
      } catch (error) {
        respondWithError(res, error);
      }
    },
  );

  router.delete("/email-templates/:id", async (req: Request, res: Response) => {
    try {
      const id = parseIdParam(req.params.id);
      await templateStore.delete(id, readConfirmation(req.body));
      res.json({ deleted: { id } });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  // -------------------------------------------------------------------------
  // Sending
  // -------------------------------------------------------------------------

  router.get("/email/recipients", async (_req: Request, res: Response) => {
    try {
      const properties = await propertyStore.list();
      const recipients = properties.map((property) => ({
        label: property.display_label,
        property_id: property.id,
        email: property.primary_contact?.email ?? null,
      }));
      res.json({
        recipients,
        default_selection: recipients
          .slice(0, DEFAULT_SELECTION_SIZE)
          .map((recipient) => recipient.label),
      });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  // -------------------------------------------------------------------------
  // POST /email/preview
  //
  // Renders subject and body for one recipient (or with no context at all
  // when recipient is omitted) without sending anything.
  // -------------------------------------------------------------------------
  router.post("/email/preview", async (req: Request, res: Response) => {
    try {
      const body = requireBody(req.body);
      const message = await resolveMessage(body);
      const recipient = readOptionalString(body, "recipient");

      let context: TemplateContext = {};
      if (recipient) {
        const property = await propertyStore.findByDisplayLabel(recipient);
        if (!property) {
          throw new ValidationError(`Unknown recipient '${recipient}'.`);
        }
        context = {
          property: propertyContextFromRecord(property),
          financial: await transactionStore.financialContext(property.id),
        };
      }

      res.json({
        subject: renderTemplate(message.subject, context),
        body: renderTemplate(message.body, context),
        unknown_placeholders: unknownPlaceholders(message.subject, message.body),
      });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  // -------------------------------------------------------------------------
  // POST /email/send
  //
  // Request body:
  //   {
  //     recipients: string[];      // property display labels, in send order
  //     subject?: string;          // required unless template_id is given
  //     body?: string;             // required unless template_id is given
  //     template_id?: number;
  //   }
  //
  // Response:
  //   { sent: number, failed: number, results: RecipientResult[] }
  // -------------------------------------------------------------------------
  router.post("/email/send", async (req: Request, res: Response) => {
    try {
      const body = requireBody(req.body);
      const recipients = readRecipients(body);
      const message = await resolveMessage(body);

      const summary = await dispatcher.dispatch({
        recipients,
        subject: message.subject,
        body: message.body,
        template_id: message.template_id,
      });
      res.json(summary);
    } catch (error) {
      respondWithError(res, error);
    }
  });

  router.get("/email/log", async (req: Request, res: Response) => {
    try {
      const limit = Number(req.query.limit);
      const entries = await emailLogStore.listRecent(
        Number.isInteger(limit) && limit > 0 ? limit : undefined,
      );
      res.json({ entries });
    } catch (error) {
      respondWithError(res, error);
    }
  });

  return router;
}
