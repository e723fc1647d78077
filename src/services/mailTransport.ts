import nodemailer from "nodemailer";

import { SmtpConfig } from "../config";
import { logEvent } from "../utils/log";

export interface MailTransport {
  send(to: string, subject: string, body: string): Promise<void>;
}

export class MailTransportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MailTransportError";
  }
}

type SendMailOptions = {
  from: string;
  to: string;
  subject: string;
  text: string;
};

export type SendMailClient = {
  sendMail: (options: SendMailOptions) => Promise<{ rejected?: unknown[] }>;
};

function createSmtpClient(config: SmtpConfig): SendMailClient {
  // Submission port with STARTTLS: start in plain text, refuse to continue
  // if the server does not upgrade.
  return nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: false,
    requireTLS: true,
    auth: {
      user: config.user,
      pass: config.pass,
    },
  });
}

export class SmtpMailTransport implements MailTransport {
  private readonly client: SendMailClient;

  constructor(
    private readonly config: SmtpConfig,
    client?: SendMailClient,
  ) {
    this.client = client ?? createSmtpClient(config);
  }

  async send(to: string, subject: string, body: string): Promise<void> {
    let info: { rejected?: unknown[] };
    try {
      info = await this.client.sendMail({
        from: this.config.from,
        to,
        subject,
        text: body,
      });
    } catch (error) {
      throw new MailTransportError(
        error instanceof Error ? error.message : "SMTP send failed.",
      );
    }

    if (info.rejected && info.rejected.length > 0) {
      throw new MailTransportError(`Recipient rejected: ${to}`);
    }
  }
}

/**
 * Development stand-in used when SMTP is not configured.
 */
export class LoggingMailTransport implements MailTransport {
  async send(to: string, subject: string, _body: string): Promise<void> {
    logEvent("email_stub_send", { to, subject });
  }
}

export function createMailTransport(config: SmtpConfig | null): MailTransport {
  return config ? new SmtpMailTransport(config) : new LoggingMailTransport();
}
