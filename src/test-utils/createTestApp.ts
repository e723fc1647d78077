import type { Express } from "express";

import { createApp } from "../app";
import type { DatabaseHandle } from "../db";
import { MailTransport } from "../services/mailTransport";
import { createTestDatabase } from "./createTestDatabase";

export type SentMail = { to: string; subject: string; body: string };

export class RecordingMailTransport implements MailTransport {
  readonly sent: SentMail[] = [];

  async send(to: string, subject: string, body: string): Promise<void> {
    this.sent.push({ to, subject, body });
  }
}

export function createTestApp(): {
  app: Express;
  handle: DatabaseHandle;
  transport: RecordingMailTransport;
} {
  const handle = createTestDatabase();
  const transport = new RecordingMailTransport();
  return { app: createApp(handle.db, transport), handle, transport };
}
