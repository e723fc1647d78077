import "dotenv/config";
import path from "path";

import { createApp } from "./app";
import { loadConfig } from "./config";
import { openDatabase } from "./db";
import { seedDatabase } from "./db/seed";
import { createMailTransport } from "./services/mailTransport";
import { logEvent } from "./utils/log";

const config = loadConfig();
const databasePath = path.resolve(process.cwd(), config.databasePath);
const { db } = openDatabase(databasePath);
logEvent("database_ready", { path: databasePath });

if (config.seedDatabase) {
  const seeded = seedDatabase(db);
  logEvent("database_seeded", { properties: seeded });
}

const app = createApp(db, createMailTransport(config.smtp));

app.listen(config.port, () => {
  logEvent("server_started", {
    port: config.port,
    smtp: config.smtp ? config.smtp.host : "stub",
    health_url: `http://localhost:${config.port}/health`,
    dashboard_url: `http://localhost:${config.port}/api/dashboard`,
    properties_url: `http://localhost:${config.port}/api/properties`,
    email_send_url: `http://localhost:${config.port}/api/email/send`,
  });
});
