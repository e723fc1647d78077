export type SmtpConfig = {
  host: string;
  port: number;
  user: string;
  pass: string;
  from: string;
};

export type AppConfig = {
  port: number;
  databasePath: string;
  seedDatabase: boolean;
  smtp: SmtpConfig | null;
};

const DEFAULT_PORT = 3001;
const DEFAULT_SMTP_PORT = 587;
const DEFAULT_DATABASE_PATH = "hoa.db";

function readNumber(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value && Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

function readText(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

/**
 * SMTP is only configured when host, user and password are all present;
 * otherwise mail goes to the logging stub.
 */
function readSmtpConfig(env: NodeJS.ProcessEnv): SmtpConfig | null {
  const host = readText(env.SMTP_HOST);
  const user = readText(env.SMTP_USER);
  const pass = readText(env.SMTP_PASS);
  if (!host || !user || !pass) {
    return null;
  }

  return {
    host,
    port: readNumber(env.SMTP_PORT, DEFAULT_SMTP_PORT),
    user,
    pass,
    from: readText(env.EMAIL_FROM) ?? user,
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: readNumber(env.PORT, DEFAULT_PORT),
    databasePath: readText(env.DATABASE_PATH) ?? DEFAULT_DATABASE_PATH,
    seedDatabase: env.SEED_DATABASE === "true",
    smtp: readSmtpConfig(env),
  };
}
