import path from "node:path";
import { ConfigurationError } from "./errors";
import { err, ok, type Result } from "./result";

type Env = Record<string, string | undefined>;

function env(source: Env, name: string): string | null {
  const v = source[name];
  return v && v.trim().length ? v.trim() : null;
}

function intEnv(source: Env, name: string, fallback: number): number {
  const raw = env(source, name);
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export const DEFAULT_PORT = 5000;
export const DEFAULT_SURVEY_URL = "http://localhost:5000/survey.html";

export interface ServerConfig {
  port: number;
  dataDir: string;
  dbFile: string;
}

export function loadServerConfig(source: Env = process.env): ServerConfig {
  const dataDir = path.resolve(env(source, "DATA_DIR") ?? "data");
  return {
    port: intEnv(source, "PORT", DEFAULT_PORT),
    dataDir,
    dbFile: path.join(dataDir, env(source, "DB_FILE") ?? "survey_responses.db"),
  };
}

export interface SmsConfig {
  accountSid: string;
  authToken: string;
  fromNumber: string;
  surveyUrl: string;
  logFile: string;
}

const REQUIRED_SMS_ENV = [
  "TWILIO_ACCOUNT_SID",
  "TWILIO_AUTH_TOKEN",
  "TWILIO_PHONE_NUMBER",
] as const;

export function loadSmsConfig(
  source: Env = process.env,
): Result<SmsConfig, ConfigurationError> {
  const missing = REQUIRED_SMS_ENV.filter((name) => !env(source, name));
  const accountSid = env(source, "TWILIO_ACCOUNT_SID");
  const authToken = env(source, "TWILIO_AUTH_TOKEN");
  const fromNumber = env(source, "TWILIO_PHONE_NUMBER");
  if (!accountSid || !authToken || !fromNumber) {
    return err(new ConfigurationError(missing));
  }

  return ok({
    accountSid,
    authToken,
    fromNumber,
    surveyUrl: env(source, "SURVEY_URL") ?? DEFAULT_SURVEY_URL,
    logFile: env(source, "SMS_LOG_FILE") ?? "sms_log.json",
  });
}
