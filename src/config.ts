import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { ImapConfig } from "./imap/types.js";

/** Number of messages a single run fetches. */
export const DEFAULT_FETCH_LIMIT = 2;

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(["true", "false"])
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value === "true"));

const required = (name: string) =>
  z
    .string({ required_error: `${name} is required` })
    .trim()
    .min(1, `${name} is required`);

const envSchema = z.object({
  OPENAI_API_KEY: required("OPENAI_API_KEY"),
  EMAIL_ADDRESS: required("EMAIL_ADDRESS").email("EMAIL_ADDRESS must be an email address"),
  EMAIL_PASSWORD: required("EMAIL_PASSWORD"),
  EMAIL_IMAP_SERVER: required("EMAIL_IMAP_SERVER"),
  EMAIL_IMAP_PORT: required("EMAIL_IMAP_PORT")
    .pipe(
      z.coerce
        .number({ invalid_type_error: "EMAIL_IMAP_PORT must be a port number" })
        .int("EMAIL_IMAP_PORT must be a port number")
        .min(1, "EMAIL_IMAP_PORT must be a port number")
        .max(65535, "EMAIL_IMAP_PORT must be a port number")
    ),
  EMAIL_IMAP_SECURE: booleanFlag(true),
  EMAIL_IMAP_STARTTLS: booleanFlag(true),
  EMAIL_TLS_REJECT_UNAUTHORIZED: booleanFlag(true),
  EMAIL_FOLDER: z.string().trim().min(1).default("INBOX"),
  OPENAI_MODEL: z.string().trim().min(1).default("gpt-4o"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type LogLevel = z.infer<typeof envSchema>["LOG_LEVEL"];

export interface AppConfig {
  provider: {
    apiKey: string;
    model: string;
  };
  email: {
    address: string;
    password: string;
    folder: string;
  };
  imap: ImapConfig;
  fetchLimit: number;
  logLevel: LogLevel;
}

/**
 * Build the run configuration from an environment map.
 * Every missing or invalid variable is reported in one ConfigError.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  // Empty strings count as unset for the optional variables.
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const variables = [
      ...new Set(parsed.error.issues.map((issue) => String(issue.path[0]))),
    ];
    const details = parsed.error.issues
      .map((issue) => `  ${String(issue.path[0])}: ${issue.message}`)
      .join("\n");
    throw new ConfigError(
      `Invalid configuration — set these variables in the environment or .env:\n${details}`,
      variables
    );
  }

  const e = parsed.data;
  return {
    provider: { apiKey: e.OPENAI_API_KEY, model: e.OPENAI_MODEL },
    email: {
      address: e.EMAIL_ADDRESS,
      password: e.EMAIL_PASSWORD,
      folder: e.EMAIL_FOLDER,
    },
    imap: {
      host: e.EMAIL_IMAP_SERVER,
      port: e.EMAIL_IMAP_PORT,
      secure: e.EMAIL_IMAP_SECURE,
      starttls: e.EMAIL_IMAP_STARTTLS,
      tlsRejectUnauthorized: e.EMAIL_TLS_REJECT_UNAUTHORIZED,
      auth: { user: e.EMAIL_ADDRESS, pass: e.EMAIL_PASSWORD },
    },
    fetchLimit: DEFAULT_FETCH_LIMIT,
    logLevel: e.LOG_LEVEL,
  };
}
