import { z } from "zod";
import { ConfigurationInvalidError, ConfigurationMissingError } from "./errors.js";
import type { MonitorConfig } from "./types.js";

export const DEFAULT_THRESHOLD = 0.6;
export const DEFAULT_FETCH_TIMEOUT = 20000;
export const DEFAULT_CLASSIFIER_TIMEOUT = 30000;
export const DEFAULT_SENTIMENT_MODEL = "distilbert-base-uncased-finetuned-sst-2-english";
export const DEFAULT_SENTIMENT_ENDPOINT = "https://api-inference.huggingface.co/models";
export const DEFAULT_USER_AGENT = "LeaderWatch/1.0 (+https://example.com)";

export type Environment = Record<string, string | undefined>;

const jsonArray = z.string().transform((raw, ctx) => {
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a JSON array" });
    return z.NEVER;
  }
});

const LeadersSchema = jsonArray.pipe(z.array(z.string().trim().min(1)));

const UrlsSchema = jsonArray.pipe(
  z.array(
    z
      .string()
      .trim()
      .url()
      .refine((value) => /^https?:\/\//i.test(value), { message: "must be an http(s) URL" })
  )
);

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const flag = z
  .string()
  .optional()
  .transform((value) => ["1", "true", "yes"].includes((value ?? "").trim().toLowerCase()));

const SettingsSchema = z.object({
  LEADERS: LeadersSchema,
  TARGET_URLS: UrlsSchema,
  EMAIL_FROM: optionalText,
  EMAIL_PASS: optionalText,
  EMAIL_TO: optionalText,
  SMTP_HOST: optionalText.transform((value) => value ?? "smtp.gmail.com"),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SENTIMENT_MODEL: optionalText.transform((value) => value ?? DEFAULT_SENTIMENT_MODEL),
  SENTIMENT_ENDPOINT: z.string().trim().url().default(DEFAULT_SENTIMENT_ENDPOINT),
  HF_TOKEN: optionalText,
  MIN_NEGATIVE_SCORE: z.coerce.number().min(0).max(1).default(DEFAULT_THRESHOLD),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_FETCH_TIMEOUT),
  CLASSIFIER_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_CLASSIFIER_TIMEOUT),
  USER_AGENT: optionalText.transform((value) => value ?? DEFAULT_USER_AGENT),
  LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["error", "warn", "info", "debug"]))
    .default("info"),
  DRY_RUN: flag,
});

const REQUIRED_LISTS = ["LEADERS", "TARGET_URLS"] as const;

/**
 * Builds the run configuration from an environment record. Blank values count
 * as unset, so `LEADERS=""` is reported as missing rather than malformed.
 */
export function loadConfigFromEnv(env: Environment): MonitorConfig {
  const present: Environment = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === "string" && value.trim() !== "") {
      present[key] = value;
    }
  }

  const missing: string[] = REQUIRED_LISTS.filter((key) => !present[key]);
  if (missing.length) {
    throw new ConfigurationMissingError(missing);
  }

  const parsed = SettingsSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationInvalidError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
    );
  }
  const settings = parsed.data;

  const empty = REQUIRED_LISTS.filter((key) =>
    key === "LEADERS" ? settings.LEADERS.length === 0 : settings.TARGET_URLS.length === 0
  );
  if (empty.length) {
    throw new ConfigurationMissingError([...empty]);
  }

  const config: MonitorConfig = {
    leaders: Object.freeze([...settings.LEADERS]),
    targetUrls: Object.freeze([...settings.TARGET_URLS]),
    threshold: settings.MIN_NEGATIVE_SCORE,
    fetchTimeoutMs: settings.FETCH_TIMEOUT_MS,
    userAgent: settings.USER_AGENT,
    sentiment: Object.freeze({
      model: settings.SENTIMENT_MODEL,
      endpoint: settings.SENTIMENT_ENDPOINT,
      token: settings.HF_TOKEN,
      timeoutMs: settings.CLASSIFIER_TIMEOUT_MS,
    }),
    smtp: Object.freeze({
      host: settings.SMTP_HOST,
      port: settings.SMTP_PORT,
      from: settings.EMAIL_FROM,
      password: settings.EMAIL_PASS,
      to: settings.EMAIL_TO,
    }),
    logLevel: settings.LOG_LEVEL,
    dryRun: settings.DRY_RUN,
  };
  return Object.freeze(config);
}
