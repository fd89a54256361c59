export type LeaderName = string;

export interface Snippet {
  text: string;
  context: string;
}

export interface ClassificationResult {
  label: string;
  score: number; // 0..1
}

export interface Alert {
  leader: LeaderName;
  text: string;
  context: string;
  url: string;
  score: number;
}

export interface Digest {
  subject: string;
  body: string;
  count: number;
}

export type LabelConvention =
  | { kind: "contains"; fragment: string }
  | { kind: "exact"; label: string };

export interface SmtpSettings {
  host: string;
  port: number;
  from?: string;
  password?: string;
  to?: string;
}

export interface SentimentSettings {
  model: string;
  endpoint: string;
  token?: string;
  timeoutMs: number;
}

export interface MonitorConfig {
  leaders: readonly LeaderName[];
  targetUrls: readonly string[];
  threshold: number;
  fetchTimeoutMs: number;
  userAgent: string;
  sentiment: SentimentSettings;
  smtp: SmtpSettings;
  logLevel: LogLevel;
  dryRun: boolean;
}

export type LogLevel = "error" | "warn" | "info" | "debug";

export type RunState =
  | { state: "idle" }
  | { state: "fetching"; url: string }
  | { state: "extracting"; url: string }
  | { state: "matching"; url: string }
  | { state: "classifying"; url: string; leader: LeaderName }
  | { state: "deciding"; url: string; leader: LeaderName }
  | { state: "aggregating" }
  | { state: "notifying" }
  | { state: "done" };

export interface RunSummary {
  urlsScanned: number;
  urlsFailed: number;
  snippetsFound: number;
  snippetsClassified: number;
  classificationFailures: number;
  alerts: Alert[];
  digest: Digest | null;
  notified: boolean;
}
