import { DEFAULT_BUG_ISSUE_TYPES, DEFAULT_DEVELOPMENT_STATUS } from "./changelog.js";
import type { CreatedDatePolicy } from "./value-extractor.js";

export const MAX_CONCURRENCY = 32;

export interface ReportConfig {
  baseUrl: string;
  authHeader: string;
  requestTimeoutMs: number;
  concurrency: number;
  createdDatePolicy: CreatedDatePolicy;
  bugIssueTypes: string[];
  developmentStatus: string;
}

export function loadReportConfig(env: NodeJS.ProcessEnv = process.env): ReportConfig {
  const baseUrl = normalizeBaseUrl(readRequired(env.JIRA_BASE_URL, "JIRA_BASE_URL"));

  let token = normalizeOptional(env.JIRA_AUTH_TOKEN);
  if (!token) {
    const email = readRequired(env.JIRA_EMAIL, "JIRA_EMAIL");
    const apiToken = readRequired(env.JIRA_API_TOKEN, "JIRA_API_TOKEN");
    token = Buffer.from(`${email}:${apiToken}`).toString("base64");
  }

  return {
    baseUrl,
    authHeader: `Basic ${token}`,
    requestTimeoutMs: parsePositiveInt(env.JIRA_REQUEST_TIMEOUT_MS, "JIRA_REQUEST_TIMEOUT_MS", 20_000),
    concurrency: parseConcurrency(env.REPORT_CONCURRENCY),
    createdDatePolicy: parseCreatedDatePolicy(env.REPORT_CREATED_DATE_POLICY),
    bugIssueTypes: parseList(env.REPORT_BUG_ISSUE_TYPES) ?? [...DEFAULT_BUG_ISSUE_TYPES],
    developmentStatus: normalizeOptional(env.REPORT_DEVELOPMENT_STATUS) ?? DEFAULT_DEVELOPMENT_STATUS
  };
}

function parseConcurrency(input: string | undefined): number {
  const concurrency = parsePositiveInt(input, "REPORT_CONCURRENCY", 8);
  if (concurrency > MAX_CONCURRENCY) {
    throw new Error(`REPORT_CONCURRENCY must be at most ${MAX_CONCURRENCY}.`);
  }

  return concurrency;
}

function parseCreatedDatePolicy(input: string | undefined): CreatedDatePolicy {
  const normalized = input?.trim().toLowerCase();
  if (!normalized) {
    return "fail";
  }

  if (normalized === "fail" || normalized === "na") {
    return normalized;
  }

  throw new Error("REPORT_CREATED_DATE_POLICY must be one of: fail, na.");
}

function parsePositiveInt(input: string | undefined, name: string, fallback: number): number {
  const raw = input?.trim();
  if (!raw) {
    return fallback;
  }

  const value = /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : Number.NaN;
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer.`);
  }

  return value;
}

function parseList(input: string | undefined): string[] | undefined {
  const entries = (input ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  return entries.length > 0 ? entries : undefined;
}

function normalizeBaseUrl(raw: string): string {
  const trimmed = raw.trim().replace(/\/+$/, "");

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    throw new Error("JIRA_BASE_URL must be a valid URL, e.g. https://your-domain.atlassian.net");
  }

  if (parsed.protocol !== "https:") {
    throw new Error("JIRA_BASE_URL must use HTTPS.");
  }

  return parsed.toString().replace(/\/+$/, "");
}

function normalizeOptional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function readRequired(value: string | undefined, name: string): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    throw new Error(`Missing required environment variable: ${name}`);
  }

  return trimmed;
}
