import { format, isValid, parse } from "date-fns";
import { MalformedResponseError } from "./errors.js";
import { isJsonObject, jsonKind } from "./json.js";
import type { JsonObject, JsonValue } from "./json.js";

export const NOT_AVAILABLE = "N/A";

export type CreatedDatePolicy = "fail" | "na";

export interface ExtractOptions {
  createdDatePolicy?: CreatedDatePolicy;
}

export const NESTED_VALUE_KEYS: Readonly<Record<string, string>> = {
  assignee: "displayName",
  reporter: "displayName",
  issuetype: "name",
  status: "name",
  priority: "name",
  timetracking: "originalEstimate"
};

const DEFAULT_NESTED_VALUE_KEY = "value";
const CREATED_TIMESTAMP = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}:\d{2})(?:\.\d+)?[+-]\d{4}$/;

export function nestedValueKey(fieldName: string): string {
  const normalized = fieldName.toLowerCase();
  return Object.hasOwn(NESTED_VALUE_KEYS, normalized)
    ? (NESTED_VALUE_KEYS[normalized] ?? DEFAULT_NESTED_VALUE_KEY)
    : DEFAULT_NESTED_VALUE_KEY;
}

export function extractField(
  issue: JsonObject,
  fieldName: string,
  options: ExtractOptions = {}
): string {
  const fields = issue.fields;
  if (!isJsonObject(fields) || !Object.hasOwn(fields, fieldName)) {
    return NOT_AVAILABLE;
  }

  const value = fields[fieldName] ?? null;

  if (fieldName.toLowerCase() === "created") {
    return formatCreated(value, options.createdDatePolicy ?? "fail");
  }

  return displayValue(value, fieldName).replaceAll(",", "");
}

/**
 * Renders a Jira timestamp such as `2023-03-05T10:15:30.000+0000` as `05/Mar/23`,
 * keeping the calendar date of the offset it was written in.
 */
export function formatCreated(value: JsonValue, policy: CreatedDatePolicy): string {
  const match = typeof value === "string" ? CREATED_TIMESTAMP.exec(value) : null;
  const wallClock = match ? parse(`${match[1]}T${match[2]}`, "yyyy-MM-dd'T'HH:mm:ss", new Date()) : null;

  if (!wallClock || !isValid(wallClock)) {
    if (policy === "na") {
      return NOT_AVAILABLE;
    }

    throw new MalformedResponseError(
      `Cannot parse created timestamp ${JSON.stringify(value)}; expected YYYY-MM-DDThh:mm:ss.sss±hhmm.`
    );
  }

  return format(wallClock, "dd/MMM/yy");
}

function displayValue(value: JsonValue, fieldName: string): string {
  if (Array.isArray(value)) {
    const first = value[0];
    if (first === undefined) {
      return "";
    }

    if (isJsonObject(first)) {
      return nestedString(first, DEFAULT_NESTED_VALUE_KEY, fieldName);
    }

    return scalarString(first, fieldName);
  }

  if (isJsonObject(value)) {
    return nestedString(value, nestedValueKey(fieldName), fieldName);
  }

  return scalarString(value, fieldName);
}

function nestedString(value: JsonObject, key: string, fieldName: string): string {
  const nested = Object.hasOwn(value, key) ? value[key] : null;
  return scalarString(nested ?? null, `${fieldName}.${key}`);
}

function scalarString(value: JsonValue, path: string): string {
  if (value === null) {
    return "";
  }

  if (typeof value === "object") {
    throw new MalformedResponseError(`Field ${path} holds an ${jsonKind(value)} where a scalar was expected.`);
  }

  return String(value);
}
