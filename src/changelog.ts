import type { JsonObject } from "./json.js";
import type { ChangeLogHistory } from "./schemas.js";

export const DEFAULT_BUG_ISSUE_TYPES: readonly string[] = ["bug", "functional bug", "production issue"];
export const DEFAULT_DEVELOPMENT_STATUS = "In Development";

export function isBugIssueType(
  issueType: string,
  bugTypes: readonly string[] = DEFAULT_BUG_ISSUE_TYPES
): boolean {
  const normalized = issueType.toLowerCase();
  return bugTypes.some((bugType) => bugType.toLowerCase() === normalized);
}

/**
 * Name of the author of the first history item that moved the issue into
 * `targetStatus`, or an empty string when the issue never got there.
 */
export function findDeveloperOfRecord(
  histories: readonly ChangeLogHistory[],
  targetStatus: string = DEFAULT_DEVELOPMENT_STATUS
): string {
  for (const history of histories) {
    const entered = history.items.some((item) => transitionTarget(item) === targetStatus);
    const developerName = entered ? (history.author?.displayName ?? "") : "";

    if (developerName !== "") {
      return developerName;
    }
  }

  return "";
}

/** The `toString` of a history item, read as an own property. */
export function transitionTarget(item: JsonObject): string | undefined {
  const target = Object.getOwnPropertyDescriptor(item, "toString")?.value;
  return typeof target === "string" ? target : undefined;
}
