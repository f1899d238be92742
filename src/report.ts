import { issueKey } from "./pipeline.js";
import type { Issue, IssueRow } from "./types.js";
import { extractField, NOT_AVAILABLE } from "./value-extractor.js";
import type { ExtractOptions } from "./value-extractor.js";

const SUB_TASK_HEADERS = ["Sub-task Type", "Sub-task Name", "Sub-task Assignee", "Sub-task Hours"];

export function toIssueRow(issue: Issue, options: ExtractOptions = {}): IssueRow {
  const values: Record<string, string> = {};

  for (const field of issue.fields) {
    values[field] =
      field === "assignee" && issue.assigneeName !== undefined
        ? issue.assigneeName
        : extractField(issue.data, field, options);
  }

  return {
    key: issueKey(issue),
    values,
    subTasks: issue.subTasks,
    developer: issue.assigneeName ?? null
  };
}

export function renderCsv(
  issues: readonly Issue[],
  columns: readonly string[],
  options: ExtractOptions = {}
): string {
  const lines = [["Key", ...columns, ...SUB_TASK_HEADERS]];

  for (const issue of issues) {
    const row = toIssueRow(issue, options);
    const parentCells = [row.key, ...columns.map((column) => cellValue(row, column))];

    if (row.subTasks.length === 0) {
      lines.push([...parentCells, NOT_AVAILABLE, NOT_AVAILABLE, NOT_AVAILABLE, NOT_AVAILABLE]);
      continue;
    }

    for (const subTask of row.subTasks) {
      lines.push([...parentCells, subTask.type, subTask.name, subTask.assigneeName, subTask.totalHours]);
    }
  }

  return lines.map((cells) => cells.map(escapeCell).join(",")).join("\n");
}

function cellValue(row: IssueRow, column: string): string {
  return Object.hasOwn(row.values, column) ? (row.values[column] ?? NOT_AVAILABLE) : NOT_AVAILABLE;
}

function escapeCell(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replaceAll('"', '""')}"`;
  }

  return value;
}
