import type { FieldCatalog } from "./field-catalog.js";
import type { JsonObject } from "./json.js";
import type { CreatedDatePolicy } from "./value-extractor.js";

export type RawIssue = JsonObject;

export interface SubTask {
  type: string;
  name: string;
  assigneeName: string;
  totalHours: string;
}

export interface Issue {
  data: RawIssue;
  fields: string[];
  subTasks: SubTask[];
  assigneeName?: string;
}

export interface AggregationOptions {
  createdDatePolicy: CreatedDatePolicy;
  bugIssueTypes: readonly string[];
  developmentStatus: string;
}

export interface IssueReportInput {
  jql: string;
  fields: string[];
  concurrency?: number;
  sortByKey?: boolean;
  onIssue?: (issue: Issue) => void;
}

export interface IssueReport {
  jql: string;
  catalog: FieldCatalog;
  columns: string[];
  issues: Issue[];
  restCalls: number;
}

export interface FieldCatalogEntry {
  name: string;
  id: string;
}

export interface IssueRow {
  key: string;
  values: Record<string, string>;
  subTasks: SubTask[];
  developer: string | null;
}

export type ReportFormat = "json" | "csv";
