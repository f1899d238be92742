#!/usr/bin/env node

import "dotenv/config";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import * as z from "zod/v4";
import { loadReportConfig, MAX_CONCURRENCY } from "./config.js";
import { formatError } from "./errors.js";
import { JiraReportClient } from "./jira-client.js";
import { runIssueReport } from "./pipeline.js";
import { renderCsv, toIssueRow } from "./report.js";
import { JiraTransport } from "./transport.js";
import type { FieldCatalogEntry, IssueReportInput, ReportFormat } from "./types.js";

const nonEmpty = z.string().trim().min(1);

const config = loadReportConfig();
const transport = new JiraTransport(config);

const server = new McpServer({
  name: "jira-issue-report-mcp",
  version: "0.1.0"
});

server.registerTool(
  "jira_field_catalog",
  {
    title: "Jira Field Catalog",
    description:
      "List custom fields by lower-cased display name. A custom name taken by a built-in field is left out."
  },
  async () =>
    runTool(async () => {
      const catalog = await createClient().resolveFieldCatalog();
      const fields: FieldCatalogEntry[] = [...catalog.entries()]
        .map(([name, id]) => ({ name, id }))
        .sort((left, right) => left.name.localeCompare(right.name));

      return { fields };
    })
);

server.registerTool(
  "jira_issue_report",
  {
    title: "Jira Issue Report",
    description:
      "Search issues with JQL (first 1000 results), load every sub-task, credit bugs to the user who moved them to development, and return flat report rows.",
    inputSchema: {
      jql: nonEmpty.describe("JQL filter, e.g. project = PROJ AND sprint in openSprints()"),
      fields: z
        .array(nonEmpty)
        .min(1)
        .max(100)
        .describe("Report columns as field names or ids, e.g. summary, assignee, Story Points."),
      concurrency: z
        .number()
        .int()
        .min(1)
        .max(MAX_CONCURRENCY)
        .optional()
        .describe(`Issues processed in parallel. Default: ${config.concurrency}.`),
      sortByKey: z
        .boolean()
        .optional()
        .describe("Sort rows by issue key instead of completion order. Default: true."),
      format: z
        .enum(["json", "csv"])
        .optional()
        .describe("json returns row objects, csv returns one text block. Default: json.")
    }
  },
  async ({ jql, fields, concurrency, sortByKey, format }) =>
    runTool(async () => {
      const client = createClient();
      const input: IssueReportInput = {
        jql,
        fields,
        concurrency: concurrency ?? config.concurrency,
        sortByKey: sortByKey ?? true
      };

      const report = await runIssueReport(client, input);
      console.error(
        `Report for "${jql}": ${report.issues.length} issues, ${report.restCalls} issue REST calls.`
      );

      const outputFormat: ReportFormat = format ?? "json";
      if (outputFormat === "csv") {
        return {
          columns: report.columns,
          restCalls: report.restCalls,
          csv: renderCsv(report.issues, report.columns, client.extractOptions)
        };
      }

      return {
        columns: report.columns,
        restCalls: report.restCalls,
        issues: report.issues.map((issue) => toIssueRow(issue, client.extractOptions))
      };
    })
);

server.registerTool(
  "jira_issue_breakdown",
  {
    title: "Jira Issue Breakdown",
    description:
      "Load one issue with its sub-tasks (type, summary, assignee, original estimate) and, for bugs, the developer of record.",
    inputSchema: {
      issueId: nonEmpty.describe("Jira issue id or key, e.g. 10042 or PROJ-123"),
      fields: z
        .array(nonEmpty)
        .max(100)
        .optional()
        .describe("Field ids to include in the row. Default: summary, issuetype, status, assignee.")
    }
  },
  async ({ issueId, fields }) =>
    runTool(async () => {
      const client = createClient();
      const issue = await client.breakdownIssue(
        issueId,
        fields ?? ["summary", "issuetype", "status", "assignee"]
      );

      return {
        issue: toIssueRow(issue, client.extractOptions),
        restCalls: client.restCallCount
      };
    })
);

function createClient(): JiraReportClient {
  return new JiraReportClient(transport, {
    createdDatePolicy: config.createdDatePolicy,
    bugIssueTypes: config.bugIssueTypes,
    developmentStatus: config.developmentStatus,
    onNotice: (message) => console.error(message)
  });
}

async function main(): Promise<void> {
  const stdio = new StdioServerTransport();
  await server.connect(stdio);
  console.error("jira-issue-report-mcp is running on stdio");
}

main().catch((error) => {
  console.error("Fatal startup error:", formatError(error));
  process.exit(1);
});

async function runTool<T>(operation: () => Promise<T>) {
  try {
    const payload = await operation();
    return {
      content: [
        {
          type: "text" as const,
          text: JSON.stringify(payload, null, 2)
        }
      ]
    };
  } catch (error) {
    return {
      isError: true,
      content: [
        {
          type: "text" as const,
          text: formatError(error)
        }
      ]
    };
  }
}
