import { describe, expect, it } from "vitest";
import { TransportError } from "../../src/errors.js";
import { JiraReportClient } from "../../src/jira-client.js";
import { issueKey, runIssueReport, sortIssuesByKey } from "../../src/pipeline.js";
import type { Issue } from "../../src/types.js";
import { buildIssue, FakeTransport, statusChange } from "../helpers/fake-transport.js";

const fieldList = [
  { id: "summary", name: "Summary", custom: false },
  { id: "assignee", name: "Assignee", custom: false },
  { id: "customfield_10016", name: "Story Points", custom: true }
];

const searchHit = (id: string, key: string) => ({
  id,
  key,
  fields: { summary: `Summary of ${key}`, customfield_10016: 3 }
});

function createTransport(): FakeTransport {
  return new FakeTransport()
    .route("/rest/api/2/field", fieldList)
    .route("/rest/api/2/search", {
      total: 3,
      issues: [searchHit("110", "PROJ-10"), searchHit("102", "PROJ-2"), searchHit("109", "PROJ-9")]
    })
    .route(
      "/rest/api/2/issue/110?expand=changelog",
      buildIssue("110", "PROJ-10", { issuetype: { name: "Bug" }, subtasks: [{ id: "301" }] }, [
        statusChange("Alice", "Open", "In Development")
      ])
    )
    .route(
      "/rest/api/2/issue/102?expand=changelog",
      buildIssue("102", "PROJ-2", { issuetype: { name: "Story" }, subtasks: [{ id: "302" }, { id: "303" }] })
    )
    .route("/rest/api/2/issue/109?expand=changelog", buildIssue("109", "PROJ-9", { issuetype: { name: "Task" } }))
    .route("/rest/api/2/issue/301", buildIssue("301", "PROJ-11", { summary: "Patch" }))
    .route("/rest/api/2/issue/302", buildIssue("302", "PROJ-3", { summary: "Design" }))
    .route("/rest/api/2/issue/303", buildIssue("303", "PROJ-4", { summary: "Build" }));
}

describe("runIssueReport", () => {
  it("resolves columns, searches and aggregates every issue", async () => {
    const transport = createTransport();
    const client = new JiraReportClient(transport);
    const seen: string[] = [];

    const report = await runIssueReport(client, {
      jql: "project = PROJ",
      fields: ["summary", "Story Points", "assignee"],
      concurrency: 2,
      sortByKey: true,
      onIssue: (issue) => seen.push(issueKey(issue))
    });

    expect(report.columns).toEqual(["summary", "customfield_10016", "assignee"]);
    expect(transport.calls[1]).toEqual({
      path: "/rest/api/2/search",
      params: { jql: "project = PROJ", fields: "summary,customfield_10016,assignee", maxResults: "1000" }
    });
    expect(report.issues.map(issueKey)).toEqual(["PROJ-2", "PROJ-9", "PROJ-10"]);
    expect(report.issues.map((issue) => issue.subTasks.map((subTask) => subTask.name))).toEqual([
      ["Design", "Build"],
      [],
      ["Patch"]
    ]);
    expect(report.issues[2]?.assigneeName).toBe("Alice");
    expect(report.restCalls).toBe(6);
    expect([...seen].sort()).toEqual(["PROJ-10", "PROJ-2", "PROJ-9"]);
    expect(report.catalog.get("story points")).toBe("customfield_10016");
  });

  it("keeps completion order when sorting is off", async () => {
    const client = new JiraReportClient(createTransport());

    const report = await runIssueReport(client, {
      jql: "project = PROJ",
      fields: ["summary"],
      concurrency: 1
    });

    expect(report.issues.map(issueKey)).toEqual(["PROJ-10", "PROJ-2", "PROJ-9"]);
  });

  it("fails the whole report when one issue cannot be fetched", async () => {
    const transport = createTransport().route("/rest/api/2/search", {
      total: 2,
      issues: [searchHit("102", "PROJ-2"), searchHit("404", "PROJ-404")]
    });
    const client = new JiraReportClient(transport);

    await expect(
      runIssueReport(client, { jql: "project = PROJ", fields: ["summary"], concurrency: 1 })
    ).rejects.toBeInstanceOf(TransportError);
  });
});

describe("sortIssuesByKey", () => {
  const issue = (key: string): Issue => ({ data: { key }, fields: [], subTasks: [] });

  it("orders by project, then by issue number", () => {
    const sorted = sortIssuesByKey([issue("WEB-3"), issue("API-12"), issue("API-2"), issue("WEB-1")]);

    expect(sorted.map(issueKey)).toEqual(["API-2", "API-12", "WEB-1", "WEB-3"]);
  });

  it("does not reorder the input array", () => {
    const input = [issue("PROJ-2"), issue("PROJ-1")];

    sortIssuesByKey(input);

    expect(input.map(issueKey)).toEqual(["PROJ-2", "PROJ-1"]);
  });
});
