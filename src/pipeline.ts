import { resolveFieldIds } from "./field-catalog.js";
import type { JiraReportClient } from "./jira-client.js";
import type { Issue, IssueReport, IssueReportInput } from "./types.js";
import { runPool } from "./worker-pool.js";

export const DEFAULT_CONCURRENCY = 8;

export async function runIssueReport(
  client: JiraReportClient,
  input: IssueReportInput
): Promise<IssueReport> {
  const catalog = await client.resolveFieldCatalog();
  const columns = resolveFieldIds(catalog, input.fields);
  const callsBefore = client.restCallCount;

  const issues = await runPool(
    client.searchIssues(input.jql, columns),
    input.concurrency ?? DEFAULT_CONCURRENCY,
    (issue) => client.aggregateIssue(issue),
    input.onIssue
  );

  return {
    jql: input.jql,
    catalog,
    columns,
    issues: input.sortByKey ? sortIssuesByKey(issues) : issues,
    restCalls: client.restCallCount - callsBefore
  };
}

export function issueKey(issue: Issue): string {
  const key = issue.data.key;
  return typeof key === "string" ? key : "";
}

/** Orders by project prefix, then by the numeric part of the key (`PROJ-9` before `PROJ-10`). */
export function sortIssuesByKey(issues: readonly Issue[]): Issue[] {
  return [...issues].sort((left, right) => compareIssueKeys(issueKey(left), issueKey(right)));
}

function compareIssueKeys(left: string, right: string): number {
  const [leftProject, leftNumber] = splitKey(left);
  const [rightProject, rightNumber] = splitKey(right);

  if (leftProject !== rightProject) {
    return leftProject < rightProject ? -1 : 1;
  }

  return leftNumber - rightNumber;
}

function splitKey(key: string): [string, number] {
  const match = /^(.*)-(\d+)$/.exec(key);
  if (!match) {
    return [key, 0];
  }

  return [match[1] ?? key, Number.parseInt(match[2] ?? "0", 10)];
}
