import { DEFAULT_BUG_ISSUE_TYPES, DEFAULT_DEVELOPMENT_STATUS, findDeveloperOfRecord, isBugIssueType } from "./changelog.js";
import { MalformedResponseError } from "./errors.js";
import { buildFieldCatalog } from "./field-catalog.js";
import type { FieldCatalog } from "./field-catalog.js";
import type { JsonValue } from "./json.js";
import {
  changeLogSchema,
  fieldListSchema,
  issueIdSchema,
  parseResponse,
  jsonObjectSchema,
  searchResponseSchema,
  subTaskListSchema
} from "./schemas.js";
import type { Transport } from "./transport.js";
import type { AggregationOptions, Issue, RawIssue, SubTask } from "./types.js";
import { extractField } from "./value-extractor.js";

export const SEARCH_PAGE_SIZE = 1000;

export interface JiraReportClientOptions extends Partial<AggregationOptions> {
  onNotice?: (message: string) => void;
}

export class JiraReportClient {
  private restCalls = 0;
  private readonly aggregation: AggregationOptions;
  private readonly onNotice: (message: string) => void;

  constructor(
    private readonly transport: Transport,
    options: JiraReportClientOptions = {}
  ) {
    this.aggregation = {
      createdDatePolicy: options.createdDatePolicy ?? "fail",
      bugIssueTypes: options.bugIssueTypes ?? DEFAULT_BUG_ISSUE_TYPES,
      developmentStatus: options.developmentStatus ?? DEFAULT_DEVELOPMENT_STATUS
    };
    this.onNotice = options.onNotice ?? (() => undefined);
  }

  /** Issue and sub-task fetches issued so far by this client. */
  get restCallCount(): number {
    return this.restCalls;
  }

  get extractOptions(): Pick<AggregationOptions, "createdDatePolicy"> {
    return { createdDatePolicy: this.aggregation.createdDatePolicy };
  }

  async resolveFieldCatalog(): Promise<FieldCatalog> {
    const body = await this.getJson("/rest/api/2/field");
    const definitions = parseResponse(fieldListSchema, body, "field list");
    return buildFieldCatalog(definitions);
  }

  async getIssue(issueId: string, includeChangeLog: boolean): Promise<RawIssue> {
    const path = includeChangeLog
      ? `/rest/api/2/issue/${encodeURIComponent(issueId)}?expand=changelog`
      : `/rest/api/2/issue/${encodeURIComponent(issueId)}`;

    this.restCalls += 1;
    const body = await this.getJson(path);
    return parseResponse(jsonObjectSchema, body, `issue ${issueId}`);
  }

  /**
   * Runs one bounded search page. Results beyond {@link SEARCH_PAGE_SIZE} are
   * not fetched.
   */
  async *searchIssues(jql: string, fields: readonly string[]): AsyncGenerator<Issue, void, undefined> {
    const body = await this.getJson("/rest/api/2/search", {
      jql,
      fields: fields.join(","),
      maxResults: String(SEARCH_PAGE_SIZE)
    });
    const response = parseResponse(searchResponseSchema, body, "search");

    if (response.total !== undefined && response.total > response.issues.length) {
      this.onNotice(
        `Search matched ${response.total} issues; only the first ${response.issues.length} are reported.`
      );
    }

    for (const data of response.issues) {
      yield { data, fields: [...fields], subTasks: [] };
    }
  }

  async aggregateIssue(issue: Issue): Promise<Issue> {
    const { id } = parseResponse(issueIdSchema, issue.data, "search result");
    const parent = await this.getIssue(id, true);
    return this.aggregateParent(issue, parent, id);
  }

  /** Aggregates a single issue looked up by id or key; `data` is the fetched parent. */
  async breakdownIssue(issueId: string, fields: readonly string[]): Promise<Issue> {
    const parent = await this.getIssue(issueId, true);
    return this.aggregateParent({ data: parent, fields: [...fields], subTasks: [] }, parent, issueId);
  }

  private async aggregateParent(issue: Issue, parent: RawIssue, id: string): Promise<Issue> {
    const { fields } = parseResponse(subTaskListSchema, parent, `issue ${id}`);

    const subTasks: SubTask[] = [];
    for (const ref of fields.subtasks) {
      const subTaskIssue = await this.getIssue(ref.id, false);
      subTasks.push(this.toSubTask(subTaskIssue));
    }

    const parentType = extractField(parent, "issuetype", this.extractOptions);
    if (!isBugIssueType(parentType, this.aggregation.bugIssueTypes)) {
      return { ...issue, subTasks };
    }

    const { changelog } = parseResponse(changeLogSchema, parent, `changelog of issue ${id}`);
    return {
      ...issue,
      subTasks,
      assigneeName: findDeveloperOfRecord(changelog.histories, this.aggregation.developmentStatus)
    };
  }

  private toSubTask(subTaskIssue: RawIssue): SubTask {
    const options = this.extractOptions;

    return {
      type: extractField(subTaskIssue, "issuetype", options),
      name: extractField(subTaskIssue, "summary", options),
      assigneeName: extractField(subTaskIssue, "assignee", options),
      totalHours: extractField(subTaskIssue, "timetracking", options)
    };
  }

  private async getJson(path: string, params?: Record<string, string>): Promise<JsonValue> {
    const body = await this.transport.get(path, params);

    try {
      return JSON.parse(body);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new MalformedResponseError(`GET ${path} returned a body that is not JSON: ${reason}`);
    }
  }
}
