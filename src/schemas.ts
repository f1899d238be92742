import * as z from "zod/v4";
import { MalformedResponseError } from "./errors.js";
import type { JsonObject } from "./json.js";

export const jsonObjectSchema = z.custom<JsonObject>(
  (value) => typeof value === "object" && value !== null && !Array.isArray(value),
  { message: "Expected a JSON object" }
);

export const fieldDefinitionSchema = z.object({
  id: z.string(),
  name: z.string(),
  custom: z.boolean()
});

export const fieldListSchema = z.array(fieldDefinitionSchema);

export const searchResponseSchema = z.object({
  issues: z.array(jsonObjectSchema),
  total: z.number().optional()
});

export const issueIdSchema = z.object({
  id: z.string()
});

export const subTaskListSchema = z.object({
  fields: z.object({
    subtasks: z.array(z.object({ id: z.string() }))
  })
});

export const changeLogHistorySchema = z.object({
  author: z
    .object({
      displayName: z.string().optional()
    })
    .nullable()
    .optional(),
  items: z.array(jsonObjectSchema)
});

export const changeLogSchema = z.object({
  changelog: z.object({
    histories: z.array(changeLogHistorySchema)
  })
});

export type FieldDefinition = z.infer<typeof fieldDefinitionSchema>;
export type ChangeLogHistory = z.infer<typeof changeLogHistorySchema>;

export function parseResponse<T extends z.ZodType>(
  schema: T,
  value: unknown,
  context: string
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.length > 0 ? issue.path.map(String).join(".") : "<root>"}: ${issue.message}`)
      .join("; ");
    throw new MalformedResponseError(`Unexpected ${context} response shape (${details}).`);
  }

  return result.data;
}
