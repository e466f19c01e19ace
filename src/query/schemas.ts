import { z } from "zod";

import { CatalogValidationError, ERROR_CODES, toValidationIssues } from "../errors.js";
import type { FieldValue } from "../records/types.js";
import { isFieldValue, toText, type Primitive, type QueryOperand } from "../records/values.js";
import type { FieldAccessor } from "./fieldAccessor.js";
import { LOGICAL_OPERATORS, QUERY_OPERATORS, QueryCondition, QueryGroup } from "./condition.js";

const OperandSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);

/** JSON form of a single condition. */
export const QueryConditionSchema = z
  .object({
    field: z.string().trim().min(1, "field must not be empty"),
    operator: z.enum(QUERY_OPERATORS).default("eq"),
    value: OperandSchema.optional(),
    enabled: z.boolean().default(true),
  })
  .strict();

/** JSON form of a condition group, as stored in saved searches or passed to the CLI. */
export const QueryDefinitionSchema = z
  .object({
    logic: z.enum(LOGICAL_OPERATORS).default("and"),
    conditions: z.array(QueryConditionSchema).default([]),
  })
  .strict();

export type QueryDefinition = z.infer<typeof QueryDefinitionSchema>;

/** Validates a JSON query definition and builds the matching group. */
export function parseQueryDefinition(input: unknown, accessor?: FieldAccessor): QueryGroup {
  const parsed = QueryDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    throw new CatalogValidationError(ERROR_CODES.INVALID_QUERY, toValidationIssues(parsed.error));
  }
  const conditions = parsed.data.conditions.map(
    (condition) =>
      new QueryCondition({
        field: condition.field,
        operator: condition.operator,
        value: condition.value ?? null,
        enabled: condition.enabled,
        ...(accessor ? { accessor } : {}),
      }),
  );
  return new QueryGroup(parsed.data.logic, conditions, accessor);
}

/** Serialises a group back to its JSON form. */
export function toQueryDefinition(group: QueryGroup): QueryDefinition {
  return {
    logic: group.logic,
    conditions: group.conditions.map((condition) => ({
      field: condition.field,
      operator: condition.operator,
      value: toPrimitive(condition.value),
      enabled: condition.enabled,
    })),
  };
}

function toPrimitive(operand: QueryOperand): Primitive {
  if (operand === null || !isFieldValue(operand)) {
    return operand;
  }
  return primitiveOf(operand);
}

function primitiveOf(value: FieldValue): Primitive {
  switch (value.kind) {
    case "int":
    case "float":
    case "bool":
    case "string":
      return value.value;
    default:
      return toText(value);
  }
}
