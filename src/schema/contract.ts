/**
 * Input Contracts
 * JSON Schema contracts a task checks its change against, compiled with AJV
 */

import Ajv, { type ErrorObject, type SchemaObject } from "ajv";
import addFormats from "ajv-formats";
import { ValidationError, type ContractIssue } from "../errors";
import { cloneDeep } from "../flow/clone";

// Coercion and defaults write into the value; contracts validate a copy.
const ajv = new Ajv({
  allErrors: true,
  coerceTypes: true,
  useDefaults: true,
});
addFormats(ajv);

export interface Contract<T> {
  readonly schema: SchemaObject;
  /** Issues for a value, empty when it conforms */
  check(value: unknown): ContractIssue[];
  /** Coerced, defaulted copy of the value; throws ValidationError otherwise */
  parse(value: unknown, label?: string): T;
}

function toIssues(errors: ErrorObject[] | null | undefined): ContractIssue[] {
  return (errors ?? []).map((err) => ({
    path: err.instancePath || "/",
    message: err.message ?? "Unknown validation error",
  }));
}

/**
 * Compile a JSON Schema into a contract. T is not checked against the
 * schema.
 */
export function defineContract<T>(schema: SchemaObject): Contract<T> {
  const validate = ajv.compile<T>(schema);

  return {
    schema,
    check(value) {
      return validate(cloneDeep(value)) ? [] : toIssues(validate.errors);
    },
    parse(value, label = "input") {
      const candidate = cloneDeep(value);
      if (validate(candidate)) {
        return candidate;
      }
      const issues = toIssues(validate.errors);
      throw new ValidationError(
        `${label} does not match contract: ${issues
          .map((i) => `${i.path} ${i.message}`)
          .join("; ")}`,
        issues,
      );
    },
  };
}
