import { promises as fs } from "fs";
import Ajv, { ValidateFunction } from "ajv";
import addFormats from "ajv-formats";

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

const validatorCache = new Map<string, ValidateFunction>();

export class SchemaValidationError extends Error {
  constructor(
    readonly label: string,
    readonly problems: string[]
  ) {
    super(`${label} failed schema validation: ${problems.join("; ")}`);
    this.name = "SchemaValidationError";
  }
}

export async function loadJsonSchema(schemaPath: string): Promise<object> {
  const content = await fs.readFile(schemaPath, "utf8");
  if (!content.trim()) {
    throw new Error(`Schema file is empty: ${schemaPath}`);
  }
  const parsed: unknown = JSON.parse(content);
  if (typeof parsed !== "object" || parsed === null) {
    throw new Error(`Schema file is not a JSON object: ${schemaPath}`);
  }
  return parsed;
}

export async function getSchemaValidator(schemaPath: string): Promise<ValidateFunction> {
  const cached = validatorCache.get(schemaPath);
  if (cached) return cached;
  const schema = await loadJsonSchema(schemaPath);
  const validator = ajv.compile(schema);
  validatorCache.set(schemaPath, validator);
  return validator;
}

/** At most `limit` problems are kept; a broken document tends to repeat the same one. */
export function assertValidSchema(
  validator: ValidateFunction,
  data: unknown,
  label: string,
  limit = 10
): void {
  const valid = validator(data);
  if (valid) return;
  const problems = (validator.errors ?? [])
    .slice(0, limit)
    .map((error) => `${error.instancePath || "<root>"} ${error.message ?? "is invalid"}`);
  throw new SchemaValidationError(label, problems);
}
