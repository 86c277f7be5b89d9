import Ajv2020 from "ajv/dist/2020.js";
import type { ErrorObject, ValidateFunction, Options } from "ajv";
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import type { PartbenchConfigFile, RunBatchFile } from "./types.js";

const schemaDir = join(dirname(fileURLToPath(import.meta.url)), "../../schemas");

const loadSchema = (fileName: string): unknown => {
  const raw = readFileSync(join(schemaDir, fileName), "utf8");
  return JSON.parse(raw) as unknown;
};

const Ajv2020Ctor = Ajv2020 as unknown as new (opts?: Options) => {
  compile: <T>(schema: unknown) => ValidateFunction<T>;
};

const ajv = new Ajv2020Ctor({
  allErrors: true,
  strict: true,
  validateSchema: true
});

export const validateConfigFile: ValidateFunction<PartbenchConfigFile> = ajv.compile(
  loadSchema("config.schema.json")
);
export const validateRunBatch: ValidateFunction<RunBatchFile> = ajv.compile(
  loadSchema("run-batch.schema.json")
);

export const formatAjvErrors = (
  schemaName: string,
  errors: ErrorObject[] | null | undefined
): string[] => {
  if (!errors || errors.length === 0) {
    return [];
  }

  return errors.map((error) => {
    const path = error.instancePath || "";
    const message = error.message ?? "is invalid";
    return `${schemaName}${path}: ${message}`.trim();
  });
};

export const assertValid = <T>(
  name: string,
  validate: ValidateFunction<T>,
  value: unknown
): T => {
  if (validate(value)) {
    return value;
  }
  const formatted = formatAjvErrors(name, validate.errors);
  const message = formatted.length > 0 ? formatted.join("\n") : `${name} is invalid`;
  throw new Error(message);
};
