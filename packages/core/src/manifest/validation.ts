import Ajv from "ajv/dist/2020";
import type { AnySchema, ErrorObject, ValidateFunction } from "ajv";
import caskDataSchema from "./schemas/cask-data.schema.json";
import formulaDataSchema from "./schemas/formula-data.schema.json";
import type { PackageKind } from "./types";

const ajv = new Ajv({ allErrors: true, strict: true });

const schemas: Record<PackageKind, AnySchema> = {
  cask: caskDataSchema,
  formula: formulaDataSchema
};

const validators = new Map<PackageKind, ValidateFunction>();

export function validateManifestData(data: unknown): { ok: boolean; errors: string[] } {
  const kind = kindOf(data);
  if (!kind) {
    return { ok: false, errors: ["/kind must be cask or formula"] };
  }
  let validator = validators.get(kind);
  if (!validator) {
    validator = ajv.compile(schemas[kind]);
    validators.set(kind, validator);
  }
  const ok = validator(data);
  return { ok, errors: normalizeErrors(validator.errors) };
}

function kindOf(value: unknown): PackageKind | undefined {
  if (typeof value !== "object" || value === null || !("kind" in value)) {
    return undefined;
  }
  return value.kind === "cask" || value.kind === "formula" ? value.kind : undefined;
}

export function normalizeErrors(errors?: ErrorObject[] | null): string[] {
  if (!errors || errors.length === 0) {
    return [];
  }
  return errors.map((error) => `${error.instancePath} ${error.message}`.trim());
}
