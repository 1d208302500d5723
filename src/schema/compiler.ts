import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

/** A compiled schema; `errors` holds the last failure's ajv errors. */
export type CompiledSchema = ((data: unknown) => boolean) & { errors?: unknown };

/** The part of Ajv certctl validates through. */
export type SchemaCompiler = {
  compile: (schema: unknown) => CompiledSchema;
  errorsText: (errors: unknown) => string;
};

/**
 * Strict draft 2020-12 compiler reporting every error, with the standard formats
 * (receipt timestamps are `date-time`). Ajv and ajv-formats are CommonJS default
 * exports, which NodeNext types as the module object, hence the casts.
 */
export function createSchemaCompiler(): SchemaCompiler {
  const Compiler = Ajv2020 as unknown as new (opts: { allErrors: boolean; strict: boolean }) => SchemaCompiler;
  const withFormats = addFormats as unknown as (ajv: SchemaCompiler) => SchemaCompiler;
  return withFormats(new Compiler({ allErrors: true, strict: true }));
}
