import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { createSchemaCompiler, type CompiledSchema, type SchemaCompiler } from "./compiler.js";

/** Documents certctl reads back from disk or takes from a harness. */
export type DocumentKind = "adapter-output" | "anchors" | "baseline" | "receipt";

export type SchemaCheck = {
  valid: boolean;
  errors: string | null;
};

export const SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

function readSchema(schemaDir: string, kind: DocumentKind): unknown {
  const file = path.join(schemaDir, `${kind}.schema.json`);
  if (!fs.existsSync(file)) throw new Error(`Schema for ${kind} not found: ${file}`);
  return JSON.parse(fs.readFileSync(file, "utf8"));
}

/**
 * Validators for the documents certctl persists, compiled from
 * `<schemaDir>/<kind>.schema.json` when loaded.
 */
export class DocumentSchemas {
  private constructor(
    private readonly compiler: SchemaCompiler,
    private readonly validators: Readonly<Record<DocumentKind, CompiledSchema>>,
  ) {}

  static load(schemaDir: string = SCHEMA_DIR): DocumentSchemas {
    if (!fs.existsSync(schemaDir)) throw new Error(`Schema directory not found: ${schemaDir}`);
    const compiler = createSchemaCompiler();
    const compile = (kind: DocumentKind) => compiler.compile(readSchema(schemaDir, kind));
    return new DocumentSchemas(compiler, {
      "adapter-output": compile("adapter-output"),
      anchors: compile("anchors"),
      baseline: compile("baseline"),
      receipt: compile("receipt"),
    });
  }

  check(kind: DocumentKind, data: unknown): SchemaCheck {
    const validate = this.validators[kind];
    const valid = validate(data);
    return { valid, errors: valid ? null : this.compiler.errorsText(validate.errors) };
  }
}
