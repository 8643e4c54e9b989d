/**
 * JSON schemas for structured model replies.
 *
 * The same schema objects are sent to the provider as the strict output
 * format and used locally to validate what comes back.
 *
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises';
import AjvModule, { type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import type { Mode } from '../conversation/types.js';

const Ajv = AjvModule.default;

/**
 * Turn reply exactly as it appears on the wire.
 */
export interface WireTurnResponse {
  readonly assistant_message: string;
  readonly state: {
    readonly mode: Mode;
    readonly convergence_ready: boolean;
    readonly confidence: readonly { readonly topic: string; readonly score: number }[];
    readonly direction_thesis: string;
    readonly next_user_prompt: string;
  };
  readonly blueprint_md: string | null;
}

/**
 * Critique reply exactly as it appears on the wire.
 */
export interface WireCritique {
  readonly issues: readonly string[];
}

/**
 * Outcome of validating a decoded payload.
 */
export type SchemaCheck<T> =
  | { readonly valid: true; readonly value: T }
  | { readonly valid: false; readonly errors: readonly string[] };

/**
 * A named schema plus its compiled validator.
 */
export interface ReplySchema<T> {
  /** Name sent as `text.format.name`. */
  readonly name: string;
  /** Raw schema object sent as `text.format.schema`. */
  readonly schema: SchemaObject;
  /** Validates a decoded JSON value. */
  check(payload: unknown): SchemaCheck<T>;
}

/**
 * The schemas the gateway needs.
 */
export interface ReplySchemas {
  readonly turn: ReplySchema<WireTurnResponse>;
  readonly critique: ReplySchema<WireCritique>;
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatErrors(errors: readonly ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(
    (e) => `${e.instancePath === '' ? '/' : e.instancePath}: ${e.message ?? 'Unknown error'}`
  );
}

function toReplySchema<T>(
  name: string,
  schema: SchemaObject,
  validate: ValidateFunction<T>
): ReplySchema<T> {
  return {
    name,
    schema,
    check(payload: unknown): SchemaCheck<T> {
      if (validate(payload)) {
        return { valid: true, value: payload };
      }
      return { valid: false, errors: formatErrors(validate.errors) };
    },
  };
}

/**
 * Compiles reply schemas from already-parsed schema objects.
 *
 * @throws Error if a schema does not compile.
 */
export function compileReplySchemas(turnSchema: SchemaObject, critiqueSchema: SchemaObject): ReplySchemas {
  const ajv = new Ajv({ allErrors: true, allowUnionTypes: true });

  return {
    turn: toReplySchema('turn_response', turnSchema, ajv.compile<WireTurnResponse>(turnSchema)),
    critique: toReplySchema('critique', critiqueSchema, ajv.compile<WireCritique>(critiqueSchema)),
  };
}

async function readSchema(schemaName: string): Promise<SchemaObject> {
  const schemaUrl = new URL(`../../schemas/${schemaName}.schema.json`, import.meta.url);
  const parsed: unknown = JSON.parse(await readFile(schemaUrl, 'utf8'));
  if (!isSchemaObject(parsed)) {
    throw new Error(`Schema '${schemaName}' is not a JSON object`);
  }
  // The provider rejects the draft marker inside text.format.schema.
  const { $schema: _draft, ...schema } = parsed;
  return schema;
}

/**
 * Loads and compiles the bundled reply schemas from the schemas/ directory.
 *
 * @throws Error if a schema file is missing or invalid.
 */
export async function loadReplySchemas(): Promise<ReplySchemas> {
  const [turnSchema, critiqueSchema] = await Promise.all([
    readSchema('turn-response'),
    readSchema('critique'),
  ]);
  return compileReplySchemas(turnSchema, critiqueSchema);
}
