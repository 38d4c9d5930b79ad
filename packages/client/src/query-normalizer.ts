/**
 * @summary Resolves raw query inputs into canonical queries.
 *
 * A query may arrive as a bare target string or as a structured override.
 * Both are first tagged (`toQueryItem`) and then merged over the call-level
 * defaults and the service defaults (`normalizeQuery`), with precedence
 * item > call > service. The result is frozen.
 *
 * No network or rate-limit interaction happens here.
 *
 * Used by:
 * - Dispatcher, for every item of single, batch and streamed lookups
 */

import type {
  CanonicalQuery,
  OverrideQueryItem,
  QueryDefaults,
  QueryInput,
  QueryItem,
} from "@ipgeo/core";
import {
  ConfigurationError,
  DEFAULT_FIELDS,
  DEFAULT_LANG,
  SERVICE_FIELDS,
  InvalidQueryError,
  UnsupportedQueryError,
  isDomainName,
} from "@ipgeo/core";

// ---------------------------------------------------------------------------
// Tagging
// ---------------------------------------------------------------------------

/**
 * Classify a raw input as a plain target or an override.
 *
 * @param input - Raw caller input, typed loosely since it may come from
 *   untyped sources such as parsed files
 * @throws InvalidQueryError when the input is neither a string nor an object
 *   with a string `query`, or when an override is badly typed
 */
export function toQueryItem(input: unknown): QueryItem {
  if (typeof input === "string") {
    return { kind: "plain", target: requireTarget(input, input) };
  }

  if (typeof input !== "object" || input === null || Array.isArray(input)) {
    throw new InvalidQueryError(
      `Query must be a string or an object with a "query" field, got ${describe(input)}`,
      input
    );
  }

  const query = "query" in input ? input.query : undefined;
  if (typeof query !== "string") {
    throw new InvalidQueryError('Query object is missing a string "query" field', input);
  }

  const item: OverrideQueryItem = {
    kind: "override",
    target: requireTarget(query, input),
  };

  const fields = "fields" in input ? input.fields : undefined;
  if (fields !== undefined) {
    item.fields = requireFields(fields, input);
  }

  const lang = "lang" in input ? input.lang : undefined;
  if (lang !== undefined) {
    item.lang = requireLang(lang, input);
  }

  return item;
}

/**
 * Whether an input is a bare target with no per-item structure.
 */
export function isPlainQuery(input: QueryInput | QueryItem): boolean {
  if (typeof input === "string") {
    return true;
  }
  return "kind" in input && input.kind === "plain";
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

/**
 * Resolve one input into a canonical query.
 *
 * The input is usually a `QueryInput` or a `QueryItem`, but values from
 * untyped sources are accepted and checked.
 *
 * `fields` and `lang` are taken from the item, else from `defaults`, else
 * from the service defaults. The service fields (`status`, `message`,
 * `query`) are always appended when missing so every result can be checked
 * and matched.
 *
 * @throws InvalidQueryError for a missing or empty target, or badly typed
 *   overrides
 * @throws ConfigurationError for badly typed defaults
 *
 * @example
 * ```typescript
 * normalizeQuery({ query: "8.8.8.8", lang: "de" }, { fields: ["country"] });
 * // { target: "8.8.8.8", fields: ["country", "status", "message", "query"], lang: "de" }
 * ```
 */
export function normalizeQuery(
  input: unknown,
  defaults: QueryDefaults = {}
): CanonicalQuery {
  const item = fromTaggedItem(input) ?? toQueryItem(input);
  const base = resolveDefaults(defaults);

  if (item.kind === "plain") {
    return Object.freeze({ target: item.target, fields: base.fields, lang: base.lang });
  }

  return Object.freeze({
    target: item.target,
    fields:
      item.fields !== undefined
        ? Object.freeze(withServiceFields(item.fields))
        : base.fields,
    lang: item.lang ?? base.lang,
  });
}

/**
 * Resolve call-level defaults over the service defaults.
 *
 * Also serves the own-address lookup, which has no target.
 *
 * @throws ConfigurationError when the defaults are badly typed
 */
export function resolveDefaults(
  defaults: QueryDefaults = {}
): Pick<CanonicalQuery, "fields" | "lang"> {
  let fields: readonly string[] = DEFAULT_FIELDS;
  if (defaults.fields !== undefined) {
    const raw: unknown = defaults.fields;
    if (
      !Array.isArray(raw) ||
      raw.some((field) => typeof field !== "string" || field.trim() === "")
    ) {
      throw new ConfigurationError("fields", defaults.fields, "must be an array of non-empty strings");
    }
    fields = defaults.fields.map((field) => field.trim());
  }

  let lang: string = DEFAULT_LANG;
  if (defaults.lang !== undefined) {
    const raw: unknown = defaults.lang;
    if (typeof raw !== "string" || raw.trim() === "") {
      throw new ConfigurationError("lang", defaults.lang, "must be a non-empty string");
    }
    lang = defaults.lang.trim();
  }

  return Object.freeze({ fields: Object.freeze(withServiceFields(fields)), lang });
}

/**
 * Check that a canonical query can go to the batch endpoint.
 *
 * @throws UnsupportedQueryError when the target is a domain name
 */
export function assertBatchable(query: CanonicalQuery): void {
  if (isDomainName(query.target)) {
    throw new UnsupportedQueryError(query.target);
  }
}

/**
 * De-duplicate requested fields, keeping their order, and append the
 * service fields that are missing.
 */
export function withServiceFields(fields: readonly string[]): string[] {
  const merged = new Set<string>();
  for (const field of fields) {
    merged.add(field);
  }
  for (const field of SERVICE_FIELDS) {
    merged.add(field);
  }
  return [...merged];
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Re-check an already tagged item, which may come from an untyped source.
 *
 * @returns The checked item, or undefined when the value is not tagged
 * @throws InvalidQueryError when a tagged item is badly typed
 */
function fromTaggedItem(value: unknown): QueryItem | undefined {
  if (typeof value !== "object" || value === null || !("kind" in value) || !("target" in value)) {
    return undefined;
  }
  if ((value.kind !== "plain" && value.kind !== "override") || typeof value.target !== "string") {
    return undefined;
  }

  const target = requireTarget(value.target, value);
  if (value.kind === "plain") {
    return { kind: "plain", target };
  }

  const item: OverrideQueryItem = { kind: "override", target };
  const fields = "fields" in value ? value.fields : undefined;
  if (fields !== undefined) {
    item.fields = requireFields(fields, value);
  }
  const lang = "lang" in value ? value.lang : undefined;
  if (lang !== undefined) {
    item.lang = requireLang(lang, value);
  }
  return item;
}

function requireTarget(target: string, item: unknown): string {
  const trimmed = target.trim();
  if (trimmed === "") {
    throw new InvalidQueryError("Query target is empty", item);
  }
  return trimmed;
}

function requireFields(fields: unknown, item: unknown): readonly string[] {
  if (!Array.isArray(fields)) {
    throw new InvalidQueryError(`"fields" must be an array of strings, got ${describe(fields)}`, item);
  }
  const result: string[] = [];
  for (const field of fields) {
    if (typeof field !== "string" || field.trim() === "") {
      throw new InvalidQueryError(`"fields" must only hold non-empty strings`, item);
    }
    result.push(field.trim());
  }
  return result;
}

function requireLang(lang: unknown, item: unknown): string {
  if (typeof lang !== "string" || lang.trim() === "") {
    throw new InvalidQueryError(`"lang" must be a non-empty string, got ${describe(lang)}`, item);
  }
  return lang.trim();
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
