import { isJsonObject, type JsonObject, type JsonValue } from '../utils/json.js';

/**
 * Key variants tolerated for each concept, in lookup order. Publishers emit
 * compacted keys (`relation`), keyword-style keys (`@relation`) or prefixed
 * keys (`tree:relation`) depending on their JSON-LD context.
 */
const FIELD_SYNONYMS = {
  view: ['view', '@view', 'tree:view'],
  relation: ['relation', '@relation', 'tree:relation'],
  node: ['node', '@node', 'tree:node'],
  nodeId: ['@id', 'id'],
  member: ['member', 'members', '@member', '@members', 'tree:member'],
  identity: ['@id', 'id', 'object', '@type'],
  type: ['@type', 'type'],
  context: ['@context'],
  graph: ['@graph'],
} as const satisfies Record<string, readonly string[]>;

type FieldConcept = keyof typeof FIELD_SYNONYMS;
type FieldPolicy = Record<FieldConcept, readonly string[]>;

const EVENT_STREAM_TYPES: readonly string[] = [
  'EventStream',
  'ldes:EventStream',
  'https://w3id.org/ldes#EventStream',
];

// Null, empty strings and empty lists count as absent, so a later synonym wins.
function isPresent(value: JsonValue | undefined): value is JsonValue {
  if (value === undefined || value === null) {
    return false;
  }

  if (typeof value === 'string' || Array.isArray(value)) {
    return value.length > 0;
  }

  return true;
}

/** First present value among the concept's keys. */
function readField(
  object: JsonObject,
  concept: FieldConcept,
  policy: FieldPolicy = FIELD_SYNONYMS,
): JsonValue | undefined {
  for (const key of policy[concept]) {
    const value = object[key];
    if (isPresent(value)) {
      return value;
    }
  }

  return undefined;
}

/** Every present value among the concept's keys, in policy order. */
function readAllFields(
  object: JsonObject,
  concept: FieldConcept,
  policy: FieldPolicy = FIELD_SYNONYMS,
): JsonValue[] {
  const values: JsonValue[] = [];

  for (const key of policy[concept]) {
    const value = object[key];
    if (isPresent(value)) {
      values.push(value);
    }
  }

  return values;
}

/** A single object or a list of objects, flattened; anything else is dropped. */
function asObjects(value: JsonValue | undefined): JsonObject[] {
  if (Array.isArray(value)) {
    return value.filter(isJsonObject);
  }

  return isJsonObject(value) ? [value] : [];
}

function isEventStream(
  document: JsonObject,
  policy: FieldPolicy = FIELD_SYNONYMS,
): boolean {
  const types = readAllFields(document, 'type', policy).flatMap((value) =>
    Array.isArray(value) ? value : [value],
  );

  return types.some(
    (type) => typeof type === 'string' && EVENT_STREAM_TYPES.includes(type),
  );
}

export {
  EVENT_STREAM_TYPES,
  FIELD_SYNONYMS,
  asObjects,
  isEventStream,
  readAllFields,
  readField,
};
export type { FieldConcept, FieldPolicy };
