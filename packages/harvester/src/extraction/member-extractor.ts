import type { JsonObject } from '../utils/json.js';
import type { Document } from '../web-engine/types.js';
import {
  FIELD_SYNONYMS,
  asObjects,
  readAllFields,
  type FieldPolicy,
} from './field-policy.js';

/** Raw member records of a page, in source order, without dedup. */
export class MemberExtractor {
  private readonly policy: FieldPolicy;

  constructor(policy: FieldPolicy = FIELD_SYNONYMS) {
    this.policy = policy;
  }

  extract(document: Document): JsonObject[] {
    return readAllFields(document, 'member', this.policy).flatMap((value) =>
      asObjects(value),
    );
  }
}
