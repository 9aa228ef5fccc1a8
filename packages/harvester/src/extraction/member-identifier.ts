import type { JsonObject } from '../utils/json.js';
import { canonicalJson, isJsonObject } from '../utils/json.js';
import { sha256Hex } from '../utils/hash.js';
import {
  FIELD_SYNONYMS,
  readField,
  type FieldPolicy,
} from './field-policy.js';

/**
 * Canonical identity of a member record.
 *
 * The identity fields are tried in policy order and the first usable one
 * wins: a string, or an object carrying an identifier. A field holding
 * anything else is skipped. Members without any usable field are identified
 * by the SHA-256 of their canonical JSON, so key order never changes the
 * result.
 */
export class MemberIdentifier {
  private readonly policy: FieldPolicy;

  constructor(policy: FieldPolicy = FIELD_SYNONYMS) {
    this.policy = policy;
  }

  identify(member: JsonObject): string {
    for (const key of this.policy.identity) {
      const value = member[key];

      if (typeof value === 'string') {
        return value;
      }

      if (isJsonObject(value)) {
        const nested = readField(value, 'nodeId', this.policy);
        if (typeof nested === 'string') {
          return nested;
        }
      }
    }

    return sha256Hex(canonicalJson(member));
  }
}
