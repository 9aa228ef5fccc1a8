import type { JsonValue } from '../utils/json.js';
import type { Document } from '../web-engine/types.js';
import {
  FIELD_SYNONYMS,
  asObjects,
  readField,
  type FieldPolicy,
} from './field-policy.js';

/**
 * Collects the node URLs of every relation a page declares, both inside its
 * view(s) and at the document root. Duplicates are kept; the frontier
 * decides what is new.
 */
export class RelationExtractor {
  private readonly policy: FieldPolicy;

  constructor(policy: FieldPolicy = FIELD_SYNONYMS) {
    this.policy = policy;
  }

  extract(document: Document): string[] {
    const urls: string[] = [];

    for (const view of asObjects(readField(document, 'view', this.policy))) {
      urls.push(...this.nodeUrls(readField(view, 'relation', this.policy)));
    }

    urls.push(...this.nodeUrls(readField(document, 'relation', this.policy)));

    return urls;
  }

  private nodeUrls(relation: JsonValue | undefined): string[] {
    if (Array.isArray(relation)) {
      return relation.flatMap((entry) => this.nodeUrls(entry));
    }

    if (typeof relation !== 'object' || relation === null) {
      return [];
    }

    const node = readField(relation, 'node', this.policy);

    if (typeof node === 'string') {
      return node.length > 0 ? [node] : [];
    }

    if (typeof node === 'object' && node !== null && !Array.isArray(node)) {
      const id = readField(node, 'nodeId', this.policy);
      return typeof id === 'string' && id.length > 0 ? [id] : [];
    }

    return [];
  }
}
