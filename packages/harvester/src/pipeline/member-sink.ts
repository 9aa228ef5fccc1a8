import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createLogger } from '@ldes-harvester/logger';
import { ConversionFailure } from '../errors.js';
import { readField } from '../extraction/field-policy.js';
import { sha256Hex } from '../utils/hash.js';
import { isJsonObject } from '../utils/json.js';
import type { JsonObject, JsonValue } from '../utils/json.js';
import { JsonLdCodec } from './jsonld-codec.js';

const log = createLogger('MemberSink');

type PersistResult =
  | { success: true; artifactPath: string }
  | { success: false; error: ConversionFailure };

/**
 * Destination for harvested members. Implementations never reject: a
 * member that cannot be stored comes back as a `ConversionFailure`.
 */
interface MemberSink {
  persist(
    identity: string,
    member: JsonObject,
    context: JsonValue | undefined,
  ): Promise<PersistResult>;
}

export function artifactName(identity: string): string {
  return `${sha256Hex(identity)}.nt`;
}

/**
 * Builds the JSON-LD document for a member. An `@graph` payload becomes the
 * document itself; otherwise the member is used with the page context
 * attached when it carries none.
 */
export function buildMemberDocument(
  member: JsonObject,
  context: JsonValue | undefined,
): JsonValue {
  const graph = readField(member, 'graph');
  const fallbackContext = context ?? readField(member, 'context');

  if (isJsonObject(graph)) {
    if ('@context' in graph || fallbackContext === undefined) {
      return graph;
    }
    return { '@context': fallbackContext, ...graph };
  }

  if (Array.isArray(graph) && graph.length > 0) {
    return fallbackContext === undefined
      ? { '@graph': graph }
      : { '@context': fallbackContext, '@graph': graph };
  }

  if (context !== undefined && !('@context' in member)) {
    return { '@context': context, ...member };
  }

  return member;
}

/** Writes each member as `<sha256(identity)>.nt` in the cache directory. */
export class NTriplesMemberSink implements MemberSink {
  private readonly cacheDir: string;
  private readonly codec: JsonLdCodec;

  constructor(cacheDir: string, codec: JsonLdCodec = new JsonLdCodec()) {
    this.cacheDir = cacheDir;
    this.codec = codec;
  }

  async persist(
    identity: string,
    member: JsonObject,
    context: JsonValue | undefined,
  ): Promise<PersistResult> {
    try {
      const nTriples = await this.codec.toNTriples(
        buildMemberDocument(member, context),
      );
      const artifactPath = join(this.cacheDir, artifactName(identity));
      await writeFile(artifactPath, nTriples, 'utf-8');

      log.debug(`Saved member ${identity} to ${artifactPath}`);
      return { success: true, artifactPath };
    } catch (error) {
      return { success: false, error: new ConversionFailure(identity, error) };
    }
  }
}

export type { MemberSink, PersistResult };
