import type { Quad } from '@rdfjs/types';
import { JsonLdParser } from 'jsonld-streaming-parser';
import { Writer } from 'n3';
import type { JsonValue } from '../utils/json.js';

type JsonLdCodecOptions = {
  /** Base IRI for relative identifiers in the document. */
  baseIRI?: string;
};

/**
 * JSON-LD to N-Triples conversion. Remote contexts are resolved by the
 * parser's default document loader.
 */
export class JsonLdCodec {
  private readonly options: JsonLdCodecOptions;

  constructor(options: JsonLdCodecOptions = {}) {
    this.options = options;
  }

  toQuads(document: JsonValue): Promise<Quad[]> {
    return new Promise((resolve, reject) => {
      const quads: Quad[] = [];
      const parser = new JsonLdParser({ baseIRI: this.options.baseIRI });

      parser.on('data', (quad: Quad) => {
        quads.push(quad);
      });
      parser.on('error', reject);
      parser.on('end', () => resolve(quads));

      parser.write(JSON.stringify(document));
      parser.end();
    });
  }

  /** Every quad is written into the default graph. */
  async toNTriples(document: JsonValue): Promise<string> {
    const quads = await this.toQuads(document);

    return new Promise((resolve, reject) => {
      const writer = new Writer({ format: 'N-Triples' });
      for (const quad of quads) {
        writer.addQuad(quad.subject, quad.predicate, quad.object);
      }
      writer.end((error, result: string) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(result);
      });
    });
  }
}

export type { JsonLdCodecOptions };
