/**
 * Built schemas, keyed by the identity of their type descriptor. Each
 * descriptor is described exactly once per cache; entries are never
 * invalidated.
 */

import { BlockSchema, BlockSchemaBuilder, DocumentSchema, DocumentSchemaBuilder } from './schema.js';
import type { BlockSchemaSource, UdmfBlockType, UdmfDocumentType } from './schema.js';
import type { UdmfBlock, UdmfParsedMapData } from './types.js';

export class SchemaCache implements BlockSchemaSource {
  private readonly schemas = new Map<object, unknown>();

  documentSchema<D extends UdmfParsedMapData>(type: UdmfDocumentType<D>): DocumentSchema<D> {
    const cached = this.schemas.get(type);
    if (cached instanceof DocumentSchema && cached.type === type) {
      return cached;
    }

    const builder = new DocumentSchemaBuilder(type, this);
    type.describe(builder);
    const schema = builder.build();
    this.schemas.set(type, schema);
    return schema;
  }

  blockSchema<B extends UdmfBlock>(type: UdmfBlockType<B>): BlockSchema<B> {
    const cached = this.schemas.get(type);
    if (cached instanceof BlockSchema && cached.type === type) {
      return cached;
    }

    const builder = new BlockSchemaBuilder(type);
    type.describe(builder);
    const schema = builder.build();
    this.schemas.set(type, schema);
    return schema;
  }

  /** Number of schemas built so far. */
  get size(): number {
    return this.schemas.size;
  }
}

/** Cache used by parsers that are not given one. */
export const defaultSchemaCache = new SchemaCache();
