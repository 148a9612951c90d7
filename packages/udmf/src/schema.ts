/**
 * Explicit schema tables for UDMF documents.
 *
 * A document type describes itself once through a builder: which top-level
 * keys it binds, with which value type, and which block tags it collects
 * into which lists. Block types describe their own keys the same way.
 * Blocks cannot declare nested block lists; the format has one level of
 * nesting.
 *
 * ```ts
 * const vertexBlock: UdmfBlockType<Vertex> = {
 *   name: 'vertex',
 *   create: () => new Vertex(),
 *   describe: (schema) => schema
 *     .float32('x', (v, value) => { v.x = value; })
 *     .float32('y', (v, value) => { v.y = value; }),
 * };
 * ```
 */

import { LevelscanError } from '@levelscan/core';
import { CaseInsensitiveMap } from './case-insensitive-map.js';
import type { UdmfBlock, UdmfParsedMapData } from './types.js';

/** Runtime value for each declarable field type. */
export interface ScalarTypeMap {
  bool: boolean;
  int32: number;
  uint32: number;
  int64: bigint;
  uint64: bigint;
  float32: number;
  float64: number;
  string: string;
}

export type ScalarType = keyof ScalarTypeMap;

/** One declared key. `type` discriminates the value `assign` receives. */
export type FieldBinding<T> = {
  [K in ScalarType]: {
    readonly type: K;
    /** Spelling used in the declaration. Lookup ignores case. */
    readonly identifier: string;
    readonly assign: (target: T, value: ScalarTypeMap[K]) => void;
  };
}[ScalarType];

export interface UdmfBlockType<B extends UdmfBlock> {
  /** Used in diagnostics only. */
  readonly name: string;
  create(): B;
  describe(schema: BlockSchemaBuilder<B>): void;
}

export interface UdmfDocumentType<D extends UdmfParsedMapData> {
  readonly name: string;
  create(): D;
  describe(schema: DocumentSchemaBuilder<D>): void;
}

export class BlockSchema<B extends UdmfBlock> {
  constructor(
    readonly type: UdmfBlockType<B>,
    readonly fields: CaseInsensitiveMap<FieldBinding<B>>,
  ) {}
}

/**
 * A declared block tag. `append` creates the block, adds it to the
 * document's list and hands it to `visit` together with its schema.
 */
export interface BlockListBinding<D> {
  readonly identifier: string;
  append<R>(document: D, visit: <B extends UdmfBlock>(block: B, schema: BlockSchema<B>) => R): R;
}

export class DocumentSchema<D extends UdmfParsedMapData> {
  constructor(
    readonly type: UdmfDocumentType<D>,
    readonly fields: CaseInsensitiveMap<FieldBinding<D>>,
    readonly blocks: CaseInsensitiveMap<BlockListBinding<D>>,
  ) {}
}

/** A schema declaration is malformed. Thrown when the schema is first built. */
export class SchemaDefinitionError extends LevelscanError {
  constructor(
    public readonly schemaName: string,
    public readonly identifier: string,
    public readonly reason: string,
  ) {
    super(`Schema "${schemaName}": identifier "${identifier}" ${reason}`);
    this.name = 'SchemaDefinitionError';
  }
}

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

function checkIdentifier(schemaName: string, identifier: string, taken: { has(key: string): boolean }): void {
  if (identifier.length === 0) {
    throw new SchemaDefinitionError(schemaName, identifier, 'is empty');
  }
  if (!IDENTIFIER_PATTERN.test(identifier)) {
    throw new SchemaDefinitionError(schemaName, identifier, 'is not a valid identifier');
  }
  if (taken.has(identifier)) {
    throw new SchemaDefinitionError(schemaName, identifier, 'is declared more than once');
  }
}

abstract class FieldSchemaBuilder<T> {
  protected readonly fieldMap = new CaseInsensitiveMap<FieldBinding<T>>();

  constructor(protected readonly schemaName: string) {}

  bool(identifier: string, assign: (target: T, value: boolean) => void): this {
    return this.add({ type: 'bool', identifier, assign });
  }

  int32(identifier: string, assign: (target: T, value: number) => void): this {
    return this.add({ type: 'int32', identifier, assign });
  }

  uint32(identifier: string, assign: (target: T, value: number) => void): this {
    return this.add({ type: 'uint32', identifier, assign });
  }

  int64(identifier: string, assign: (target: T, value: bigint) => void): this {
    return this.add({ type: 'int64', identifier, assign });
  }

  uint64(identifier: string, assign: (target: T, value: bigint) => void): this {
    return this.add({ type: 'uint64', identifier, assign });
  }

  /** Values are rounded to single precision. */
  float32(identifier: string, assign: (target: T, value: number) => void): this {
    return this.add({ type: 'float32', identifier, assign });
  }

  float64(identifier: string, assign: (target: T, value: number) => void): this {
    return this.add({ type: 'float64', identifier, assign });
  }

  string(identifier: string, assign: (target: T, value: string) => void): this {
    return this.add({ type: 'string', identifier, assign });
  }

  private add(binding: FieldBinding<T>): this {
    checkIdentifier(this.schemaName, binding.identifier, this.fieldMap);
    this.fieldMap.set(binding.identifier, binding);
    return this;
  }
}

export class BlockSchemaBuilder<B extends UdmfBlock> extends FieldSchemaBuilder<B> {
  constructor(private readonly type: UdmfBlockType<B>) {
    super(type.name);
  }

  build(): BlockSchema<B> {
    return new BlockSchema(this.type, this.fieldMap);
  }
}

/** Resolves block schemas while a document schema is being built. */
export interface BlockSchemaSource {
  blockSchema<B extends UdmfBlock>(type: UdmfBlockType<B>): BlockSchema<B>;
}

export class DocumentSchemaBuilder<D extends UdmfParsedMapData> extends FieldSchemaBuilder<D> {
  private readonly blockMap = new CaseInsensitiveMap<BlockListBinding<D>>();

  constructor(
    private readonly type: UdmfDocumentType<D>,
    private readonly blockSchemas: BlockSchemaSource,
  ) {
    super(type.name);
  }

  /**
   * Collect every `identifier { ... }` block into the list `list` returns.
   * The document is expected to create that list itself.
   */
  blocks<B extends UdmfBlock>(identifier: string, blockType: UdmfBlockType<B>, list: (document: D) => B[]): this {
    checkIdentifier(this.schemaName, identifier, this.blockMap);

    const schema = this.blockSchemas.blockSchema(blockType);
    this.blockMap.set(identifier, {
      identifier,
      append<R>(document: D, visit: <X extends UdmfBlock>(block: X, schema: BlockSchema<X>) => R): R {
        const block = blockType.create();
        list(document).push(block);
        return visit(block, schema);
      },
    });
    return this;
  }

  build(): DocumentSchema<D> {
    return new DocumentSchema(this.type, this.fieldMap, this.blockMap);
  }
}
