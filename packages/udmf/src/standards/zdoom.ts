/**
 * The `zdoom` namespace. Vertices gain floor and ceiling heights; the
 * other blocks are the base ones.
 */

import type { BlockSchemaBuilder, UdmfBlockType, UdmfDocumentType } from '../schema.js';
import { NamespacedMapData, UdmfVertex, describeNamespacedMapData, describeVertex } from './standard.js';

export class ZDoomVertex extends UdmfVertex {
  zFloor = 0;
  zCeiling = 0;
}

export function describeZDoomVertex(schema: BlockSchemaBuilder<ZDoomVertex>): void {
  describeVertex(schema);
  schema
    .float32('zfloor', (v, value) => { v.zFloor = value; })
    .float32('zceiling', (v, value) => { v.zCeiling = value; });
}

export const zdoomVertexBlock: UdmfBlockType<ZDoomVertex> = {
  name: 'vertex',
  create: () => new ZDoomVertex(),
  describe: describeZDoomVertex,
};

export class ZDoomMapData extends NamespacedMapData<ZDoomVertex> {}

export const zdoomMapDocument: UdmfDocumentType<ZDoomMapData> = {
  name: 'zdoom',
  create: () => new ZDoomMapData(),
  describe: (schema) => describeNamespacedMapData(schema, zdoomVertexBlock),
};
