/**
 * Block and document types for the base UDMF namespaces
 * (`doom`, `heretic`, `hexen`, `strife`).
 */

import { CaseInsensitiveMap } from '../case-insensitive-map.js';
import type { BlockSchemaBuilder, DocumentSchemaBuilder, UdmfBlockType, UdmfDocumentType } from '../schema.js';
import { UdmfParsedMapData } from '../types.js';
import type { UdmfBlock } from '../types.js';
import type { UdmfUnknownAssignment } from '../unknown-assignment.js';

/** Five special arguments, `arg0` to `arg4`. */
export type SpecialArgs = [number, number, number, number, number];

export class UdmfVertex implements UdmfBlock {
  readonly unknownAssignments = new CaseInsensitiveMap<UdmfUnknownAssignment>();

  x = 0;
  y = 0;
}

export class UdmfLinedef implements UdmfBlock {
  readonly unknownAssignments = new CaseInsensitiveMap<UdmfUnknownAssignment>();

  id = -1;
  vertex1 = 0;
  vertex2 = 0;

  blocking = false;
  blockMonsters = false;
  blockFloaters = false;
  blockSound = false;
  jumpOver = false;
  twoSided = false;
  upperUnpegged = false;
  lowerUnpegged = false;
  secret = false;
  notOnAutomap = false;
  mapped = false;
  passUse = false;
  translucent = false;

  playerCross = false;
  playerUse = false;
  monsterCross = false;
  monsterUse = false;
  impact = false;
  playerPush = false;
  monsterPush = false;
  missileCross = false;
  repeatSpecial = false;

  special = 0;
  args: SpecialArgs = [0, 0, 0, 0, 0];

  sideFront = 0;
  sideBack = -1;

  comment = '';
}

export class UdmfSidedef implements UdmfBlock {
  readonly unknownAssignments = new CaseInsensitiveMap<UdmfUnknownAssignment>();

  offsetX = 0;
  offsetY = 0;
  textureTop = '-';
  textureMiddle = '-';
  textureBottom = '-';
  sector = 0;
  comment = '';
}

export class UdmfSector implements UdmfBlock {
  readonly unknownAssignments = new CaseInsensitiveMap<UdmfUnknownAssignment>();

  heightFloor = 0;
  heightCeiling = 0;
  textureFloor = '';
  textureCeiling = '';
  lightLevel = 160;
  special = 0;
  id = 0;
  comment = '';
}

export class UdmfThing implements UdmfBlock {
  readonly unknownAssignments = new CaseInsensitiveMap<UdmfUnknownAssignment>();

  id = 0;
  x = 0;
  y = 0;
  height = 0;
  angle = 0;
  type = 0;

  skill1 = false;
  skill2 = false;
  skill3 = false;
  skill4 = false;
  skill5 = false;
  single = false;
  deathmatch = false;
  cooperative = false;
  class1 = false;
  class2 = false;
  class3 = false;

  dormant = false;
  ambush = false;
  standing = false;
  friendly = false;
  strifeAlly = false;
  translucent = false;
  invisible = false;

  special = 0;
  args: SpecialArgs = [0, 0, 0, 0, 0];

  comment = '';
}

type FlagKey<T> = { [K in keyof T]: T[K] extends boolean ? K : never }[keyof T];

const LINEDEF_FLAGS: ReadonlyArray<readonly [string, FlagKey<UdmfLinedef>]> = [
  ['blocking', 'blocking'],
  ['blockmonsters', 'blockMonsters'],
  ['blockfloaters', 'blockFloaters'],
  ['blocksound', 'blockSound'],
  ['jumpover', 'jumpOver'],
  ['twosided', 'twoSided'],
  ['dontpegtop', 'upperUnpegged'],
  ['dontpegbottom', 'lowerUnpegged'],
  ['secret', 'secret'],
  ['dontdraw', 'notOnAutomap'],
  ['mapped', 'mapped'],
  ['passuse', 'passUse'],
  ['translucent', 'translucent'],
  ['playercross', 'playerCross'],
  ['playeruse', 'playerUse'],
  ['monstercross', 'monsterCross'],
  ['monsteruse', 'monsterUse'],
  ['impact', 'impact'],
  ['playerpush', 'playerPush'],
  ['monsterpush', 'monsterPush'],
  ['missilecross', 'missileCross'],
  ['repeatspecial', 'repeatSpecial'],
];

const THING_FLAGS: ReadonlyArray<readonly [string, FlagKey<UdmfThing>]> = [
  ['skill1', 'skill1'],
  ['skill2', 'skill2'],
  ['skill3', 'skill3'],
  ['skill4', 'skill4'],
  ['skill5', 'skill5'],
  ['single', 'single'],
  ['dm', 'deathmatch'],
  ['coop', 'cooperative'],
  ['class1', 'class1'],
  ['class2', 'class2'],
  ['class3', 'class3'],
  ['dormant', 'dormant'],
  ['ambush', 'ambush'],
  ['standing', 'standing'],
  ['friend', 'friendly'],
  ['strifeally', 'strifeAlly'],
  ['translucent', 'translucent'],
  ['invisible', 'invisible'],
];

function describeArgs<T extends UdmfBlock & { args: SpecialArgs }>(schema: BlockSchemaBuilder<T>): void {
  for (let i = 0; i < 5; i++) {
    schema.int32(`arg${i}`, (target, value) => {
      target.args[i] = value;
    });
  }
}

export function describeVertex<T extends UdmfVertex>(schema: BlockSchemaBuilder<T>): void {
  schema
    .float32('x', (v, value) => { v.x = value; })
    .float32('y', (v, value) => { v.y = value; });
}

export function describeLinedef(schema: BlockSchemaBuilder<UdmfLinedef>): void {
  schema
    .int32('id', (l, value) => { l.id = value; })
    .int32('v1', (l, value) => { l.vertex1 = value; })
    .int32('v2', (l, value) => { l.vertex2 = value; })
    .int32('special', (l, value) => { l.special = value; })
    .int32('sidefront', (l, value) => { l.sideFront = value; })
    .int32('sideback', (l, value) => { l.sideBack = value; })
    .string('comment', (l, value) => { l.comment = value; });

  for (const [identifier, key] of LINEDEF_FLAGS) {
    schema.bool(identifier, (l, value) => { l[key] = value; });
  }
  describeArgs(schema);
}

export function describeSidedef(schema: BlockSchemaBuilder<UdmfSidedef>): void {
  schema
    .float32('offsetx', (s, value) => { s.offsetX = value; })
    .float32('offsety', (s, value) => { s.offsetY = value; })
    .string('texturetop', (s, value) => { s.textureTop = value; })
    .string('texturemiddle', (s, value) => { s.textureMiddle = value; })
    .string('texturebottom', (s, value) => { s.textureBottom = value; })
    .int32('sector', (s, value) => { s.sector = value; })
    .string('comment', (s, value) => { s.comment = value; });
}

export function describeSector(schema: BlockSchemaBuilder<UdmfSector>): void {
  schema
    .float32('heightfloor', (s, value) => { s.heightFloor = value; })
    .float32('heightceiling', (s, value) => { s.heightCeiling = value; })
    .string('texturefloor', (s, value) => { s.textureFloor = value; })
    .string('textureceiling', (s, value) => { s.textureCeiling = value; })
    .int32('lightlevel', (s, value) => { s.lightLevel = value; })
    .int32('special', (s, value) => { s.special = value; })
    .int32('id', (s, value) => { s.id = value; })
    .string('comment', (s, value) => { s.comment = value; });
}

export function describeThing(schema: BlockSchemaBuilder<UdmfThing>): void {
  schema
    .int32('id', (t, value) => { t.id = value; })
    .float32('x', (t, value) => { t.x = value; })
    .float32('y', (t, value) => { t.y = value; })
    .float32('height', (t, value) => { t.height = value; })
    .int32('angle', (t, value) => { t.angle = value; })
    .int32('type', (t, value) => { t.type = value; })
    .int32('special', (t, value) => { t.special = value; })
    .string('comment', (t, value) => { t.comment = value; });

  for (const [identifier, key] of THING_FLAGS) {
    schema.bool(identifier, (t, value) => { t[key] = value; });
  }
  describeArgs(schema);
}

export const vertexBlock: UdmfBlockType<UdmfVertex> = {
  name: 'vertex',
  create: () => new UdmfVertex(),
  describe: describeVertex,
};

export const linedefBlock: UdmfBlockType<UdmfLinedef> = {
  name: 'linedef',
  create: () => new UdmfLinedef(),
  describe: describeLinedef,
};

export const sidedefBlock: UdmfBlockType<UdmfSidedef> = {
  name: 'sidedef',
  create: () => new UdmfSidedef(),
  describe: describeSidedef,
};

export const sectorBlock: UdmfBlockType<UdmfSector> = {
  name: 'sector',
  create: () => new UdmfSector(),
  describe: describeSector,
};

export const thingBlock: UdmfBlockType<UdmfThing> = {
  name: 'thing',
  create: () => new UdmfThing(),
  describe: describeThing,
};

/** Document shape shared by the built-in namespaces; they differ in their vertex type. */
export abstract class NamespacedMapData<V extends UdmfVertex> extends UdmfParsedMapData {
  namespace = '';

  vertices: V[] = [];
  linedefs: UdmfLinedef[] = [];
  sidedefs: UdmfSidedef[] = [];
  sectors: UdmfSector[] = [];
  things: UdmfThing[] = [];

  /** Set by `postProcess`, which only runs after an error-free parse. */
  postProcessed = false;

  override postProcess(): void {
    this.postProcessed = true;
  }
}

export function describeNamespacedMapData<V extends UdmfVertex, D extends NamespacedMapData<V>>(
  schema: DocumentSchemaBuilder<D>,
  vertexType: UdmfBlockType<V>,
): void {
  schema
    .string('namespace', (d, value) => { d.namespace = value; })
    .blocks('vertex', vertexType, (d) => d.vertices)
    .blocks('linedef', linedefBlock, (d) => d.linedefs)
    .blocks('sidedef', sidedefBlock, (d) => d.sidedefs)
    .blocks('sector', sectorBlock, (d) => d.sectors)
    .blocks('thing', thingBlock, (d) => d.things);
}

export class StandardMapData extends NamespacedMapData<UdmfVertex> {}

export const standardMapDocument: UdmfDocumentType<StandardMapData> = {
  name: 'standard',
  create: () => new StandardMapData(),
  describe: (schema) => describeNamespacedMapData(schema, vertexBlock),
};
