export { UdmfTokenKind, udmfTokenKindName, isValueToken } from './udmf-token.js';
export type { UdmfToken } from './udmf-token.js';
export { UdmfScanner } from './udmf-scanner.js';
export { CaseInsensitiveMap } from './case-insensitive-map.js';
export { parseIntegerLiteral, parseFloatLiteral, isInIntegerRange } from './numeric-literal.js';
export {
  getUnknownBool,
  getUnknownInt,
  getUnknownFloat,
  getUnknownString,
  getUnknownIdentifier,
  describeUnknownAssignment,
} from './unknown-assignment.js';
export type { UdmfUnknownAssignment, UdmfUnknownAssignmentKind, UdmfUnknownAssignments } from './unknown-assignment.js';
export {
  BlockSchema,
  BlockSchemaBuilder,
  DocumentSchema,
  DocumentSchemaBuilder,
  SchemaDefinitionError,
} from './schema.js';
export type {
  BlockListBinding,
  BlockSchemaSource,
  FieldBinding,
  ScalarType,
  ScalarTypeMap,
  UdmfBlockType,
  UdmfDocumentType,
} from './schema.js';
export { SchemaCache, defaultSchemaCache } from './schema-cache.js';
export { UdmfErrorCode, UdmfParsedMapData, UdmfUnknownBlock } from './types.js';
export type { UdmfBlock, UdmfParseError, UdmfParseResult, UdmfParserOptions } from './types.js';
export { UdmfParser, parseUdmf, formatUdmfParseError } from './udmf-parser.js';
export * from './standards/index.js';
