export { QuakeTokenKind, quakeTokenKindName, tokenLength } from './map-token.js';
export type { QuakeToken } from './map-token.js';
export { QuakeMapScanner } from './map-scanner.js';
export { QuakeMapParser, parseQuakeMap, formatQuakeMapParseError } from './map-parser.js';
export type {
  QuakeMap,
  QuakeEntity,
  QuakeBrush,
  QuakePlane,
  QuakeMapParseError,
  QuakeMapParseResult,
  QuakeMapParserOptions,
} from './types.js';
export {
  tryGetEntityString,
  tryGetEntityBool,
  tryGetEntityInt,
  tryGetEntityFloat,
  tryGetEntityVector2,
  tryGetEntityVector3,
  tryGetEntityVector4,
  getEntityString,
  getEntityBool,
  getEntityInt,
  getEntityFloat,
  getEntityVector2,
  getEntityVector3,
  getEntityVector4,
} from './entity-properties.js';
