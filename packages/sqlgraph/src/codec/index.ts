export {
  VALUE_TYPES,
  assertPropertyKey,
  encodeValue,
  encodeProperties,
  encodePatch,
  decodeValue,
  decodeProperties,
  parseStoredProperty,
  applyPatch,
  cloneProperties,
  createPropertyMap,
  createPropertyPatch,
  ownProperty,
  sameValue,
} from "./codec"
export type { PropertyRow, ValueType } from "./codec"
