// ─── Validation ──────────────────────────────────────────────────────
export type { Cause, ValidResult } from "./core/valid";
export { Valid, ValidationError } from "./core/valid";

// ─── Configuration graph ─────────────────────────────────────────────
export type {
  Config,
  TypeInfo,
  FieldInfo,
  ArgInfo,
  RootSchema,
  OperationKind,
  TypeRef,
  FieldDescriptor,
  ConfigDescriptor,
} from "./core/config";
export {
  OPERATION_KINDS,
  createConfig,
  parseTypeRef,
  typeRefOf,
  findType,
  findField,
  operationTypeNames,
} from "./core/config";

// ─── Transforms ──────────────────────────────────────────────────────
export type { Transform } from "./core/transform";
export type { RenamePair } from "./core/transformers/rename-types";
export { RenameTypes } from "./core/transformers/rename-types";

// ─── graphql-js adapter ──────────────────────────────────────────────
export { configFromSchema, argInfoOf } from "./core/schema-adapter";
