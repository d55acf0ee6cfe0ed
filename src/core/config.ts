// ─── Configuration graph ─────────────────────────────────────────────

export interface ArgInfo {
  /** Named type, with list/non-null wrappers stripped. */
  readonly typeOf: string;
  readonly list: boolean;
  readonly required: boolean;
}

export interface FieldInfo extends ArgInfo {
  readonly args: ReadonlyMap<string, ArgInfo>;
}

export interface TypeInfo {
  readonly fields: ReadonlyMap<string, FieldInfo>;
}

export interface RootSchema {
  readonly query?: string;
  readonly mutation?: string;
  readonly subscription?: string;
}

export type OperationKind = keyof RootSchema;

export const OPERATION_KINDS: readonly OperationKind[] = [
  "query",
  "mutation",
  "subscription",
];

export interface Config {
  /** Insertion order is significant and kept by every transform. */
  readonly types: ReadonlyMap<string, TypeInfo>;
  readonly schema: RootSchema;
}

// ─── Descriptors (input to factories) ────────────────────────────────

/**
 * A type reference written the way it appears in SDL, e.g. `"Post"`,
 * `"[Post]"`, `"InputUser!"` or `"[ID!]!"`.
 */
export type TypeRef = string;

export type FieldDescriptor =
  | TypeRef
  | {
    readonly type: TypeRef;
    readonly args?: { readonly [name: string]: TypeRef };
  };

export interface ConfigDescriptor {
  readonly schema?: RootSchema;
  readonly types: {
    readonly [typeName: string]: { readonly [fieldName: string]: FieldDescriptor };
  };
}

const TYPE_REF_PATTERN = /^(\[)?\s*([_A-Za-z][_0-9A-Za-z]*)\s*(!)?\s*(\])?\s*(!)?$/;

export function parseTypeRef(ref: TypeRef): ArgInfo {
  const match = TYPE_REF_PATTERN.exec(ref.trim());
  const list = match?.[1] !== undefined;
  if (
    !match ||
    list !== (match[4] !== undefined) ||
    (!list && match[5] !== undefined)
  ) {
    throw new Error(`Illegal type reference '${ref}'`);
  }
  const [, , name = "", innerBang, , outerBang] = match;
  // Outside a list the only "!" is captured by the inner group.
  const required = list ? outerBang !== undefined : innerBang !== undefined;
  return { typeOf: name, list, required };
}

/** Build a config from a compact, SDL-like literal. Handy in tests and scripts. */
export function createConfig(descriptor: ConfigDescriptor): Config {
  const types = new Map<string, TypeInfo>();
  for (const [typeName, fieldDescriptors] of Object.entries(descriptor.types)) {
    const fields = new Map<string, FieldInfo>();
    for (const [fieldName, desc] of Object.entries(fieldDescriptors)) {
      const { type, args = {} }: Exclude<FieldDescriptor, TypeRef> =
        typeof desc === "string" ? { type: desc } : desc;
      const argMap = new Map<string, ArgInfo>();
      for (const [argName, argRef] of Object.entries(args)) {
        argMap.set(argName, parseTypeRef(argRef));
      }
      fields.set(fieldName, { ...parseTypeRef(type), args: argMap });
    }
    types.set(typeName, { fields });
  }
  return { types, schema: { ...descriptor.schema } };
}

// ─── Queries ─────────────────────────────────────────────────────────

export function findType(config: Config, name: string): TypeInfo | undefined {
  return config.types.get(name);
}

export function findField(
  config: Config,
  typeName: string,
  fieldName: string,
): FieldInfo | undefined {
  return findType(config, typeName)?.fields.get(fieldName);
}

/**
 * Render a reference back to its SDL spelling, e.g. `[Post]!`.
 * Item nullability is not tracked, so `[Post!]` renders as `[Post]`.
 */
export function typeRefOf(info: ArgInfo): TypeRef {
  const inner = info.list ? `[${info.typeOf}]` : info.typeOf;
  return info.required ? `${inner}!` : inner;
}

/** Root names set on the schema, in `query`, `mutation`, `subscription` order. */
export function operationTypeNames(schema: RootSchema): string[] {
  const names: string[] = [];
  for (const kind of OPERATION_KINDS) {
    const name = schema[kind];
    if (name !== undefined) names.push(name);
  }
  return names;
}
