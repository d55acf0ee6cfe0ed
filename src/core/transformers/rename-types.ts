import type {
  ArgInfo,
  Config,
  FieldInfo,
  OperationKind,
  RootSchema,
  TypeInfo,
} from "../config";
import { OPERATION_KINDS } from "../config";
import type { Transform } from "../transform";
import { resolveName, warn } from "../utils";
import { Valid } from "../valid";

export type RenamePair = readonly [existingName: string, suggestedName: string];

/**
 * Renames existing types, rewriting every reference to them: type keys,
 * schema roots, field types and argument types.
 *
 * All old names are checked against the input before anything is renamed; a
 * missing type fails the whole transform with one error per missing name.
 * Renames apply simultaneously, so `{ A → B, B → C }` moves both types and a
 * reference always ends at the final name. The input config is never mutated.
 */
export class RenameTypes implements Transform<Config, string> {
  private readonly renames: ReadonlyMap<string, string>;

  constructor(suggestedNames: Iterable<RenamePair>) {
    this.renames = new Map(suggestedNames);
  }

  static fromRecord(record: { readonly [name: string]: string }): RenameTypes {
    return new RenameTypes(Object.entries(record));
  }

  transform(config: Config): Valid<Config, string> {
    const { types, schema } = config;

    return Valid.fromIter(this.renames.keys(), (existingName): Valid<void, string> =>
      types.has(existingName)
        ? Valid.succeed(undefined)
        : Valid.fail(`Type '${existingName}' not found in configuration.`),
    ).map(() => ({
      types: rewriteReferences(placeTypes(types, this.renames), this.renames),
      schema: renameRoots(schema, this.renames),
    }));
  }
}

// ─── Phase 1: keys & roots ───────────────────────────────────────────

interface Placement {
  readonly slot: number;
  /** Name the body had in the input. */
  readonly origin: string;
  readonly info: TypeInfo;
}

/**
 * Give every type its final name. Renamed types keep their slot; a rename onto
 * a name that is already taken overwrites the body in that name's slot, the
 * way an ordered map insert does. Later pairs win.
 */
function placeTypes(
  types: ReadonlyMap<string, TypeInfo>,
  renames: ReadonlyMap<string, string>,
): Map<string, TypeInfo> {
  const slotOf = new Map<string, number>();
  const placed = new Map<string, Placement>();
  let slot = 0;
  for (const [name, info] of types) {
    slotOf.set(name, slot);
    if (!renames.has(name)) placed.set(name, { slot, origin: name, info });
    slot++;
  }

  for (const [existingName, suggestedName] of renames) {
    const info = types.get(existingName);
    const ownSlot = slotOf.get(existingName);
    // Every name was checked before placement.
    if (info === undefined || ownSlot === undefined) continue;

    const previous = placed.get(suggestedName);
    if (previous) warn(collisionMessage(existingName, suggestedName, previous.origin));
    placed.set(suggestedName, {
      slot: previous?.slot ?? ownSlot,
      origin: existingName,
      info,
    });
  }

  const ordered = new Array<[string, TypeInfo] | undefined>(slot);
  for (const [name, placement] of placed) {
    ordered[placement.slot] = [name, placement.info];
  }
  const result = new Map<string, TypeInfo>();
  for (const entry of ordered) {
    if (entry) result.set(entry[0], entry[1]);
  }
  return result;
}

function collisionMessage(
  existingName: string,
  suggestedName: string,
  replaced: string,
): string {
  return replaced === suggestedName
    ? `Renaming '${existingName}' to '${suggestedName}' replaces the existing type '${suggestedName}', ` +
    `references to '${suggestedName}' now point at the former '${existingName}'`
    : `Renaming '${existingName}' to '${suggestedName}' replaces '${replaced}', renamed to the same name, ` +
    `references to both now point at the former '${existingName}'`;
}

// A type is treated as at most one root per rename; the first matching kind wins.
function renameRoots(
  schema: RootSchema,
  renames: ReadonlyMap<string, string>,
): RootSchema {
  const result: { -readonly [K in OperationKind]?: string } = { ...schema };
  for (const [existingName, suggestedName] of renames) {
    const kind = OPERATION_KINDS.find((k) => schema[k] === existingName);
    if (kind) result[kind] = suggestedName;
  }
  return result;
}

// ─── Phase 2: references ─────────────────────────────────────────────

function rewriteReferences(
  types: ReadonlyMap<string, TypeInfo>,
  lookup: ReadonlyMap<string, string>,
): Map<string, TypeInfo> {
  const result = new Map<string, TypeInfo>();
  for (const [typeName, typeInfo] of types) {
    const fields = new Map<string, FieldInfo>();
    for (const [fieldName, field] of typeInfo.fields) {
      const args = new Map<string, ArgInfo>();
      for (const [argName, arg] of field.args) {
        args.set(argName, { ...arg, typeOf: resolveName(lookup, arg.typeOf) });
      }
      fields.set(fieldName, {
        ...field,
        typeOf: resolveName(lookup, field.typeOf),
        args,
      });
    }
    result.set(typeName, { ...typeInfo, fields });
  }
  return result;
}
