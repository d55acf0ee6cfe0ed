/**
 * Give the blog schema's placeholder names something readable, then print
 * every field with its (possibly rewritten) type.
 */
import { fileURLToPath } from "url";
import { RenameTypes, typeRefOf } from "../../../src/index";
import { loadLocalConfig } from "../../../src/node";

const location = fileURLToPath(new URL("./schema.graphql", import.meta.url));

const config = await loadLocalConfig(location);
const result = RenameTypes.fromRecord({
  Query: "PostQuery",
  A: "User",
  B: "InputUser",
  Mutation: "UserMutation",
})
  .transform(config)
  .toResult();

if (!result.ok) {
  for (const message of result.error.messages()) console.error(message);
  process.exitCode = 1;
} else {
  console.log(`query root: ${result.value.schema.query ?? "(none)"}`);
  for (const [typeName, type] of result.value.types) {
    for (const [fieldName, field] of type.fields) {
      const args = [...field.args]
        .map(([argName, arg]) => `${argName}: ${typeRefOf(arg)}`)
        .join(", ");
      console.log(`${typeName}.${fieldName}${args ? `(${args})` : ""}: ${typeRefOf(field)}`);
    }
  }
}
