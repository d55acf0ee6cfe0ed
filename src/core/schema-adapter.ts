import {
  GraphQLEnumType,
  GraphQLInputObjectType,
  GraphQLInterfaceType,
  GraphQLObjectType,
  GraphQLScalarType,
  GraphQLSchema,
  GraphQLUnionType,
  getNamedType,
  getNullableType,
  isListType,
  isNonNullType,
  isIntrospectionType,
  isSpecifiedScalarType,
  type GraphQLInputType,
  type GraphQLNamedType,
  type GraphQLOutputType,
} from "graphql";
import type { ArgInfo, Config, FieldInfo, RootSchema, TypeInfo } from "./config";
import { warn } from "./utils";

/**
 * Flatten a wrapped GraphQL type into a named reference.
 * e.g. `[Post!]!` → `{ typeOf: "Post", list: true, required: true }`
 */
export function argInfoOf(type: GraphQLInputType | GraphQLOutputType): ArgInfo {
  return {
    typeOf: getNamedType(type).name,
    list: isListType(getNullableType(type)),
    required: isNonNullType(type),
  };
}

/**
 * Build a `Config` from a graphql-js schema, keeping the schema's type order.
 * Object, interface and input object types are kept; everything the config
 * graph cannot hold is skipped with a warning.
 */
export function configFromSchema(schema: GraphQLSchema): Config {
  const types = new Map<string, TypeInfo>();
  const typeMap = schema.getTypeMap();

  for (const typeName in typeMap) {
    const type = typeMap[typeName];
    if (type === undefined || isIntrospectionType(type)) continue;

    if (
      type instanceof GraphQLObjectType ||
      type instanceof GraphQLInterfaceType
    ) {
      const fields = new Map<string, FieldInfo>();
      for (const field of Object.values(type.getFields())) {
        const args = new Map<string, ArgInfo>();
        for (const arg of field.args) {
          args.set(arg.name, argInfoOf(arg.type));
        }
        fields.set(field.name, { ...argInfoOf(field.type), args });
      }
      types.set(typeName, { fields });
    } else if (type instanceof GraphQLInputObjectType) {
      const fields = new Map<string, FieldInfo>();
      for (const field of Object.values(type.getFields())) {
        fields.set(field.name, { ...argInfoOf(field.type), args: new Map() });
      }
      types.set(typeName, { fields });
    } else if (type instanceof GraphQLScalarType && isSpecifiedScalarType(type)) {
      continue;
    } else {
      warn(`The ${kindOf(type)} "${typeName}" is not part of the configuration graph, skipped`);
    }
  }

  return { types, schema: rootSchemaOf(schema) };
}

function rootSchemaOf(schema: GraphQLSchema): RootSchema {
  const root: { -readonly [K in keyof RootSchema]: RootSchema[K] } = {};
  const query = schema.getQueryType();
  const mutation = schema.getMutationType();
  const subscription = schema.getSubscriptionType();
  if (query) root.query = query.name;
  if (mutation) root.mutation = mutation.name;
  if (subscription) root.subscription = subscription.name;
  return root;
}

function kindOf(type: GraphQLNamedType): string {
  if (type instanceof GraphQLEnumType) return "enum";
  if (type instanceof GraphQLUnionType) return "union";
  return "scalar";
}
