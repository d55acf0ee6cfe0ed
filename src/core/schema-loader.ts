import { readFile } from "fs/promises";
import {
  buildClientSchema,
  buildSchema,
  getIntrospectionQuery,
  type IntrospectionQuery,
} from "graphql";
import type { Config } from "./config";
import { configFromSchema } from "./schema-adapter";

interface IntrospectionResponse {
  readonly data?: IntrospectionQuery | null;
  readonly errors?: unknown;
}

/** Introspect a running GraphQL endpoint and turn its schema into a config. */
export async function loadRemoteConfig(
  endpoint: string,
  headers?: { [key: string]: string },
): Promise<Config> {
  const response = await fetch(endpoint, {
    method: "POST",
    body: JSON.stringify({ query: getIntrospectionQuery() }),
    headers: {
      Accept: "application/json",
      "Content-Type": "application/json",
      ...headers,
    },
  });
  if (!response.ok) {
    throw new Error(`Introspection of '${endpoint}' failed with HTTP ${response.status}`);
  }
  const { data, errors } = (await response.json()) as IntrospectionResponse;
  if (errors !== undefined) {
    throw new Error(`Introspection of '${endpoint}' failed: ${JSON.stringify(errors)}`);
  }
  if (!data) {
    throw new Error(`Introspection of '${endpoint}' returned no data`);
  }
  return configFromSchema(buildClientSchema(data));
}

/** Read an SDL file and turn it into a config. */
export async function loadLocalConfig(location: string): Promise<Config> {
  const sdl = await readFile(location, { encoding: "utf8" });
  return configFromSchema(buildSchema(sdl));
}
