/** Lookup-and-replace a name, leaving names absent from `lookup` untouched. */
export function resolveName(
  lookup: ReadonlyMap<string, string>,
  name: string,
): string {
  return lookup.get(name) ?? name;
}

export function warn(message: string) {
  console.warn(`[gqlconf] ${message}`);
}
