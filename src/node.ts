/**
 * Node-only entry point:
 * - SDL file and introspection config loaders
 *
 * Import as: `gqlconf/node`
 */
export { loadLocalConfig, loadRemoteConfig } from "./core/schema-loader";
