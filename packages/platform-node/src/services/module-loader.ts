import { pathToFileURL } from "node:url";

/** Loads a module by absolute file path and returns its namespace */
export type ModuleLoader = (file: string) => Promise<unknown>;

export const importModule: ModuleLoader = async (file) => {
  const namespace: unknown = await import(pathToFileURL(file).href);
  return namespace;
};

/** A named export of a loaded namespace, if the namespace is an object */
export function pickExport(namespace: unknown, exportName: string): unknown {
  if (typeof namespace !== "object" || namespace === null) return undefined;
  return Reflect.get(namespace, exportName);
}
