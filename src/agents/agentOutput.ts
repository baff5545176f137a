import { PersistenceStore } from "../services/persistenceStore";

export const recordOutput = async (
  store: PersistenceStore | undefined,
  taskId: string | undefined,
  agentId: string,
  outputType: string,
  content: unknown
): Promise<void> => {
  if (!store) return;
  await store.storeAgentOutput(taskId, agentId, outputType, content);
};

export const slugify = (value: string): string =>
  value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "") || "item";

export const readString = (artifact: Record<string, unknown>, key: string): string | undefined => {
  const value = artifact[key];
  return typeof value === "string" ? value : undefined;
};

export const readFilePaths = (artifact: Record<string, unknown>): string[] => {
  const files = artifact.files;
  if (!Array.isArray(files)) return [];
  return files.flatMap((file: unknown) =>
    typeof file === "object" && file !== null && "path" in file && typeof file.path === "string" ? [file.path] : []
  );
};
