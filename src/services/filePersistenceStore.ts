import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { config } from "../config";
import { PersistenceError } from "../errors";
import {
  agentOutputRecordSchema,
  checkpointRecordSchema,
  errorRecordSchema,
  projectRecordSchema,
  taskRecordSchema
} from "../schemas/records";
import { InMemoryPersistenceStore } from "./persistenceStore";

const storeFileSchema = z.object({
  version: z.literal(1),
  projects: z.array(projectRecordSchema).default([]),
  tasks: z.array(taskRecordSchema).default([]),
  agentOutputs: z.array(agentOutputRecordSchema).default([]),
  errors: z.array(errorRecordSchema).default([]),
  checkpoints: z.array(checkpointRecordSchema).default([]),
  checkpointSequence: z.number().int().min(0).default(0)
});

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export class FilePersistenceStore extends InMemoryPersistenceStore {
  private readonly filePath: string;
  private loading?: Promise<void>;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(rootDir = config.dataDir) {
    super();
    this.filePath = path.join(rootDir, "store.json");
  }

  getFilePath(): string {
    return this.filePath;
  }

  protected override load(): Promise<void> {
    this.loading ??= this.readFromDisk().catch((error: unknown) => {
      this.loading = undefined;
      throw error;
    });
    return this.loading;
  }

  protected override commit(): Promise<void> {
    const payload = JSON.stringify({ version: 1, ...this.tables }, null, 2);
    const next = this.writeQueue.then(() => this.writeToDisk(payload));
    this.writeQueue = next.catch(() => undefined);
    return next;
  }

  private async readFromDisk(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error: unknown) {
      if (isMissingFile(error)) return;
      throw new PersistenceError(`Failed to read store file ${this.filePath}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error: unknown) {
      throw new PersistenceError(`Store file ${this.filePath} is not valid JSON`, { cause: error });
    }

    const result = storeFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new PersistenceError(`Store file ${this.filePath} has an invalid shape: ${result.error.message}`);
    }

    const { version: _version, ...tables } = result.data;
    const highestSequence = tables.checkpoints.reduce((max, checkpoint) => Math.max(max, checkpoint.sequence), 0);
    this.tables = { ...tables, checkpointSequence: Math.max(tables.checkpointSequence, highestSequence) };
  }

  private async writeToDisk(payload: string): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, payload, "utf8");
      await fs.rename(tempPath, this.filePath);
    } catch (error: unknown) {
      throw new PersistenceError(`Failed to write store file ${this.filePath}`, { cause: error });
    }
  }
}
