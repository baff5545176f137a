import dotenv from "dotenv";
import path from "node:path";

dotenv.config();

const defaultProjectRoot = path.resolve(__dirname, "..");

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const toBool = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value.trim() === "") return fallback;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
};

const toPersistenceMode = (value: string | undefined): "memory" | "file" => (value === "memory" ? "memory" : "file");

export const config = {
  port: toInt(process.env.PORT, 3000),
  host: process.env.HOST ?? "0.0.0.0",
  logLevel: process.env.LOG_LEVEL ?? "info",
  persistence: toPersistenceMode(process.env.DEVCREW_PERSISTENCE),
  dataDir: path.resolve(process.env.DEVCREW_DATA_DIR ?? path.join(defaultProjectRoot, ".devcrew")),
  defaultRunSteps: toInt(process.env.DEFAULT_RUN_STEPS, 10),
  maxRunSteps: toInt(process.env.MAX_RUN_STEPS, 200),
  agentTimeoutMs: toInt(process.env.AGENT_TIMEOUT_MS, 30000),
  checkpointRetries: toInt(process.env.CHECKPOINT_RETRIES, 2),
  simulateTestFailures: toBool(process.env.SIMULATE_TEST_FAILURES, false)
};

export const assertConfig = (): void => {
  if (config.maxRunSteps < 1) {
    throw new Error("MAX_RUN_STEPS must be a positive integer.");
  }
  if (config.agentTimeoutMs < 1) {
    throw new Error("AGENT_TIMEOUT_MS must be a positive integer.");
  }
};
