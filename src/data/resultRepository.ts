import { existsSync } from "node:fs";
import { mkdir } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { Low } from "lowdb";
import { JSONFile } from "lowdb/node";
import { ResultStore } from "../domain/resultStore.js";
import { fromRecord, testResultRecordSchema, toRecord, type TestResultRecord } from "../export/json.js";
import { Configuration, type ConfigurationSnapshot } from "../schema/configuration.js";
import { appendNotes, withNotes, type TestResult } from "../schema/testResult.js";
import { logger } from "../logger.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function getProjectRoot(): string {
  // dist/data/resultRepository.js and src/data/resultRepository.ts both sit two levels below the root
  const candidate = resolve(__dirname, "../..");
  if (existsSync(resolve(candidate, "package.json"))) {
    return candidate;
  }
  return resolve(__dirname, "..");
}

export function getDataFilePath(): string {
  const override = process.env.METER_TESTS_DATA_PATH;
  if (override && override.trim().length > 0) {
    return override.trim();
  }
  return resolve(getProjectRoot(), "data", "meter-tests.json");
}

interface DbSchema {
  results: unknown[];
  settings?: unknown;
}

const databases = new Map<string, Low<DbSchema>>();

async function getDb(): Promise<Low<DbSchema>> {
  const filePath = getDataFilePath();
  let db = databases.get(filePath);
  if (!db) {
    logger.info("Opening test result store", "resultRepository", { path: filePath });
    await mkdir(dirname(filePath), { recursive: true });
    // JSONFilePreset swaps in a memory adapter when NODE_ENV is "test"; always use the file.
    db = new Low<DbSchema>(new JSONFile<DbSchema>(filePath), { results: [] });
    databases.set(filePath, db);
  }

  await db.read();
  if (!Array.isArray(db.data.results)) {
    db.data.results = [];
  }
  return db;
}

// Every read-modify-write goes through this chain so two writers never
// interleave. Failures still reach the caller through the returned promise.
let writeQueue: Promise<void> = Promise.resolve();

function serialized<T>(task: () => Promise<T>): Promise<T> {
  const run = writeQueue.then(task);
  writeQueue = run.then(
    () => undefined,
    () => undefined,
  );
  return run;
}

function decodeResults(entries: unknown[]): TestResult[] {
  const results: TestResult[] = [];
  entries.forEach((entry, index) => {
    const parsed = testResultRecordSchema.safeParse(entry);
    if (parsed.success) {
      results.push(fromRecord(parsed.data));
    } else {
      logger.warn("Skipping unreadable stored test result", "resultRepository", {
        index,
        issues: parsed.error.issues,
      });
    }
  });
  return results;
}

export async function loadResultStore(): Promise<ResultStore> {
  const db = await getDb();
  return new ResultStore(decodeResults(db.data.results));
}

export async function getTestResult(testId: string): Promise<TestResult | undefined> {
  const store = await loadResultStore();
  return store.find(testId);
}

export async function appendTestResult(result: TestResult): Promise<TestResult> {
  return serialized(async () => {
    const db = await getDb();
    const record: TestResultRecord = toRecord(result);
    db.data.results.push(record);
    await db.write();
    return result;
  });
}

export type NotesUpdateMode = "replace" | "append";

export interface UpdateNotesInput {
  testId: string;
  notes: string;
  mode: NotesUpdateMode;
}

export async function updateTestNotes(input: UpdateNotesInput): Promise<TestResult> {
  return serialized(async () => {
    const db = await getDb();
    const results = decodeResults(db.data.results);
    const index = results.findIndex((item) => item.id === input.testId);
    if (index === -1) {
      throw new Error(`Test ${input.testId} not found`);
    }

    const current = results[index];
    const updated = input.mode === "append" ? appendNotes(current, input.notes) : withNotes(current, input.notes);

    db.data.results = db.data.results.map((entry) => {
      const parsed = testResultRecordSchema.safeParse(entry);
      return parsed.success && parsed.data.id === input.testId ? toRecord(updated) : entry;
    });
    await db.write();
    return updated;
  });
}

export async function loadConfiguration(): Promise<Configuration> {
  const db = await getDb();
  return Configuration.fromStored(db.data.settings);
}

/**
 * Applies `update` to the stored settings and persists the result under the
 * write lock.
 */
export async function updateConfiguration(
  update: (configuration: Configuration) => void,
): Promise<ConfigurationSnapshot> {
  return serialized(async () => {
    const db = await getDb();
    const configuration = Configuration.fromStored(db.data.settings);
    update(configuration);
    const snapshot = configuration.snapshot();
    db.data.settings = snapshot;
    await db.write();
    return snapshot;
  });
}
