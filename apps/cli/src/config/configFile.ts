import { readFile, writeFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import { ConfigData, CONFIG_KEYS } from "./defaults";
import log from "../logger";

export function getConfigDir(): string {
  return join(homedir(), ".pegcross");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Keep known keys; numbers and booleans written by hand become strings. */
function pickConfig(parsed: object): Partial<ConfigData> {
  const entries = new Map(Object.entries(parsed));
  const result: Partial<ConfigData> = {};
  for (const key of CONFIG_KEYS) {
    const value: unknown = entries.get(key);
    if (typeof value === "string") {
      result[key] = value;
    } else if (typeof value === "number" || typeof value === "boolean") {
      result[key] = String(value);
    }
  }
  return result;
}

export async function readConfigFile(): Promise<Partial<ConfigData>> {
  const path = getConfigPath();
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      return {};
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    log.warn(
      { path, err: err instanceof Error ? err.message : String(err) },
      'Config file is malformed and was ignored. Run "pegcross config" to recreate it.'
    );
    return {};
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  return pickConfig(parsed);
}

export async function writeConfigFile(
  data: Partial<ConfigData>,
): Promise<void> {
  await mkdir(getConfigDir(), { recursive: true });
  await writeFile(getConfigPath(), JSON.stringify(data, null, 2) + "\n", "utf-8");
}

export async function updateConfigFile(
  key: keyof ConfigData,
  value: string,
): Promise<Partial<ConfigData>> {
  const existing = await readConfigFile();
  existing[key] = value;
  await writeConfigFile(existing);
  return existing;
}
