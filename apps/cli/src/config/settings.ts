import { readFile } from "node:fs/promises";
import { CellGrid, getBuiltinLayout, parseLayoutText } from "@pegcross/game-cross";
import { ConfigData } from "./defaults";

export interface SolveSettings {
  maxDepth: number;
  /** Layout name or file path, as configured */
  layoutName: string;
  layout: CellGrid;
  progressEvery: number;
  earlyExit: boolean;
}

function parseCount(key: keyof ConfigData, raw: string, min: number): number {
  const value = Number(raw.trim());
  if (raw.trim() === "" || !Number.isInteger(value) || value < min) {
    throw new Error(`Invalid ${key}: "${raw}". Expected an integer >= ${min}.`);
  }
  return value;
}

function parseFlag(key: keyof ConfigData, raw: string): boolean {
  const value = raw.trim().toLowerCase();
  if (value === "true" || value === "1" || value === "yes") return true;
  if (value === "false" || value === "0" || value === "no") return false;
  throw new Error(`Invalid ${key}: "${raw}". Expected true or false.`);
}

/** A built-in layout by name, otherwise a layout text file at that path. */
export async function loadLayout(nameOrPath: string): Promise<CellGrid> {
  const builtin = getBuiltinLayout(nameOrPath);
  if (builtin) return builtin;
  const text = await readFile(nameOrPath, "utf-8");
  return parseLayoutText(text);
}

export async function toSolveSettings(config: ConfigData): Promise<SolveSettings> {
  return {
    maxDepth: parseCount("maxDepth", config.maxDepth, 0),
    layoutName: config.layout,
    layout: await loadLayout(config.layout),
    progressEvery: parseCount("progressEvery", config.progressEvery, 1),
    earlyExit: parseFlag("earlyExit", config.earlyExit),
  };
}
