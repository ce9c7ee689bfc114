import { Command } from "commander";
import {
  resolveConfig,
  readConfigFile,
  updateConfigFile,
  writeConfigFile,
  getConfigPath,
  getSource,
  CONFIG_KEYS,
  DEFAULTS,
  ConfigData,
} from "../config";
import { createPrompter } from "./prompt";

export function registerConfigCommand(program: Command): void {
  const configCmd = program
    .command("config")
    .description("Manage solver configuration (~/.pegcross/config.json)");

  configCmd.action(async () => {
    await runWizard();
  });

  configCmd
    .command("set <key> <value>")
    .description("Set a config value")
    .action(async (key: string, value: string) => {
      await updateConfigFile(requireKey(key), value);
      console.log(`Set ${key} = ${value}`);
    });

  configCmd
    .command("get <key>")
    .description("Get a config value")
    .action(async (key: string) => {
      const resolved = await resolveConfig();
      console.log(resolved[requireKey(key)]);
    });

  configCmd
    .command("list")
    .description("List all config values with sources")
    .action(async () => {
      await printConfigList();
    });

  configCmd
    .command("path")
    .description("Print the config file location")
    .action(() => {
      console.log(getConfigPath());
    });
}

export async function runWizard(): Promise<void> {
  const existing = await readConfigFile();
  const prompter = createPrompter();

  console.log("\npegcross Configuration");
  console.log("──────────────────────\n");

  try {
    const data: Partial<ConfigData> = { ...existing };
    for (const key of CONFIG_KEYS) {
      const current = existing[key] || DEFAULTS[key];
      const answer = await prompter.ask(`${key} [${current}]: `);
      data[key] = answer?.trim() || current;
    }

    await writeConfigFile(data);
    console.log(`\nConfig saved to ${getConfigPath()}\n`);
    await printConfigList();
  } finally {
    prompter.close();
  }
}

async function printConfigList(): Promise<void> {
  const resolved = await resolveConfig();
  const fileData = await readConfigFile();

  console.log(`\nConfig file: ${getConfigPath()}`);
  console.log("──────────────────────────────────────");

  for (const key of CONFIG_KEYS) {
    console.log(`  ${key}: ${resolved[key]}  (${getSource(key, fileData)})`);
  }
  console.log("");
}

function isValidKey(key: string): key is keyof ConfigData {
  return CONFIG_KEYS.some((k) => k === key);
}

function requireKey(key: string): keyof ConfigData {
  if (!isValidKey(key)) {
    throw new Error(`Unknown config key: "${key}". Valid keys: ${CONFIG_KEYS.join(", ")}`);
  }
  return key;
}
