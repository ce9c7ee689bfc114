export interface ConfigData {
  /** Search depth cap: the most moves any explored path may contain */
  maxDepth: string;
  /** Built-in layout name, or path to a layout text file */
  layout: string;
  /** Log a progress line every N move applications */
  progressEvery: string;
  /** Skip remaining siblings once a path reaches the depth cap */
  earlyExit: string;
  logLevel: string;
}

export const CONFIG_KEYS: (keyof ConfigData)[] = [
  "maxDepth",
  "layout",
  "progressEvery",
  "earlyExit",
  "logLevel",
];

export const DEFAULTS: ConfigData = {
  maxDepth: "5",
  layout: "english",
  progressEvery: "10000000",
  earlyExit: "false",
  logLevel: "info",
};

export const ENV_MAP: Record<keyof ConfigData, string> = {
  maxDepth: "PEGCROSS_MAX_DEPTH",
  layout: "PEGCROSS_LAYOUT",
  progressEvery: "PEGCROSS_PROGRESS_EVERY",
  earlyExit: "PEGCROSS_EARLY_EXIT",
  logLevel: "LOG_LEVEL",
};
