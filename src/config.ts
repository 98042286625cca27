import fs from "node:fs";
import path from "node:path";
import { expandHome, findExecutable, getConfigFilePath, writeJsonFileAtomic } from "./paths.ts";

export type ProjnavConfig = {
  baseDir: string;
  ideaPath: string;
  terminalCommand: string;
  theme: string;
};

export class ConfigError extends Error {
  filePath: string;
  constructor(message: string, filePath: string) {
    super(message);
    this.name = "ConfigError";
    this.filePath = filePath;
  }
}

export class StartupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StartupError";
  }
}

export const DEFAULT_THEME = "Darcula";

export function defaultConfig(): ProjnavConfig {
  return {
    baseDir: "~/dev",
    ideaPath: "idea",
    terminalCommand: "kitty --directory",
    theme: DEFAULT_THEME,
  };
}

// On-disk keys are snake_case.
type ConfigFileKey = "base_dir" | "idea_path" | "terminal_command" | "theme";

const configKeys = ["baseDir", "ideaPath", "terminalCommand", "theme"] as const;

const fileKeys: Record<keyof ProjnavConfig, ConfigFileKey> = {
  baseDir: "base_dir",
  ideaPath: "idea_path",
  terminalCommand: "terminal_command",
  theme: "theme",
};

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function toFileShape(config: ProjnavConfig): Record<ConfigFileKey, string> {
  return {
    base_dir: config.baseDir,
    idea_path: config.ideaPath,
    terminal_command: config.terminalCommand,
    theme: config.theme,
  };
}

function parseObject(raw: string, filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid config file: ${filePath} (${reason})`, filePath);
  }
  if (!isObject(parsed)) throw new ConfigError(`Invalid config file: ${filePath}`, filePath);
  return parsed;
}

export function parseConfig(raw: string, filePath: string): ProjnavConfig {
  const parsed = parseObject(raw, filePath);

  const out = defaultConfig();
  for (const key of configKeys) {
    const fileKey = fileKeys[key];
    const value = parsed[fileKey];
    if (value === undefined) continue;
    if (typeof value !== "string" || !value.trim()) {
      throw new ConfigError(`Invalid config file: ${filePath} ("${fileKey}" must be a non-empty string)`, filePath);
    }
    out[key] = value.trim();
  }
  return out;
}

export function saveConfig(config: ProjnavConfig, filePath = getConfigFilePath()): void {
  writeJsonFileAtomic(filePath, toFileShape(config));
}

/** Updates `theme` in place; every other key in the file, known or not, is kept. */
export function saveThemeChoice(theme: string, filePath = getConfigFilePath()): void {
  const stat = fs.statSync(filePath, { throwIfNoEntry: false });
  const current = stat ? parseObject(fs.readFileSync(filePath, { encoding: "utf8" }), filePath) : {};
  writeJsonFileAtomic(filePath, { ...current, theme });
}

/** Reads the config file, writing one with defaults first if none exists. */
export function loadOrCreateConfig(filePath = getConfigFilePath()): ProjnavConfig {
  const stat = fs.statSync(filePath, { throwIfNoEntry: false });
  if (!stat) {
    const config = defaultConfig();
    saveConfig(config, filePath);
    return config;
  }
  if (!stat.isFile()) throw new ConfigError(`Config path is not a file: ${filePath}`, filePath);

  const raw = fs.readFileSync(filePath, { encoding: "utf8" });
  return parseConfig(raw, filePath);
}

export type ValidatedConfig = ProjnavConfig & {
  baseDirReal: string;
  ideaExecutable: string;
};

export function validateStartup(config: ProjnavConfig, envPath = process.env.PATH ?? ""): ValidatedConfig {
  const baseDir = path.resolve(expandHome(config.baseDir));
  const stat = fs.statSync(baseDir, { throwIfNoEntry: false });
  if (!stat) throw new StartupError(`base_dir does not exist: ${config.baseDir}`);
  if (!stat.isDirectory()) throw new StartupError(`base_dir is not a directory: ${config.baseDir}`);

  const ideaExecutable = findExecutable(config.ideaPath, envPath);
  if (!ideaExecutable) {
    throw new StartupError(`idea_path is not an executable file or on PATH: ${config.ideaPath}`);
  }

  return { ...config, baseDirReal: fs.realpathSync(baseDir), ideaExecutable };
}
