import fs from "node:fs";
import { DEFAULT_THEME } from "./config.ts";

export type Theme = {
  name: string;
  border: string;
  header: string;
  highlight: string;
  confirmBorder: string;
  gitBranch: string;
  gitClean: string;
  gitDirty: string;
  text: string;
  muted: string;
  error: string;
};

const colorKeys = [
  "border",
  "header",
  "highlight",
  "confirmBorder",
  "gitBranch",
  "gitClean",
  "gitDirty",
  "text",
  "muted",
  "error",
] as const;

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object";
}

function parseTheme(name: string, value: unknown): Theme {
  if (!isObject(value)) throw new Error(`Invalid theme entry: ${name}`);
  const theme: Theme = {
    name,
    border: "",
    header: "",
    highlight: "",
    confirmBorder: "",
    gitBranch: "",
    gitClean: "",
    gitDirty: "",
    text: "",
    muted: "",
    error: "",
  };
  for (const key of colorKeys) {
    const color = value[key];
    if (typeof color !== "string") throw new Error(`Invalid theme entry: ${name}.${key}`);
    theme[key] = color;
  }
  return theme;
}

let cached: Theme[] | null = null;

export function loadThemes(): Theme[] {
  if (cached) return cached;
  const raw = fs.readFileSync(new URL("./themes.json", import.meta.url), { encoding: "utf8" });
  const parsed: unknown = JSON.parse(raw);
  if (!isObject(parsed)) throw new Error("Invalid themes.json");
  cached = Object.entries(parsed).map(([name, value]) => parseTheme(name, value));
  return cached;
}

export function themeNames(): string[] {
  return loadThemes().map((t) => t.name);
}

/** Unknown names fall back to the default theme. */
export function getTheme(name: string): Theme {
  const themes = loadThemes();
  const found = themes.find((t) => t.name.toLowerCase() === name.trim().toLowerCase());
  if (found) return found;
  const fallback = themes.find((t) => t.name === DEFAULT_THEME) ?? themes[0];
  if (!fallback) throw new Error("No themes defined");
  return fallback;
}
