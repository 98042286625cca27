import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { randomBytes } from "node:crypto";

export function expandHome(inputPath: string): string {
  if (inputPath === "~") return os.homedir();
  if (inputPath.startsWith("~/")) return path.join(os.homedir(), inputPath.slice(2));
  return inputPath;
}

export function getConfigDir(): string {
  const override = process.env.PROJNAV_CONFIG?.trim();
  if (override) return path.dirname(path.resolve(expandHome(override)));

  const xdg = process.env.XDG_CONFIG_HOME?.trim();
  const base =
    xdg ||
    (process.platform === "win32"
      ? process.env.APPDATA?.trim() || path.join(os.homedir(), "AppData", "Roaming")
      : path.join(os.homedir(), ".config"));

  return path.join(base, "projnav");
}

export function getConfigFilePath(): string {
  const override = process.env.PROJNAV_CONFIG?.trim();
  if (override) return path.resolve(expandHome(override));
  return path.join(getConfigDir(), "config.json");
}

export function getListsFilePath(): string {
  return path.join(getConfigDir(), "lists.json");
}

function isExecutableFile(filePath: string): boolean {
  const stat = fs.statSync(filePath, { throwIfNoEntry: false });
  if (!stat?.isFile()) return false;
  try {
    fs.accessSync(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolves a command the way a shell would: names containing a separator are
 * taken as paths, bare names are looked up on PATH.
 */
export function findExecutable(command: string, envPath = process.env.PATH ?? ""): string | null {
  const expanded = expandHome(command.trim());
  if (!expanded) return null;

  if (expanded.includes("/") || expanded.includes(path.sep)) {
    const resolved = path.resolve(expanded);
    return isExecutableFile(resolved) ? resolved : null;
  }

  for (const dir of envPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, expanded);
    if (isExecutableFile(candidate)) return candidate;
  }
  return null;
}

export function projectDisplayName(projectPath: string): string {
  return path.basename(projectPath) || projectPath;
}

/** Writes via a sibling temp file and rename, so readers never see a partial file. */
export function writeJsonFileAtomic(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp-${process.pid}-${Date.now()}-${randomBytes(3).toString("hex")}`;
  try {
    fs.writeFileSync(tmpPath, JSON.stringify(data, null, 2) + "\n", { encoding: "utf8" });
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
}
