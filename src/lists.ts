import fs from "node:fs";
import { getListsFilePath, writeJsonFileAtomic } from "./paths.ts";
import type { ListsFileV1, ProjectPath } from "./types.ts";

export const MAX_RECENTS = 10;

export class ListsError extends Error {
  filePath: string;
  constructor(message: string, filePath: string) {
    super(message);
    this.name = "ListsError";
    this.filePath = filePath;
  }
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isListsFile(value: unknown): value is ListsFileV1 {
  if (!value || typeof value !== "object") return false;
  const record: Record<string, unknown> = { ...value };
  return record.version === 1 && isStringArray(record.favorites) && isStringArray(record.recents);
}

function readListsFile(filePath: string): ListsFileV1 {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, { encoding: "utf8", flag: "r" });
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return { version: 1, favorites: [], recents: [] };
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ListsError(`Invalid lists file: ${filePath}`, filePath);
  }
  if (!isListsFile(parsed)) throw new ListsError(`Invalid lists file: ${filePath}`, filePath);
  return parsed;
}

export type PathExists = (projectPath: ProjectPath) => boolean;

/**
 * Favorites (a set) and recents (most recent first, capped). Every mutation is
 * written through to disk.
 */
export class PersistentLists {
  readonly filePath: string;
  private favoriteSet: Set<ProjectPath>;
  private recentList: ProjectPath[];

  private constructor(filePath: string, favorites: ProjectPath[], recents: ProjectPath[]) {
    this.filePath = filePath;
    this.favoriteSet = new Set(favorites);
    this.recentList = recents.slice(0, MAX_RECENTS);
  }

  /**
   * Paths that no longer exist are dropped from memory only; the file keeps
   * them until the next write.
   */
  static load(filePath = getListsFilePath(), exists: PathExists = fs.existsSync): PersistentLists {
    const file = readListsFile(filePath);
    const favorites = file.favorites.filter((p) => exists(p));
    const recents = Array.from(new Set(file.recents)).filter((p) => exists(p));
    return new PersistentLists(filePath, favorites, recents);
  }

  favorites(): ProjectPath[] {
    return Array.from(this.favoriteSet);
  }

  recents(): ProjectPath[] {
    return this.recentList.slice();
  }

  isFavorite(projectPath: ProjectPath): boolean {
    return this.favoriteSet.has(projectPath);
  }

  toggleFavorite(projectPath: ProjectPath): boolean {
    const next = new Set(this.favoriteSet);
    const nowFavorite = !next.has(projectPath);
    if (nowFavorite) next.add(projectPath);
    else next.delete(projectPath);
    this.write(next, this.recentList);
    this.favoriteSet = next;
    return nowFavorite;
  }

  recordOpened(projectPath: ProjectPath): void {
    const next = [projectPath, ...this.recentList.filter((p) => p !== projectPath)].slice(0, MAX_RECENTS);
    this.write(this.favoriteSet, next);
    this.recentList = next;
  }

  flush(): void {
    this.write(this.favoriteSet, this.recentList);
  }

  /** In-memory state is only replaced after this returns. */
  private write(favorites: Set<ProjectPath>, recents: ProjectPath[]): void {
    const data: ListsFileV1 = { version: 1, favorites: Array.from(favorites), recents: recents.slice() };
    writeJsonFileAtomic(this.filePath, data);
  }
}
