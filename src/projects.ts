import fs from "node:fs";
import path from "node:path";
import { projectDisplayName } from "./paths.ts";
import type { Categories, ProjectEntry, ProjectPath } from "./types.ts";

export class ScanError extends Error {
  baseDir: string;
  constructor(message: string, baseDir: string) {
    super(message);
    this.name = "ScanError";
    this.baseDir = baseDir;
  }
}

const languageMarkers: ReadonlyArray<{ language: string; files: string[] }> = [
  { language: "Rust", files: ["Cargo.toml"] },
  { language: "Java", files: ["pom.xml", "build.gradle"] },
  { language: "JS/TS", files: ["package.json"] },
  { language: "Python", files: ["pyproject.toml", "requirements.txt"] },
  { language: "Go", files: ["go.mod"] },
];

/** First marker file found wins; only existence is checked. */
export function detectLanguage(projectPath: ProjectPath): string | null {
  const found = languageMarkers.find((m) => m.files.some((f) => fs.existsSync(path.join(projectPath, f))));
  return found?.language ?? null;
}

function isVisibleDirectory(parent: string, ent: fs.Dirent): boolean {
  if (ent.name.startsWith(".")) return false;
  if (ent.isDirectory()) return true;
  if (!ent.isSymbolicLink()) return false;
  const stat = fs.statSync(path.join(parent, ent.name), { throwIfNoEntry: false });
  return Boolean(stat?.isDirectory());
}

function listSubdirectories(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((ent) => isVisibleDirectory(dir, ent))
    .map((ent) => ent.name);
}

/**
 * Two-level scan: every visible subdirectory of `baseDir` is a category and
 * every visible subdirectory of a category is a project. Deeper nesting is
 * not looked at.
 */
export function scanProjects(baseDir: string): Categories {
  const stat = fs.statSync(baseDir, { throwIfNoEntry: false });
  if (!stat) throw new ScanError(`Base directory does not exist: ${baseDir}`, baseDir);
  if (!stat.isDirectory()) throw new ScanError(`Base directory is not a directory: ${baseDir}`, baseDir);

  let root: string;
  let categoryNames: string[];
  try {
    root = fs.realpathSync(baseDir);
    categoryNames = listSubdirectories(root);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ScanError(`Cannot read base directory ${baseDir}: ${reason}`, baseDir);
  }

  const categories: Categories = new Map();
  for (const category of categoryNames) {
    const categoryDir = path.join(root, category);
    let names: string[];
    try {
      names = listSubdirectories(categoryDir);
    } catch {
      // unreadable category: shown, but empty
      names = [];
    }
    categories.set(
      category,
      names.map((name) => {
        const projectPath = path.join(categoryDir, name);
        return { name, path: projectPath, category, language: detectLanguage(projectPath) };
      }),
    );
  }
  return categories;
}

export function entryForPath(projectPath: ProjectPath): ProjectEntry {
  return {
    name: projectDisplayName(projectPath),
    path: projectPath,
    category: path.basename(path.dirname(projectPath)),
    language: detectLanguage(projectPath),
  };
}

export class ProjectIndex {
  readonly baseDir: string;
  private categories: Categories;
  private byPath: Map<ProjectPath, ProjectEntry>;

  constructor(baseDir: string, categories: Categories) {
    this.baseDir = baseDir;
    this.categories = categories;
    this.byPath = ProjectIndex.indexByPath(categories);
  }

  static scan(baseDir: string): ProjectIndex {
    return new ProjectIndex(baseDir, scanProjects(baseDir));
  }

  private static indexByPath(categories: Categories): Map<ProjectPath, ProjectEntry> {
    const out = new Map<ProjectPath, ProjectEntry>();
    for (const entries of categories.values()) {
      for (const entry of entries) out.set(entry.path, entry);
    }
    return out;
  }

  /** Replaces the whole index; a failed scan leaves the previous one in place. */
  rescan(): void {
    const next = scanProjects(this.baseDir);
    this.categories = next;
    this.byPath = ProjectIndex.indexByPath(next);
  }

  categoryNames(): string[] {
    return Array.from(this.categories.keys());
  }

  projectsIn(category: string): ProjectEntry[] {
    return this.categories.get(category) ?? [];
  }

  categoryDir(category: string): string {
    return path.join(this.baseDir, category);
  }

  findByPath(projectPath: ProjectPath): ProjectEntry | null {
    return this.byPath.get(projectPath) ?? null;
  }

  entryFor(projectPath: ProjectPath): ProjectEntry {
    return this.findByPath(projectPath) ?? entryForPath(projectPath);
  }

  projectCount(): number {
    return this.byPath.size;
  }
}
