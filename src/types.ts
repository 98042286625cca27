export type ProjectPath = string;

export type ProjectEntry = {
  name: string;
  path: ProjectPath; // canonical, identity
  category: string;
  language: string | null; // from marker files, e.g. Cargo.toml
};

export type Categories = Map<string, ProjectEntry[]>;

export type GitStatus =
  | {
      state: "ok";
      branch: string | null; // null when detached
      dirty: boolean;
      fetchedAt: number;
    }
  | { state: "unavailable" };

export type StatusUpdate = {
  path: ProjectPath;
  status: GitStatus;
};

export type LaunchOutcome = { ok: true } | { ok: false; error: string };

export type CloneOutcome = { ok: true; projectPath: ProjectPath; name: string } | { ok: false; error: string };

export type ListsFileV1 = {
  version: 1;
  favorites: ProjectPath[];
  recents: ProjectPath[];
};
