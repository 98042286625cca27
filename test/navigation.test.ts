import { afterEach, describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { Launcher } from "../src/launcher.ts";
import { PersistentLists } from "../src/lists.ts";
import { NavigationStateMachine, type KeyInput, type NavigatorActions } from "../src/navigation.ts";
import { ProjectIndex } from "../src/projects.ts";
import { StatusCache } from "../src/status-cache.ts";
import type { CloneOutcome, GitStatus, LaunchOutcome } from "../src/types.ts";

const dirs: string[] = [];

afterEach(() => {
  for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

type Harness = {
  base: string;
  machine: NavigationStateMachine;
  lists: PersistentLists;
  opened: string[];
  terminals: string[];
  savedThemes: string[];
  setLaunch(result: () => Promise<LaunchOutcome>): void;
};

function setup(opts: {
  layout: Record<string, string[]>;
  clone?: (url: string, destDir: string) => Promise<CloneOutcome>;
  probe?: (p: string) => Promise<GitStatus>;
  statusCache?: StatusCache;
}): Harness {
  const base = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "projnav-nav-")));
  dirs.push(base);
  const workspace = path.join(base, "workspace");
  fs.mkdirSync(workspace);
  for (const [category, projects] of Object.entries(opts.layout)) {
    fs.mkdirSync(path.join(workspace, category), { recursive: true });
    for (const project of projects) fs.mkdirSync(path.join(workspace, category, project));
  }

  const opened: string[] = [];
  const terminals: string[] = [];
  const savedThemes: string[] = [];
  let launch: () => Promise<LaunchOutcome> = async () => ({ ok: true });

  const launcher: Launcher = {
    openProject: (p) => {
      opened.push(p);
      return launch();
    },
    openIde: () => {
      opened.push("(ide)");
      return launch();
    },
    openTerminal: async (p) => {
      terminals.push(p);
      return { ok: true };
    },
  };
  const actions: NavigatorActions = {
    launcher,
    cloneRepository: opts.clone ?? (async () => ({ ok: false, error: "no network in tests" })),
    saveTheme: (theme) => savedThemes.push(theme),
  };

  const lists = PersistentLists.load(path.join(base, "config", "lists.json"));
  const machine = new NavigationStateMachine({
    index: ProjectIndex.scan(workspace),
    lists,
    statusCache: opts.statusCache ?? new StatusCache({ probe: opts.probe ?? (async () => ({ state: "unavailable" })) }),
    actions,
    themes: ["Darcula", "Nord", "Gruvbox"],
    theme: "Darcula",
  });

  return {
    base: workspace,
    machine,
    lists,
    opened,
    terminals,
    savedThemes,
    setLaunch: (result) => {
      launch = result;
    },
  };
}

const down: KeyInput = { kind: "down" };
const up: KeyInput = { kind: "up" };
const forward: KeyInput = { kind: "forward" };
const back: KeyInput = { kind: "back" };
const escape: KeyInput = { kind: "escape" };
const char = (ch: string): KeyInput => ({ kind: "char", ch });

async function press(machine: NavigationStateMachine, ...keys: KeyInput[]): Promise<void> {
  for (const key of keys) await machine.handleKey(key);
}

async function type(machine: NavigationStateMachine, text: string): Promise<void> {
  await press(machine, ...Array.from(text, char));
}

function viewKinds(machine: NavigationStateMachine): string[] {
  return machine.views().map((v) => v.kind);
}

function itemNames(machine: NavigationStateMachine): string[] {
  return machine.items().map((item) => {
    switch (item.kind) {
      case "menu":
        return item.label;
      case "project":
        return item.entry.name;
      default:
        return item.name;
    }
  });
}

function settleTasks(ms = 0): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Lists whose directory is replaced by a plain file after loading, so every write fails. */
function machineWithUnwritableLists(): NavigationStateMachine {
  const h = setup({ layout: {} });
  const blocked = path.join(path.dirname(h.base), "blocked");
  const lists = PersistentLists.load(path.join(blocked, "lists.json"));
  fs.writeFileSync(blocked, "");
  return new NavigationStateMachine({
    index: ProjectIndex.scan(h.base),
    lists,
    statusCache: new StatusCache({ probe: async () => ({ state: "unavailable" }) }),
    actions: {
      launcher: {
        openProject: async () => ({ ok: true }),
        openIde: async () => ({ ok: true }),
        openTerminal: async () => ({ ok: true }),
      },
      cloneRepository: async () => ({ ok: false, error: "unused" }),
      saveTheme: () => undefined,
    },
    themes: ["Darcula"],
    theme: "Darcula",
  });
}

describe("NavigationStateMachine", () => {
  it("starts on the main menu and never pops it", async () => {
    const { machine } = setup({ layout: {} });
    expect(itemNames(machine)).toEqual([
      "Favorites",
      "Recent Projects",
      "Open Existing Project",
      "Clone Repository",
      "Open IDE",
      "Choose Theme",
    ]);

    await press(machine, back, char("h"), escape);
    expect(machine.depth()).toBe(1);
    expect(machine.top().view).toEqual({ kind: "main-menu" });
  });

  it("clamps the cursor without wrapping", async () => {
    const { machine } = setup({ layout: {} });
    await press(machine, up);
    expect(machine.top().cursor).toBe(0);
    await press(machine, down, down, down, down, down, down, down, down);
    expect(machine.top().cursor).toBe(5);
    await press(machine, char("k"));
    expect(machine.top().cursor).toBe(4);
  });

  it("launches a project from the category browser and returns to its list", async () => {
    const h = setup({ layout: { java: ["A", "B"], rust: ["C"] } });
    const { machine } = h;

    await press(machine, down, down, forward);
    expect(machine.top().view).toEqual({ kind: "category-list" });
    expect(itemNames(machine)).toEqual(["java", "rust"]);

    await press(machine, down, forward);
    expect(machine.top().view).toEqual({ kind: "project-list", category: "rust" });
    expect(itemNames(machine)).toEqual(["C"]);

    await press(machine, forward);
    expect(machine.top().view.kind).toBe("confirm-launch");

    await press(machine, forward);
    const c = path.join(h.base, "rust", "C");
    expect(h.opened).toEqual([c]);
    expect(h.lists.recents()[0]).toBe(c);
    expect(viewKinds(machine)).toEqual(["main-menu", "category-list", "project-list"]);
    expect(machine.top().view).toEqual({ kind: "project-list", category: "rust" });
    expect(machine.takeNotice()).toBe("Launched C");
  });

  it("freezes a search into a results view", async () => {
    const { machine } = setup({ layout: { java: ["A", "B", "Cargo"], rust: ["C"] } });
    await press(machine, down, down, forward, forward);
    expect(machine.top().view).toEqual({ kind: "project-list", category: "java" });

    await press(machine, char("/"), char("a"));
    expect(machine.top().search).toEqual({ active: true, query: "a" });
    expect(itemNames(machine)).toEqual(["A", "Cargo"]);

    await press(machine, forward);
    const view = machine.top().view;
    expect(view.kind).toBe("search-results");
    expect(view.kind === "search-results" && view.query).toBe("a");
    expect(itemNames(machine)).toEqual(["A", "Cargo"]);

    const source = machine.views().at(-2);
    expect(source).toEqual({ kind: "project-list", category: "java" });
    await press(machine, back);
    expect(machine.top().search).toEqual({ active: false, query: "" });
    expect(itemNames(machine)).toEqual(["A", "B", "Cargo"]);
  });

  it("edits the query while searching and leaves search on an empty backspace", async () => {
    const { machine } = setup({ layout: { java: ["A", "B"] } });
    await press(machine, down, down, forward, forward, char("/"));
    await type(machine, "bq");
    expect(itemNames(machine)).toEqual([]);

    await press(machine, back);
    expect(itemNames(machine)).toEqual(["B"]);
    await press(machine, back, back);
    expect(machine.top().search).toEqual({ active: false, query: "" });
    expect(viewKinds(machine)).toEqual(["main-menu", "category-list", "project-list"]);

    await press(machine, char("/"), char("a"), escape);
    expect(machine.top().search).toEqual({ active: false, query: "" });
    expect(machine.depth()).toBe(3);

    await press(machine, escape);
    expect(machine.depth()).toBe(1);
  });

  it("keeps the confirm view and shows a popup when launching fails", async () => {
    const h = setup({ layout: { java: ["A"] } });
    h.setLaunch(async () => ({ ok: false, error: "idea: not found" }));
    await press(h.machine, down, down, forward, forward, forward, char("y"));

    expect(h.machine.popup).toEqual({ title: "Launch failed", message: "idea: not found" });
    expect(h.machine.top().view.kind).toBe("confirm-launch");
    expect(h.lists.recents()).toEqual([]);

    await press(h.machine, char("n"));
    expect(h.machine.popup).toBeNull();
    expect(h.machine.top().view.kind).toBe("confirm-launch");

    await press(h.machine, char("n"));
    expect(h.machine.top().view).toEqual({ kind: "project-list", category: "java" });
  });

  it("ignores input while a launch is in flight", async () => {
    const h = setup({ layout: { java: ["A"] } });
    let finishLaunch: (outcome: LaunchOutcome) => void = () => undefined;
    h.setLaunch(
      () =>
        new Promise<LaunchOutcome>((resolve) => {
          finishLaunch = resolve;
        }),
    );
    await press(h.machine, down, down, forward, forward, forward);

    const launching = h.machine.handleKey(forward);
    expect(h.machine.busy).toBe("Launching A…");
    await h.machine.handleKey(escape);
    expect(h.machine.top().view.kind).toBe("confirm-launch");

    finishLaunch({ ok: true });
    await launching;
    expect(h.machine.busy).toBeNull();
    expect(h.machine.top().view).toEqual({ kind: "project-list", category: "java" });
  });

  it("launches the IDE without touching recents", async () => {
    const h = setup({ layout: {} });
    await press(h.machine, down, down, down, down, forward);
    expect(h.machine.top().view).toEqual({ kind: "confirm-launch", target: { kind: "ide" } });

    await press(h.machine, forward);
    expect(h.opened).toEqual(["(ide)"]);
    expect(h.lists.recents()).toEqual([]);
    expect(h.machine.depth()).toBe(1);
    expect(h.machine.takeNotice()).toBe("Launched IDE");
  });

  it("toggles favorites and lists them by name", async () => {
    const h = setup({ layout: { java: ["beta", "Alpha"], rust: ["gamma"] } });
    await press(h.machine, down, down, forward, forward);
    await press(h.machine, char("f"), down, char("f"));
    expect(h.machine.takeNotice()).toBe("Added Alpha to favorites");
    expect(h.machine.takeNotice()).toBe("Added beta to favorites");

    await press(h.machine, escape, up, up, forward);
    expect(h.machine.top().view).toEqual({ kind: "favorites" });
    expect(itemNames(h.machine)).toEqual(["Alpha", "beta"]);

    await press(h.machine, char("f"));
    expect(h.machine.takeNotice()).toBe("Removed Alpha from favorites");
    expect(itemNames(h.machine)).toEqual(["beta"]);
    expect(h.lists.isFavorite(path.join(h.base, "java", "Alpha"))).toBe(false);
  });

  it("opens a terminal on the selected project without changing the stack", async () => {
    const h = setup({ layout: { java: ["A"] } });
    await press(h.machine, down, down, forward, forward, char("t"));
    expect(h.terminals).toEqual([path.join(h.base, "java", "A")]);
    expect(h.machine.depth()).toBe(3);
    expect(h.lists.recents()).toEqual([]);
    expect(h.machine.takeNotice()).toBe("Opened terminal for A");
  });

  it("shows help over any view and closes it on the next key", async () => {
    const { machine } = setup({ layout: {} });
    await press(machine, char("?"));
    expect(machine.top().view).toEqual({ kind: "help" });
    await press(machine, char("x"));
    expect(machine.depth()).toBe(1);
  });

  it("clones into the chosen category, then opens the new project", async () => {
    const cloned: Array<{ url: string; destDir: string }> = [];
    const h = setup({
      layout: { java: ["A"], rust: ["C"] },
      clone: async (url, destDir) => {
        cloned.push({ url, destDir });
        const projectPath = path.join(destDir, "tool");
        fs.mkdirSync(projectPath);
        return { ok: true, projectPath, name: "tool" };
      },
    });

    await press(h.machine, down, down, down, forward);
    expect(h.machine.top().view).toEqual({ kind: "clone-input", url: "" });
    await type(h.machine, "git@example.com:me/tool.gitx");
    await press(h.machine, back);
    expect(h.machine.top().view).toEqual({ kind: "clone-input", url: "git@example.com:me/tool.git" });

    await press(h.machine, forward);
    expect(h.machine.top().view).toEqual({ kind: "clone-category", url: "git@example.com:me/tool.git" });
    await press(h.machine, down, forward);

    const toolPath = path.join(h.base, "rust", "tool");
    expect(cloned).toEqual([{ url: "git@example.com:me/tool.git", destDir: path.join(h.base, "rust") }]);
    expect(h.opened).toEqual([toolPath]);
    expect(h.lists.recents()).toEqual([toolPath]);
    expect(h.machine.depth()).toBe(1);
    expect(h.machine.takeNotice()).toBe("Cloned and opened tool");

    await press(h.machine, up, forward, down, forward);
    expect(itemNames(h.machine)).toEqual(["C", "tool"]);
  });

  it("reports a failed clone in a popup", async () => {
    const h = setup({ layout: { java: [] } });
    await press(h.machine, down, down, down, forward);
    await type(h.machine, "https://example.com/x.git");
    await press(h.machine, forward, forward);

    expect(h.machine.popup).toEqual({ title: "Clone failed", message: "no network in tests" });
    expect(h.machine.top().view.kind).toBe("clone-category");
    expect(h.opened).toEqual([]);
  });

  it("persists the chosen theme", async () => {
    const h = setup({ layout: {} });
    await press(h.machine, down, down, down, down, down, forward);
    expect(h.machine.top().view).toEqual({ kind: "theme-list" });

    await press(h.machine, down, forward);
    expect(h.savedThemes).toEqual(["Nord"]);
    expect(h.machine.theme).toBe("Nord");
    expect(h.machine.depth()).toBe(1);
    expect(h.machine.takeNotice()).toBe("Theme: Nord");
  });

  it("merges git status for visible projects on each tick", async () => {
    const clean: GitStatus = { state: "ok", branch: "main", dirty: false, fetchedAt: 1 };
    const h = setup({
      layout: { java: ["A", "plain"] },
      probe: async (p) => (p.endsWith("A") ? clean : { state: "unavailable" }),
    });
    await press(h.machine, down, down, forward, forward);

    expect(h.machine.tick()).toBe(false);
    await settleTasks();
    expect(h.machine.tick()).toBe(true);
    expect(h.machine.statusFor(path.join(h.base, "java", "A"))).toEqual(clean);
    expect(h.machine.statusFor(path.join(h.base, "java", "plain"))).toEqual({ state: "unavailable" });

    await press(h.machine, char("r"));
    expect(h.machine.takeNotice()).toBe("Status refreshed");
  });

  it("re-checks every visible project on refresh and shows the new result", async () => {
    let branch = "main";
    const calls: string[] = [];
    const h = setup({
      layout: { java: ["A", "B"] },
      probe: async (p) => {
        calls.push(p);
        return { state: "ok", branch, dirty: false, fetchedAt: 1 };
      },
    });
    await press(h.machine, down, down, forward, forward);
    h.machine.tick();
    await settleTasks();
    h.machine.tick();
    expect(calls).toHaveLength(2);

    branch = "feature";
    await press(h.machine, char("r"));
    expect(calls).toHaveLength(4);
    await settleTasks();
    expect(h.machine.tick()).toBe(true);
    expect(h.machine.statusFor(path.join(h.base, "java", "A"))).toEqual({
      state: "ok",
      branch: "feature",
      dirty: false,
      fetchedAt: 1,
    });
  });

  it("stops starting status checks once quit is requested", async () => {
    const projects = Array.from({ length: 12 }, (_, i) => `p${String(i).padStart(2, "0")}`);
    const statusCache = new StatusCache({
      concurrency: 4,
      probe: () => new Promise<GitStatus>((resolve) => setTimeout(() => resolve({ state: "unavailable" }), 30)),
    });
    const h = setup({ layout: { many: projects }, statusCache });
    await press(h.machine, down, down, forward, forward);
    h.machine.tick();
    expect(statusCache.stats()).toEqual({ running: 4, queued: 8, started: 4 });

    await press(h.machine, char("q"));
    expect(h.machine.quitRequested).toBe(true);
    expect(statusCache.isClosed()).toBe(true);
    await settleTasks(100);
    expect(statusCache.stats()).toEqual({ running: 0, queued: 0, started: 4 });
  });

  it("holds the quit behind a popup when the lists cannot be saved", async () => {
    const machine = machineWithUnwritableLists();

    await press(machine, char("q"));
    expect(machine.quitRequested).toBe(false);
    expect(machine.popup?.title).toBe("Could not save lists");

    await press(machine, char("x"));
    expect(machine.popup).toBeNull();
    expect(machine.quitRequested).toBe(true);
  });

  it("quits on a second request even if saving keeps failing", () => {
    const machine = machineWithUnwritableLists();

    machine.requestQuit();
    expect(machine.quitRequested).toBe(false);
    machine.requestQuit();
    expect(machine.quitRequested).toBe(true);
  });

  it("flushes lists and stops accepting keys on quit", async () => {
    const h = setup({ layout: {} });
    await press(h.machine, char("q"));
    expect(h.machine.quitRequested).toBe(true);
    expect(fs.existsSync(h.lists.filePath)).toBe(true);

    await press(h.machine, char("?"));
    expect(h.machine.depth()).toBe(1);
  });
});
