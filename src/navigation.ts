import { repoNameFromUrl } from "./git.ts";
import type { Launcher } from "./launcher.ts";
import type { PersistentLists } from "./lists.ts";
import type { ProjectIndex } from "./projects.ts";
import { filterItems } from "./search.ts";
import type { StatusCache } from "./status-cache.ts";
import type { CloneOutcome, GitStatus, LaunchOutcome, ProjectEntry, ProjectPath } from "./types.ts";

export type MenuAction = "favorites" | "recent" | "browse" | "clone" | "open-ide" | "theme";

export const MAIN_MENU: ReadonlyArray<{ label: string; action: MenuAction }> = [
  { label: "Favorites", action: "favorites" },
  { label: "Recent Projects", action: "recent" },
  { label: "Open Existing Project", action: "browse" },
  { label: "Clone Repository", action: "clone" },
  { label: "Open IDE", action: "open-ide" },
  { label: "Choose Theme", action: "theme" },
];

export type LaunchTarget = { kind: "project"; entry: ProjectEntry } | { kind: "ide" };

export type ListItem =
  | { kind: "menu"; label: string; action: MenuAction }
  | { kind: "category"; name: string }
  | { kind: "project"; entry: ProjectEntry }
  | { kind: "theme"; name: string };

export type SearchableView =
  | { kind: "category-list" }
  | { kind: "project-list"; category: string }
  | { kind: "favorites" }
  | { kind: "recent" }
  | { kind: "clone-category"; url: string };

export type View =
  | { kind: "main-menu" }
  | SearchableView
  | { kind: "search-results"; source: SearchableView; query: string; items: ListItem[] }
  | { kind: "confirm-launch"; target: LaunchTarget }
  | { kind: "help" }
  | { kind: "clone-input"; url: string }
  | { kind: "theme-list" };

export type SearchState = { active: boolean; query: string };

export type Frame = {
  view: View;
  cursor: number;
  search: SearchState;
};

export type KeyInput =
  | { kind: "up" }
  | { kind: "down" }
  | { kind: "forward" }
  | { kind: "back" }
  | { kind: "escape" }
  | { kind: "char"; ch: string };

export type Popup = { title: string; message: string };

export type NavigatorActions = {
  launcher: Launcher;
  cloneRepository(url: string, destDir: string): Promise<CloneOutcome>;
  saveTheme(theme: string): void;
};

export type NavigatorDeps = {
  index: ProjectIndex;
  lists: PersistentLists;
  statusCache: StatusCache;
  actions: NavigatorActions;
  themes: string[];
  theme: string;
};

function assertNever(value: never): never {
  throw new Error(`Unhandled view: ${JSON.stringify(value)}`);
}

function frameFor(view: View): Frame {
  return { view, cursor: 0, search: { active: false, query: "" } };
}

function isSearchable(view: View): view is SearchableView {
  switch (view.kind) {
    case "category-list":
    case "project-list":
    case "favorites":
    case "recent":
    case "clone-category":
      return true;
    default:
      return false;
  }
}

export function itemKey(item: ListItem): string {
  switch (item.kind) {
    case "menu":
      return item.label;
    case "category":
    case "theme":
      return item.name;
    case "project":
      return item.entry.name;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function settle<T extends { ok: boolean }>(run: () => Promise<T>): Promise<T | { ok: false; error: string }> {
  try {
    return await run();
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

/**
 * Owns the view stack and everything the user can do from the keyboard. The
 * renderer only reads from it; the TUI loop feeds it keys and calls `tick()`
 * once per frame.
 */
export class NavigationStateMachine {
  private readonly index: ProjectIndex;
  private readonly lists: PersistentLists;
  private readonly statusCache: StatusCache;
  private readonly actions: NavigatorActions;
  private readonly themes: string[];

  private stack: Frame[] = [frameFor({ kind: "main-menu" })];
  private readonly statuses = new Map<ProjectPath, GitStatus>();
  private notices: string[] = [];
  private quitAfterPopup = false;

  theme: string;
  popup: Popup | null = null;
  busy: string | null = null;
  quitRequested = false;

  constructor(deps: NavigatorDeps) {
    this.index = deps.index;
    this.lists = deps.lists;
    this.statusCache = deps.statusCache;
    this.actions = deps.actions;
    this.themes = deps.themes;
    this.theme = deps.theme;
  }

  // ── reading ──────────────────────────────────────────────

  top(): Frame {
    const frame = this.stack[this.stack.length - 1];
    if (!frame) throw new Error("view stack is empty");
    return frame;
  }

  depth(): number {
    return this.stack.length;
  }

  views(): View[] {
    return this.stack.map((f) => f.view);
  }

  items(frame: Frame = this.top()): ListItem[] {
    return filterItems(this.baseItems(frame.view), frame.search.query, itemKey);
  }

  selectedItem(): ListItem | null {
    const frame = this.top();
    return this.items(frame)[frame.cursor] ?? null;
  }

  selectedProject(): ProjectEntry | null {
    const item = this.selectedItem();
    return item?.kind === "project" ? item.entry : null;
  }

  visibleProjects(): ProjectEntry[] {
    const out: ProjectEntry[] = [];
    for (const item of this.items()) {
      if (item.kind === "project") out.push(item.entry);
    }
    return out;
  }

  statusFor(projectPath: ProjectPath): GitStatus | undefined {
    return this.statuses.get(projectPath);
  }

  isFavorite(projectPath: ProjectPath): boolean {
    return this.lists.isFavorite(projectPath);
  }

  takeNotice(): string | null {
    return this.notices.shift() ?? null;
  }

  private baseItems(view: View): ListItem[] {
    switch (view.kind) {
      case "main-menu":
        return MAIN_MENU.map((m): ListItem => ({ kind: "menu", label: m.label, action: m.action }));
      case "category-list":
      case "clone-category":
        return this.index.categoryNames().map((name): ListItem => ({ kind: "category", name }));
      case "project-list":
        return this.index.projectsIn(view.category).map((entry): ListItem => ({ kind: "project", entry }));
      case "favorites":
        return this.lists
          .favorites()
          .map((p) => this.index.entryFor(p))
          .sort((a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase()))
          .map((entry): ListItem => ({ kind: "project", entry }));
      case "recent":
        return this.lists.recents().map((p): ListItem => ({ kind: "project", entry: this.index.entryFor(p) }));
      case "search-results":
        return view.items;
      case "theme-list":
        return this.themes.map((name): ListItem => ({ kind: "theme", name }));
      case "confirm-launch":
      case "help":
      case "clone-input":
        return [];
      default:
        return assertNever(view);
    }
  }

  // ── frame loop ───────────────────────────────────────────

  /** Merges finished status probes and asks for the ones still missing. Returns true when something changed. */
  tick(): boolean {
    let changed = false;
    for (const update of this.statusCache.poll()) {
      this.statuses.set(update.path, update.status);
      changed = true;
    }
    for (const entry of this.visibleProjects()) {
      if (!this.statuses.has(entry.path)) this.statusCache.request(entry.path);
    }
    return changed;
  }

  // ── input ────────────────────────────────────────────────

  async handleKey(key: KeyInput): Promise<void> {
    if (this.busy || this.quitRequested) return;
    if (this.popup) {
      this.popup = null;
      if (this.quitAfterPopup) this.quitRequested = true;
      return;
    }
    await this.dispatch(key);
    this.clampCursor();
  }

  private async dispatch(key: KeyInput): Promise<void> {
    const frame = this.top();
    const view = frame.view;

    if (view.kind === "help") {
      this.pop();
      return;
    }
    if (view.kind === "confirm-launch") {
      await this.handleConfirmKey(key, view.target);
      return;
    }
    if (view.kind === "clone-input") {
      this.handleCloneInputKey(key, frame, view.url);
      return;
    }
    if (frame.search.active && this.handleSearchKey(key, frame)) return;

    switch (key.kind) {
      case "up":
        this.moveCursor(-1);
        return;
      case "down":
        this.moveCursor(1);
        return;
      case "forward":
        await this.forward();
        return;
      case "back":
        this.pop();
        return;
      case "escape":
        this.escape();
        return;
      case "char":
        await this.handleCommand(key.ch);
        return;
    }
  }

  private handleSearchKey(key: KeyInput, frame: Frame): boolean {
    switch (key.kind) {
      case "char":
        frame.search.query += key.ch;
        frame.cursor = 0;
        return true;
      case "back":
        if (frame.search.query.length) {
          frame.search.query = frame.search.query.slice(0, -1);
          frame.cursor = 0;
        } else {
          frame.search.active = false;
        }
        return true;
      case "forward":
        this.freezeSearch(frame);
        return true;
      case "escape":
        frame.search = { active: false, query: "" };
        frame.cursor = 0;
        return true;
      case "up":
      case "down":
        return false;
    }
  }

  private freezeSearch(frame: Frame): void {
    const view = frame.view;
    const query = frame.search.query;
    frame.search = { active: false, query: "" };
    if (!query || !isSearchable(view)) return;
    const items = filterItems(this.baseItems(view), query, itemKey);
    frame.cursor = 0;
    this.push({ kind: "search-results", source: view, query, items });
  }

  private async handleCommand(ch: string): Promise<void> {
    switch (ch) {
      case "j":
        this.moveCursor(1);
        return;
      case "k":
        this.moveCursor(-1);
        return;
      case "l":
        await this.forward();
        return;
      case "h":
        this.pop();
        return;
      case "/":
        this.startSearch();
        return;
      case "f":
        this.toggleFavorite();
        return;
      case "t":
        await this.openTerminal();
        return;
      case "r":
        this.refreshStatus();
        return;
      case "?":
        this.push({ kind: "help" });
        return;
      case "q":
        this.requestQuit();
        return;
      default:
        return;
    }
  }

  private async handleConfirmKey(key: KeyInput, target: LaunchTarget): Promise<void> {
    if (key.kind === "forward" || (key.kind === "char" && (key.ch === "y" || key.ch === "Y"))) {
      await this.confirmLaunch(target);
      return;
    }
    if (key.kind === "back" || key.kind === "escape" || (key.kind === "char" && (key.ch === "n" || key.ch === "N"))) {
      this.pop();
    }
  }

  private handleCloneInputKey(key: KeyInput, frame: Frame, url: string): void {
    switch (key.kind) {
      case "char":
        frame.view = { kind: "clone-input", url: url + key.ch };
        return;
      case "back":
        if (url.length) frame.view = { kind: "clone-input", url: url.slice(0, -1) };
        else this.pop();
        return;
      case "forward": {
        const trimmed = url.trim();
        if (trimmed) this.push({ kind: "clone-category", url: trimmed });
        return;
      }
      case "escape":
        this.escape();
        return;
      case "up":
      case "down":
        return;
    }
  }

  // ── transitions ──────────────────────────────────────────

  private push(view: View): void {
    this.stack.push(frameFor(view));
  }

  /** Never pops the main menu. */
  private pop(): void {
    if (this.stack.length > 1) this.stack.pop();
  }

  private resetToMainMenu(): void {
    this.stack = this.stack.slice(0, 1);
  }

  private escape(): void {
    const frame = this.top();
    if (frame.search.active || frame.search.query) {
      frame.search = { active: false, query: "" };
      frame.cursor = 0;
      return;
    }
    if (this.stack.length > 1) this.resetToMainMenu();
  }

  private moveCursor(delta: number): void {
    const frame = this.top();
    const len = this.items(frame).length;
    if (!len) {
      frame.cursor = 0;
      return;
    }
    frame.cursor = Math.min(len - 1, Math.max(0, frame.cursor + delta));
  }

  private clampCursor(): void {
    for (const frame of this.stack) {
      const len = this.items(frame).length;
      frame.cursor = Math.min(Math.max(0, len - 1), Math.max(0, frame.cursor));
    }
  }

  private startSearch(): void {
    const frame = this.top();
    if (!isSearchable(frame.view)) return;
    frame.search = { active: true, query: "" };
  }

  private async forward(): Promise<void> {
    const frame = this.top();
    const item = this.items(frame)[frame.cursor];
    if (!item) return;
    const view = frame.view;
    switch (view.kind) {
      case "search-results":
        await this.activate(item, view.source);
        return;
      case "main-menu":
      case "category-list":
      case "project-list":
      case "favorites":
      case "recent":
      case "clone-category":
      case "theme-list":
        await this.activate(item, view);
        return;
      case "confirm-launch":
      case "help":
      case "clone-input":
        return;
      default:
        assertNever(view);
    }
  }

  private async activate(item: ListItem, origin: View): Promise<void> {
    switch (item.kind) {
      case "menu":
        this.runMenuAction(item.action);
        return;
      case "category":
        if (origin.kind === "clone-category") await this.cloneInto(origin.url, item.name);
        else this.push({ kind: "project-list", category: item.name });
        return;
      case "project":
        this.push({ kind: "confirm-launch", target: { kind: "project", entry: item.entry } });
        return;
      case "theme":
        this.chooseTheme(item.name);
        return;
    }
  }

  private runMenuAction(action: MenuAction): void {
    switch (action) {
      case "favorites":
        this.push({ kind: "favorites" });
        return;
      case "recent":
        this.push({ kind: "recent" });
        return;
      case "browse":
        this.push({ kind: "category-list" });
        return;
      case "clone":
        this.push({ kind: "clone-input", url: "" });
        return;
      case "open-ide":
        this.push({ kind: "confirm-launch", target: { kind: "ide" } });
        return;
      case "theme":
        this.push({ kind: "theme-list" });
        return;
    }
  }

  // ── effects ──────────────────────────────────────────────

  private persist(label: string, mutate: () => void): boolean {
    try {
      mutate();
      return true;
    } catch (err) {
      this.popup = { title: label, message: errorMessage(err) };
      return false;
    }
  }

  private async withBusy<T>(label: string, run: () => Promise<T>): Promise<T> {
    this.busy = label;
    try {
      return await run();
    } finally {
      this.busy = null;
    }
  }

  private async confirmLaunch(target: LaunchTarget): Promise<void> {
    const label = target.kind === "project" ? target.entry.name : "IDE";
    const outcome: LaunchOutcome = await this.withBusy(`Launching ${label}…`, () =>
      settle(() =>
        target.kind === "project"
          ? this.actions.launcher.openProject(target.entry.path)
          : this.actions.launcher.openIde(),
      ),
    );

    if (!outcome.ok) {
      this.popup = { title: "Launch failed", message: outcome.error };
      return;
    }

    const projectPath = target.kind === "project" ? target.entry.path : null;
    if (projectPath) {
      this.persist("Could not save recent projects", () => this.lists.recordOpened(projectPath));
    }
    this.notices.push(`Launched ${label}`);
    this.pop();
  }

  private toggleFavorite(): void {
    const entry = this.selectedProject();
    if (!entry) return;
    let nowFavorite = false;
    const saved = this.persist("Could not save favorites", () => {
      nowFavorite = this.lists.toggleFavorite(entry.path);
    });
    if (!saved) return;
    this.notices.push(nowFavorite ? `Added ${entry.name} to favorites` : `Removed ${entry.name} from favorites`);
  }

  private async openTerminal(): Promise<void> {
    const entry = this.selectedProject();
    if (!entry) return;
    const outcome: LaunchOutcome = await this.withBusy(`Opening terminal for ${entry.name}…`, () =>
      settle(() => this.actions.launcher.openTerminal(entry.path)),
    );
    if (!outcome.ok) {
      this.popup = { title: "Terminal failed", message: outcome.error };
      return;
    }
    this.notices.push(`Opened terminal for ${entry.name}`);
  }

  private refreshStatus(): void {
    const entries = this.visibleProjects();
    for (const entry of entries) {
      this.statusCache.invalidate(entry.path);
      this.statusCache.request(entry.path);
    }
    if (entries.length) this.notices.push("Status refreshed");
  }

  private async cloneInto(url: string, category: string): Promise<void> {
    const destDir = this.index.categoryDir(category);
    const outcome: CloneOutcome = await this.withBusy(`Cloning ${repoNameFromUrl(url)}…`, () =>
      settle(() => this.actions.cloneRepository(url, destDir)),
    );
    if (!outcome.ok) {
      this.popup = { title: "Clone failed", message: outcome.error };
      return;
    }

    this.resetToMainMenu();
    if (!this.persist("Could not rescan projects", () => this.index.rescan())) return;
    this.persist("Could not save recent projects", () => this.lists.recordOpened(outcome.projectPath));

    const launched: LaunchOutcome = await this.withBusy(`Launching ${outcome.name}…`, () =>
      settle(() => this.actions.launcher.openProject(outcome.projectPath)),
    );
    if (!launched.ok) {
      this.popup = { title: "Launch failed", message: launched.error };
      return;
    }
    this.notices.push(`Cloned and opened ${outcome.name}`);
  }

  private chooseTheme(name: string): void {
    this.theme = name;
    this.persist("Could not save theme", () => this.actions.saveTheme(name));
    this.notices.push(`Theme: ${name}`);
    this.pop();
  }

  /**
   * Stops status probes and flushes lists. When the flush fails the error popup
   * is shown first and the quit completes once it is dismissed; a second
   * request quits regardless.
   */
  requestQuit(): void {
    this.statusCache.close();
    if (this.quitAfterPopup || this.persist("Could not save lists", () => this.lists.flush())) {
      this.quitRequested = true;
      return;
    }
    this.quitAfterPopup = true;
  }
}
