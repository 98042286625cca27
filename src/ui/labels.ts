import type { KeyInput, ListItem, SearchableView, View } from "../navigation.ts";
import type { Theme } from "../theme.ts";
import type { GitStatus, ProjectEntry } from "../types.ts";

/** Same escaping blessed applies for `{open}`/`{close}` so names never parse as tags. */
export function escapeTags(text: string): string {
  return text.replace(/[{}]/g, (ch) => (ch === "{" ? "{open}" : "{close}"));
}

function fg(color: string, text: string): string {
  return `{${color}-fg}${text}{/}`;
}

function styledKey(key: string, theme: Theme): string {
  return `{${theme.highlight}-fg}{bold}${key}{/bold}{/}`;
}

export function styledHelp(items: Array<[string, string]>, theme: Theme): string {
  return items.map(([key, desc]) => `${styledKey(key, theme)}{gray-fg}:${desc}{/gray-fg}`).join(" {gray-fg}·{/gray-fg} ");
}

/** Nothing is drawn while a probe is pending or when status is unavailable. */
export function gitGlyph(status: GitStatus | undefined, theme: Theme): string {
  if (!status || status.state === "unavailable") return "";
  const branch = fg(theme.gitBranch, ` ${escapeTags(status.branch ?? "(detached)")}`);
  const mark = status.dirty ? fg(theme.gitDirty, "●") : fg(theme.gitClean, "✓");
  return ` ${branch} ${mark}`;
}

export function projectLabel(
  entry: ProjectEntry,
  opts: { status: GitStatus | undefined; favorite: boolean; theme: Theme; showCategory: boolean },
): string {
  const star = opts.favorite ? `${fg(opts.theme.highlight, "★")} ` : "  ";
  const language = entry.language ? ` ${fg(opts.theme.border, `[${escapeTags(entry.language)}]`)}` : "";
  const category = opts.showCategory ? ` ${fg(opts.theme.muted, escapeTags(entry.category))}` : "";
  return `${star}{bold}${escapeTags(entry.name)}{/bold}${language}${category}${gitGlyph(opts.status, opts.theme)}`;
}

function searchableTitle(view: SearchableView): string {
  switch (view.kind) {
    case "category-list":
      return "Select Category";
    case "project-list":
      return `Projects in ${view.category}`;
    case "favorites":
      return "Favorite Projects";
    case "recent":
      return "Recently Opened Projects";
    case "clone-category":
      return "Select Category to Clone into";
  }
}

export function viewTitle(view: View): string {
  switch (view.kind) {
    case "main-menu":
      return "projnav";
    case "search-results":
      return `${searchableTitle(view.source)} · "${view.query}"`;
    case "confirm-launch":
      return "Confirm";
    case "help":
      return "Help";
    case "clone-input":
      return "Clone Repository: Paste URL";
    case "theme-list":
      return "Choose Theme";
    default:
      return searchableTitle(view);
  }
}

export function emptyListText(view: View): string {
  switch (view.kind) {
    case "favorites":
      return "(no favorites yet, press f on a project)";
    case "recent":
      return "(nothing opened yet)";
    case "category-list":
    case "clone-category":
      return "(no categories in base directory)";
    case "project-list":
      return "(no projects in this category)";
    case "search-results":
      return "(no matches)";
    default:
      return "(empty)";
  }
}

export function itemLabel(
  item: ListItem,
  ctx: {
    view: View;
    theme: Theme;
    statusFor: (path: string) => GitStatus | undefined;
    isFavorite: (path: string) => boolean;
    currentTheme: string;
  },
): string {
  switch (item.kind) {
    case "menu":
      return escapeTags(item.label);
    case "category":
      return `{bold}${escapeTags(item.name)}{/bold}`;
    case "theme":
      return item.name === ctx.currentTheme
        ? `${escapeTags(item.name)} ${fg(ctx.theme.muted, "(current)")}`
        : escapeTags(item.name);
    case "project":
      return projectLabel(item.entry, {
        status: ctx.statusFor(item.entry.path),
        favorite: ctx.isFavorite(item.entry.path),
        theme: ctx.theme,
        showCategory: ctx.view.kind !== "project-list",
      });
  }
}

export const HELP_ENTRIES: Array<[string, string]> = [
  ["↑/k ↓/j", "move"],
  ["Enter/→/l", "open"],
  ["Backspace/←/h", "back"],
  ["Esc", "clear search, or back to the main menu"],
  ["/", "search the current list"],
  ["f", "toggle favorite"],
  ["t", "open a terminal in the project"],
  ["r", "refresh git status"],
  ["?", "this help"],
  ["q", "quit"],
];

export function footerHelp(view: View, searching: boolean, theme: Theme): string {
  if (searching) return styledHelp([["Enter", "freeze results"], ["Esc", "clear"], ["Backspace", "delete"]], theme);
  switch (view.kind) {
    case "confirm-launch":
      return styledHelp([["y/Enter", "open"], ["n/Esc", "cancel"]], theme);
    case "clone-input":
      return styledHelp([["Enter", "choose category"], ["Backspace", "delete"], ["Esc", "cancel"]], theme);
    case "help":
      return styledHelp([["any key", "close"]], theme);
    case "main-menu":
    case "theme-list":
      return styledHelp([["Enter", "select"], ["?", "help"], ["q", "quit"]], theme);
    default:
      return styledHelp(
        [
          ["Enter", "open"],
          ["/", "search"],
          ["f", "favorite"],
          ["t", "terminal"],
          ["r", "refresh"],
          ["Esc", "menu"],
          ["q", "quit"],
        ],
        theme,
      );
  }
}

type RawKey = { name?: string; ctrl?: boolean; meta?: boolean };

/** Maps a blessed keypress to machine input; printable characters pass through as `char`. */
export function toKeyInput(ch: string | undefined, key: RawKey | undefined): KeyInput | null {
  if (key?.ctrl || key?.meta) return null;
  switch (key?.name) {
    case "up":
      return { kind: "up" };
    case "down":
      return { kind: "down" };
    case "enter":
    case "right":
      return { kind: "forward" };
    case "left":
    case "backspace":
      return { kind: "back" };
    case "escape":
      return { kind: "escape" };
    default:
      break;
  }
  if (ch && ch.length === 1 && ch >= " " && ch !== "\x7f") return { kind: "char", ch };
  return null;
}
