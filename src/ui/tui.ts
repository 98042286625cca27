import blessed from "blessed";
import type { Widgets } from "blessed";
import type { Frame, LaunchTarget, NavigationStateMachine } from "../navigation.ts";
import { getTheme, type Theme } from "../theme.ts";
import { HELP_ENTRIES, emptyListText, escapeTags, footerHelp, itemLabel, styledHelp, toKeyInput, viewTitle } from "./labels.ts";
import { getBlessedTerminalOverride } from "./term.ts";

export type TuiOptions = {
  machine: NavigationStateMachine;
  frameMs?: number;
  noticeMs?: number;
};

function confirmText(target: LaunchTarget, theme: Theme): string {
  if (target.kind === "ide") return "\n  Launch the IDE without a project?\n";
  return [
    "",
    `  Open {bold}${escapeTags(target.entry.name)}{/bold} in the IDE?`,
    `  {${theme.muted}-fg}${escapeTags(target.entry.path)}{/}`,
    "",
  ].join("\n");
}

function bodyText(frame: Frame, theme: Theme): string | null {
  const view = frame.view;
  switch (view.kind) {
    case "help":
      return HELP_ENTRIES.map((entry) => `  ${styledHelp([entry], theme)}`).join("\n");
    case "confirm-launch":
      return confirmText(view.target, theme);
    case "clone-input":
      return `\n  URL: ${escapeTags(view.url)}{${theme.highlight}-fg}█{/}\n`;
    default:
      return null;
  }
}

export async function runTui(args: TuiOptions): Promise<void> {
  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    throw new Error("projnav TUI requires a TTY.");
  }

  const { machine } = args;
  const frameMs = args.frameMs ?? 100;
  const noticeMs = args.noticeMs ?? 3000;

  return await new Promise<void>((resolve, reject) => {
    const screen = blessed.screen({ smartCSR: true, title: "projnav", terminal: getBlessedTerminalOverride() });

    const header = blessed.box({
      parent: screen,
      top: 0,
      left: 0,
      height: 1,
      width: "100%",
      content: "",
      tags: true,
      style: { bg: "default" },
    });

    const list = blessed.list({
      parent: screen,
      top: 1,
      left: 0,
      width: "100%",
      height: "100%-3",
      keys: false,
      mouse: false,
      border: "line",
      label: "",
      style: { border: {}, selected: { bold: true }, label: {} },
      scrollbar: { style: {} },
      tags: true,
    });

    const body = blessed.box({
      parent: screen,
      top: "center",
      left: "center",
      width: "70%",
      height: 9,
      border: "line",
      label: "",
      tags: true,
      hidden: true,
      style: { border: {}, label: {} },
    });

    const searchBar = blessed.box({
      parent: screen,
      bottom: 1,
      left: 0,
      height: 1,
      width: "100%",
      content: "",
      tags: true,
      hidden: true,
    });

    const footer = blessed.box({
      parent: screen,
      bottom: 0,
      left: 0,
      height: 1,
      width: "100%",
      content: "",
      tags: true,
      style: { fg: "gray" },
    });

    const popup = blessed.box({
      parent: screen,
      top: "center",
      left: "center",
      width: "60%",
      height: 9,
      border: "line",
      label: "",
      tags: true,
      hidden: true,
      style: { border: {}, label: {} },
    });

    let finished = false;
    let flash: string | null = null;
    let footerTimer: ReturnType<typeof setTimeout> | null = null;
    let frameTimer: ReturnType<typeof setInterval> | null = null;

    function flashFooter(message: string, ms = noticeMs) {
      if (footerTimer) clearTimeout(footerTimer);
      flash = message;
      footerTimer = setTimeout(() => {
        flash = null;
        footerTimer = null;
        render();
      }, ms);
    }

    function applyTheme(theme: Theme) {
      list.style.border.fg = theme.border;
      list.style.label.fg = theme.header;
      list.style.selected.fg = theme.highlight;
      list.style.item = { fg: theme.text };
      list.style.scrollbar = { bg: theme.border };
      body.style.border.fg = theme.confirmBorder;
      body.style.label.fg = theme.header;
      popup.style.border.fg = theme.error;
      popup.style.label.fg = theme.error;
    }

    function renderList(frame: Frame, theme: Theme) {
      const items = machine.items(frame);
      const labels = items.map((item) =>
        itemLabel(item, {
          view: frame.view,
          theme,
          statusFor: (p) => machine.statusFor(p),
          isFavorite: (p) => machine.isFavorite(p),
          currentTheme: machine.theme,
        }),
      );
      list.setItems(labels.length ? labels : [`{${theme.muted}-fg}${emptyListText(frame.view)}{/}`]);
      list.select(frame.cursor);
    }

    function render() {
      if (finished) return;
      const theme = getTheme(machine.theme);
      const frame = machine.top();
      const title = escapeTags(viewTitle(frame.view));
      applyTheme(theme);

      const crumbs = machine.depth() > 1 ? ` {gray-fg}·{/gray-fg} ${title}` : "";
      header.setContent(` {${theme.header}-fg}{bold}projnav{/bold}{/}${crumbs}`);

      const text = bodyText(frame, theme);
      if (text === null) {
        body.hide();
        list.show();
        list.setLabel(` {bold}${title}{/bold} `);
        renderList(frame, theme);
      } else {
        list.hide();
        body.setLabel(` {bold}${title}{/bold} `);
        body.setContent(text);
        body.show();
      }

      if (frame.search.active || frame.search.query) {
        const cursor = frame.search.active ? `{${theme.highlight}-fg}█{/}` : "";
        searchBar.setContent(` {${theme.highlight}-fg}/{/}${escapeTags(frame.search.query)}${cursor}`);
        searchBar.show();
      } else {
        searchBar.hide();
      }

      if (!flash) {
        const notice = machine.takeNotice();
        if (notice) flashFooter(notice);
      }
      if (machine.busy) footer.setContent(` {${theme.highlight}-fg}${escapeTags(machine.busy)}{/}`);
      else if (flash) footer.setContent(` ${escapeTags(flash)}`);
      else footer.setContent(` ${footerHelp(frame.view, frame.search.active, theme)}`);

      if (machine.popup) {
        popup.setLabel(` {bold}${escapeTags(machine.popup.title)}{/bold} `);
        popup.setContent(`\n  ${escapeTags(machine.popup.message)}\n\n  {gray-fg}press any key{/gray-fg}`);
        popup.show();
        popup.setFront();
      } else {
        popup.hide();
      }

      screen.render();
    }

    function finish(err?: unknown) {
      if (finished) return;
      finished = true;
      if (frameTimer) clearInterval(frameTimer);
      if (footerTimer) clearTimeout(footerTimer);
      screen.destroy();
      if (err === undefined) resolve();
      else reject(err instanceof Error ? err : new Error(String(err)));
    }

    screen.on("keypress", (ch: string, key: Widgets.Events.IKeyEventArg) => {
      if (finished) return;
      if (key?.full === "C-c") {
        machine.requestQuit();
        if (machine.quitRequested) finish();
        else render();
        return;
      }
      const input = toKeyInput(ch, key);
      if (!input) return;

      const pending = machine.handleKey(input);
      // Paint the busy line while a launch or clone is still running.
      render();
      void pending.then(
        () => {
          if (machine.quitRequested) finish();
          else render();
        },
        (err: unknown) => finish(err),
      );
    });
    screen.on("resize", () => render());

    frameTimer = setInterval(() => {
      try {
        if (machine.tick()) render();
      } catch (err) {
        finish(err);
      }
    }, frameMs);

    footer.setFront();
    header.setFront();
    machine.tick();
    render();
  });
}
