import { loadOrCreateConfig, saveThemeChoice, validateStartup, type ValidatedConfig } from "./config.ts";
import { cloneRepository, readGitStatus } from "./git.ts";
import { createLauncher } from "./launcher.ts";
import { PersistentLists } from "./lists.ts";
import { NavigationStateMachine } from "./navigation.ts";
import { getConfigFilePath } from "./paths.ts";
import { ProjectIndex } from "./projects.ts";
import { StatusCache } from "./status-cache.ts";
import { getTheme, themeNames } from "./theme.ts";
import { runTui } from "./ui/tui.ts";

type CliOptions = {
  help: boolean;
  configPath: boolean;
  check: boolean;
};

function usage(): string {
  return [
    "projnav - browse, launch and clone projects under a base directory",
    "",
    "Usage:",
    "  projnav                        Open TUI",
    "",
    "Options:",
    "      --config-path              Print the config file path",
    "      --check                    Validate config and print what was found",
    "  -h, --help                     Show help",
    "",
    "Environment:",
    "  PROJNAV_CONFIG                 Config file path",
    "  PROJNAV_TUI_TERM               Terminal name passed to blessed",
    "",
  ].join("\n");
}

export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { help: false, configPath: false, check: false };
  for (const arg of argv) {
    if (arg === "-h" || arg === "--help") {
      opts.help = true;
      continue;
    }
    if (arg === "--config-path") {
      opts.configPath = true;
      continue;
    }
    if (arg === "--check") {
      opts.check = true;
      continue;
    }
    if (arg.startsWith("-")) throw new Error(`Unknown option: ${arg}`);
    throw new Error(`Unexpected argument: ${arg}`);
  }
  return opts;
}

export function checkSummary(config: ValidatedConfig, index: ProjectIndex, lists: PersistentLists): string {
  return [
    `config: ${getConfigFilePath()}`,
    `base_dir: ${config.baseDirReal}`,
    `idea_path: ${config.ideaExecutable}`,
    `theme: ${getTheme(config.theme).name}`,
    `categories: ${index.categoryNames().length}`,
    `projects: ${index.projectCount()}`,
    `favorites: ${lists.favorites().length}`,
    `recent: ${lists.recents().length}`,
    "",
  ].join("\n");
}

export async function main(argv: string[]): Promise<void> {
  const opts = parseArgs(argv);
  if (opts.help) {
    process.stdout.write(usage());
    return;
  }
  if (opts.configPath) {
    process.stdout.write(`${getConfigFilePath()}\n`);
    return;
  }

  const config = validateStartup(loadOrCreateConfig());
  const index = ProjectIndex.scan(config.baseDirReal);
  const lists = PersistentLists.load();

  if (opts.check) {
    process.stdout.write(checkSummary(config, index, lists));
    return;
  }

  const machine = new NavigationStateMachine({
    index,
    lists,
    statusCache: new StatusCache({ probe: readGitStatus }),
    actions: {
      launcher: createLauncher({ ideaPath: config.ideaExecutable, terminalCommand: config.terminalCommand }),
      cloneRepository,
      saveTheme: (theme) => saveThemeChoice(theme),
    },
    themes: themeNames(),
    theme: getTheme(config.theme).name,
  });

  await runTui({ machine });
}
