import { spawn, type ChildProcess } from "node:child_process";
import { shJoin, shSplit } from "./shell.ts";
import type { LaunchOutcome, ProjectPath } from "./types.ts";

export type SpawnDetached = (command: string, args: string[], cwd?: string) => Promise<LaunchOutcome>;

export type Launcher = {
  openProject(projectPath: ProjectPath): Promise<LaunchOutcome>;
  openIde(): Promise<LaunchOutcome>;
  openTerminal(projectPath: ProjectPath): Promise<LaunchOutcome>;
};

/** Fire-and-forget spawn; resolves once the OS has either started the process or refused to. */
export function spawnDetached(command: string, args: string[], cwd?: string): Promise<LaunchOutcome> {
  const display = shJoin([command, ...args]);
  return new Promise((resolve) => {
    let child: ChildProcess;
    try {
      child = spawn(command, args, { cwd, detached: true, stdio: "ignore", windowsHide: true });
    } catch (err) {
      resolve({ ok: false, error: `${display}: ${err instanceof Error ? err.message : String(err)}` });
      return;
    }
    const started = child;
    started.once("error", (err) => resolve({ ok: false, error: `${display}: ${err.message}` }));
    started.once("spawn", () => {
      started.unref();
      resolve({ ok: true });
    });
  });
}

export function terminalArgv(template: string, projectPath: ProjectPath): string[] {
  const words = shSplit(template);
  if (!words.length) throw new Error("terminal_command is empty");
  if (words.some((w) => w.includes("{path}"))) return words.map((w) => w.replaceAll("{path}", projectPath));
  return [...words, projectPath];
}

export function createLauncher(opts: {
  ideaPath: string;
  terminalCommand: string;
  spawn?: SpawnDetached;
}): Launcher {
  const run = opts.spawn ?? spawnDetached;
  return {
    openProject: (projectPath) => run(opts.ideaPath, [projectPath]),
    openIde: () => run(opts.ideaPath, []),
    openTerminal: async (projectPath) => {
      let argv: string[];
      try {
        argv = terminalArgv(opts.terminalCommand, projectPath);
      } catch (err) {
        return { ok: false, error: err instanceof Error ? err.message : String(err) };
      }
      const [command, ...args] = argv;
      if (command === undefined) return { ok: false, error: "terminal_command is empty" };
      return run(command, args, projectPath);
    },
  };
}
