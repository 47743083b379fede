import * as path from "path";
import { spawn } from "child_process";
import { performance } from "perf_hooks";
import chalk from "chalk";
import { ScriptError } from "@burrow/common";
import type { Logger } from "@burrow/common";

export const LIFECYCLE_SCRIPTS = ["preinstall", "install", "postinstall"] as const;

export type LifecycleScript = (typeof LIFECYCLE_SCRIPTS)[number];

export interface ScriptRequest {
  packageName: string;
  version: string;
  script: LifecycleScript;
  command: string;
  cwd: string;
  env: NodeJS.ProcessEnv;
  /**
   * 0 disables the timeout.
   */
  timeoutMs: number;
}

export interface ScriptResult {
  /**
   * `null` when the process was killed.
   */
  exitCode: number | null;
  output: string;
}

export type ScriptRunner = (request: ScriptRequest) => Promise<ScriptResult>;

export const spawnScript: ScriptRunner = (request) =>
  new Promise<ScriptResult>((resolve, reject) => {
    const child = spawn(request.command, {
      cwd: request.cwd,
      env: request.env,
      shell: true,
      windowsHide: true,
    });
    let output = "";
    child.stdout?.on("data", (data) => {
      output += data.toString();
    });
    child.stderr?.on("data", (data) => {
      output += data.toString();
    });

    const timer =
      request.timeoutMs > 0
        ? setTimeout(() => {
            output += `\nKilled after ${request.timeoutMs}ms`;
            child.kill("SIGTERM");
          }, request.timeoutMs)
        : undefined;

    child.on("error", (e) => {
      if (timer) {
        clearTimeout(timer);
      }
      reject(e);
    });
    child.on("close", (code) => {
      if (timer) {
        clearTimeout(timer);
      }
      resolve({ exitCode: code, output });
    });
  });

/**
 * PATH for a script running in `cwd`: every `node_modules/.bin` from `cwd` up
 * to the project root, then the inherited PATH.
 */
export function scriptPath(
  projectRoot: string,
  cwd: string,
  inherited: string | undefined = process.env["PATH"]
): string {
  const dirs: string[] = [];
  let current = path.resolve(cwd);
  const root = path.resolve(projectRoot);
  for (;;) {
    if (path.basename(current) !== "node_modules") {
      dirs.push(path.join(current, "node_modules", ".bin"));
    }
    if (current === root || path.dirname(current) === current) {
      break;
    }
    current = path.dirname(current);
  }
  return [...dirs, ...(inherited ? [inherited] : [])].join(path.delimiter);
}

export interface ScriptTarget {
  name: string;
  version: string;
  dir: string;
  scripts: Record<string, string>;
}

export interface LifecycleOptions {
  projectRoot: string;
  runner: ScriptRunner;
  timeoutMs: number;
  logger: Logger;
}

/**
 * Runs the install lifecycle of one package. The first failing script ends it.
 */
export async function runLifecycleScripts(
  target: ScriptTarget,
  options: LifecycleOptions
): Promise<ScriptError | undefined> {
  const { logger } = options;
  for (const script of LIFECYCLE_SCRIPTS) {
    const command = target.scripts[script];
    if (!command) {
      continue;
    }
    const t0 = performance.now();
    const label = `${chalk.gray(script)} ${chalk.cyanBright(
      target.name
    )} ${chalk.magentaBright(target.version)}`;
    let result: ScriptResult;
    try {
      result = await options.runner({
        packageName: target.name,
        version: target.version,
        script,
        command,
        cwd: target.dir,
        env: {
          ...process.env,
          PATH: scriptPath(options.projectRoot, target.dir),
          npm_lifecycle_event: script,
          npm_package_name: target.name,
          npm_package_version: target.version,
        },
        timeoutMs: options.timeoutMs,
      });
    } catch (e) {
      result = {
        exitCode: null,
        output: e instanceof Error ? e.message : String(e),
      };
    }

    if (result.exitCode !== 0) {
      logger.info(`💥 ${label} script failed`);
      logger.info(chalk.gray(`> ${command}`));
      if (result.output.length) {
        logger.info(result.output);
      }
      return new ScriptError(
        `${target.name}@${target.version}`,
        script,
        result.exitCode,
        result.output,
        target.dir
      );
    }
    const duration = Math.round((performance.now() - t0) / 100) / 10;
    logger.info(`✅ ${label} in ${duration} s`);
  }
  return undefined;
}
