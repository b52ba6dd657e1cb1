/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Task model: runs, commands, tasks and batches.
 *
 * Commands are built as a program plus an argument vector and are never
 * spliced together as shell text. `formatCommandLine` renders the shell
 * equivalent for display, dry runs and substring partitioning only.
 */

import { basename } from 'node:path';

// =============================================================================
// Types
// =============================================================================

/**
 * One simulated run, identified by the stem of one of its files.
 */
export interface Run {
  /** Run identifier (file name up to the first '.') */
  runId: string;
  /** Inference method that produced the file, if any */
  method?: string;
  /** Absolute path of the file the run was derived from */
  source: string;
}

/**
 * An external program invocation.
 */
export interface Command {
  readonly program: string;
  readonly args: readonly string[];
  /** Working directory (default: inherited) */
  readonly cwd?: string;
  /** Extra environment variables, merged over the parent environment */
  readonly env?: Readonly<Record<string, string>>;
  /** File receiving standard output */
  readonly stdout?: string;
  /** File receiving standard error */
  readonly stderr?: string;
}

/**
 * A unit of work dispatched to a runner.
 */
export interface Task {
  /** Unique identifier: `<stage>:<method>/<runId>` or `<stage>:<runId>` */
  readonly id: string;
  /** Stage name (e.g. 'mutphi', 'plot') */
  readonly stage: string;
  readonly runId: string;
  readonly method?: string;
  readonly command: Command;
  /** Every file the task writes, capture files included */
  readonly outputs: readonly string[];
}

/**
 * Policy applied when a task in a batch fails.
 *
 * - `never`: keep dispatching, report at the end
 * - `soon`: start no new task, let running ones finish
 * - `now`: start no new task and kill running ones
 */
export type HaltPolicy = 'never' | 'soon' | 'now';

/**
 * Tasks submitted together with one concurrency limit and one failure policy.
 */
export interface Batch {
  name: string;
  tasks: Task[];
  concurrency: number;
  halt: HaltPolicy;
}

// =============================================================================
// Runs
// =============================================================================

/**
 * Derive the run identifier from a file path: the basename up to the first '.'.
 *
 * @example
 * ```ts
 * runIdFromPath('/results/pairtree/K3_S1/K3_S1.neutree.pickle'); // 'K3_S1'
 * ```
 */
export function runIdFromPath(path: string): string {
  const name = basename(path);
  const dot = name.indexOf('.');
  return dot === -1 ? name : name.slice(0, dot);
}

/**
 * Build the identifier of the task for a (stage, run) pair.
 */
export function taskId(stage: string, runId: string, method?: string): string {
  return method ? `${stage}:${method}/${runId}` : `${stage}:${runId}`;
}

// =============================================================================
// Command builder
// =============================================================================

/**
 * Fluent builder for immutable commands.
 *
 * @example
 * ```ts
 * const cmd = command('python3')
 *   .arg('/opt/neutree/make_mutrels.py')
 *   .flag('--impute-garbage', impute)
 *   .args(resultPath, outputPath)
 *   .env('OMP_NUM_THREADS', '1')
 *   .build();
 * ```
 */
export class CommandBuilder {
  private readonly argv: string[] = [];
  private readonly vars: Record<string, string> = {};
  private workDir: string | undefined;
  private out: string | undefined;
  private err: string | undefined;

  constructor(private readonly program: string) {}

  arg(value: string): this {
    this.argv.push(value);
    return this;
  }

  args(...values: string[]): this {
    this.argv.push(...values);
    return this;
  }

  /** Append `name` only when `enabled` is true */
  flag(name: string, enabled: boolean): this {
    if (enabled) this.argv.push(name);
    return this;
  }

  /** Append `name value` */
  option(name: string, value: string): this {
    this.argv.push(name, value);
    return this;
  }

  cwd(dir: string): this {
    this.workDir = dir;
    return this;
  }

  env(name: string, value: string): this {
    this.vars[name] = value;
    return this;
  }

  envs(vars: Readonly<Record<string, string>>): this {
    Object.assign(this.vars, vars);
    return this;
  }

  stdout(path: string): this {
    this.out = path;
    return this;
  }

  stderr(path: string): this {
    this.err = path;
    return this;
  }

  build(): Command {
    const cmd: Command = {
      program: this.program,
      args: Object.freeze([...this.argv]),
      ...(this.workDir !== undefined ? { cwd: this.workDir } : {}),
      ...(Object.keys(this.vars).length > 0 ? { env: Object.freeze({ ...this.vars }) } : {}),
      ...(this.out !== undefined ? { stdout: this.out } : {}),
      ...(this.err !== undefined ? { stderr: this.err } : {}),
    };
    return Object.freeze(cmd);
  }
}

/**
 * Start building a command for `program`.
 */
export function command(program: string): CommandBuilder {
  return new CommandBuilder(program);
}

/**
 * Command running one line of shell text through `/bin/sh -c`.
 *
 * Used by the generic dispatcher, whose input is already shell syntax.
 */
export function shellCommand(line: string): Command {
  return command('/bin/sh').args('-c', line).build();
}

/**
 * Create a task, deriving its id and collecting capture files into its outputs.
 */
export function createTask(fields: {
  stage: string;
  runId: string;
  method?: string;
  command: Command;
  outputs?: string[];
}): Task {
  const outputs = [...(fields.outputs ?? [])];
  if (fields.command.stdout !== undefined) outputs.push(fields.command.stdout);
  if (fields.command.stderr !== undefined) outputs.push(fields.command.stderr);

  return Object.freeze({
    id: taskId(fields.stage, fields.runId, fields.method),
    stage: fields.stage,
    runId: fields.runId,
    ...(fields.method !== undefined ? { method: fields.method } : {}),
    command: fields.command,
    outputs: Object.freeze(outputs),
  });
}

// =============================================================================
// Formatting
// =============================================================================

const SAFE_ARG = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote an argument for POSIX shell display.
 */
export function quoteArg(value: string): string {
  if (SAFE_ARG.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Render a command as one line of shell text.
 *
 * @example
 * ```ts
 * formatCommandLine(cmd);
 * // "cd /r/a/R1 && OMP_NUM_THREADS=1 python3 make_mutrels.py R1.pickle R1.mutrel.npz"
 * ```
 */
export function formatCommandLine(cmd: Command): string {
  const parts: string[] = [];
  if (cmd.cwd !== undefined) {
    parts.push('cd', quoteArg(cmd.cwd), '&&');
  }
  for (const [name, value] of Object.entries(cmd.env ?? {})) {
    parts.push(`${name}=${quoteArg(value)}`);
  }
  parts.push(quoteArg(cmd.program), ...cmd.args.map(quoteArg));
  if (cmd.stdout !== undefined) {
    parts.push('>', quoteArg(cmd.stdout));
  }
  if (cmd.stderr !== undefined) {
    parts.push('2>', quoteArg(cmd.stderr));
  }
  return parts.join(' ');
}

/**
 * Find output paths claimed by more than one task.
 *
 * @returns Map of path to the ids of the tasks writing it (empty when valid)
 */
export function findOutputCollisions(tasks: readonly Task[]): Map<string, string[]> {
  const owners = new Map<string, string[]>();
  for (const task of tasks) {
    for (const output of new Set(task.outputs)) {
      const ids = owners.get(output);
      if (ids) {
        ids.push(task.id);
      } else {
        owners.set(output, [task.id]);
      }
    }
  }

  const collisions = new Map<string, string[]>();
  for (const [path, ids] of owners) {
    if (ids.length > 1) collisions.set(path, ids);
  }
  return collisions;
}
