/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Task filtering and partitioning by substring of the rendered command line.
 */

import { formatCommandLine, type Task } from './task.js';

/**
 * A named group of tasks selected by marker substrings.
 */
export interface PartitionGroup {
  name: string;
  /** A task belongs to the group if its command line contains any marker */
  markers: readonly string[];
}

function commandLine(task: Task): string {
  return formatCommandLine(task.command);
}

function containsAny(line: string, needles: readonly string[]): boolean {
  return needles.some((needle) => line.includes(needle));
}

/**
 * Keep tasks whose command line contains `include` and none of `exclude`.
 */
export function selectTasks(
  tasks: readonly Task[],
  include: string,
  exclude: readonly string[] = []
): Task[] {
  return tasks.filter((task) => {
    const line = commandLine(task);
    return line.includes(include) && !containsAny(line, exclude);
  });
}

/**
 * Split tasks into disjoint groups.
 *
 * Each task goes to the first group (in declaration order) with a marker
 * present in its command line; tasks matching no group go to `fallback`.
 * Order within a group follows input order.
 *
 * @returns Map with an entry for every group and the fallback, in that order
 */
export function partitionTasks(
  tasks: readonly Task[],
  groups: readonly PartitionGroup[],
  fallback: string
): Map<string, Task[]> {
  const result = new Map<string, Task[]>();
  for (const group of groups) {
    result.set(group.name, []);
  }
  if (!result.has(fallback)) {
    result.set(fallback, []);
  }

  for (const task of tasks) {
    const line = commandLine(task);
    const group = groups.find((g) => containsAny(line, g.markers));
    const bucket = result.get(group ? group.name : fallback);
    bucket?.push(task);
  }

  return result;
}
