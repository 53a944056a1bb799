/**
 * Headless runner behind `blueprint run`
 */

import type { Logger } from '../host/engine/types';
import { RootController } from '../host/RootController';
import type { ViewSnapshot } from '../host/TreeManager';
import type { JSEngineProvider } from '../sandbox';

export interface RunOptions {
  width: number;
  height: number;
  /** Scheduler interrupts delivered after evaluation */
  ticks: number;
  json: boolean;
  debug?: boolean;
  timeout?: number;
  logger?: Logger;
  provider?: JSEngineProvider;
}

export interface RunResult {
  ok: boolean;
  error?: string;
  snapshot: ViewSnapshot;
  output: string;
}

/**
 * Evaluate `source` in a fresh controller, tick it and render the tree
 */
export async function runScript(
  source: string,
  filename: string,
  options: RunOptions
): Promise<RunResult> {
  const controller = new RootController({
    width: options.width,
    height: options.height,
    debug: options.debug,
    timeout: options.timeout,
    logger: options.logger,
    provider: options.provider,
  });

  try {
    await controller.initialize();
    const result = controller.evalScript(source, filename);
    for (let i = 0; i < options.ticks; i++) {
      controller.tick();
    }
    const snapshot = controller.tree.snapshot();
    const output = options.json ? JSON.stringify(snapshot, null, 2) : formatTree(snapshot);
    return result.ok
      ? { ok: true, snapshot, output }
      : { ok: false, error: result.error, snapshot, output };
  } finally {
    controller.destroy();
  }
}

/**
 * Indented one-line-per-view rendering of a snapshot
 *
 * @example
 * generic #0 [0,0 320x240]
 *   text #1 [0,0 320x16]
 *     rawText #2 "Hello"
 */
export function formatTree(snapshot: ViewSnapshot): string {
  const lines: string[] = [];
  appendNode(snapshot, 0, lines);
  return lines.join('\n');
}

function appendNode(node: ViewSnapshot, depth: number, lines: string[]): void {
  let line = `${'  '.repeat(depth)}${node.kind} #${node.id}`;
  if (node.refId !== undefined) line += ` ref=${node.refId}`;
  if (node.text !== undefined) {
    line += ` ${JSON.stringify(node.text)}`;
  } else {
    const { x, y, width, height } = node.bounds;
    line += ` [${formatNumber(x)},${formatNumber(y)} ${formatNumber(width)}x${formatNumber(height)}]`;
  }
  lines.push(line);
  for (const child of node.children) {
    appendNode(child, depth + 1, lines);
  }
}

function formatNumber(value: number): string {
  return String(Math.round(value * 100) / 100);
}
