/**
 * Text helpers shared by the formatters
 */

import type { FlowPath } from '@flowcert/engine';

export const StatusSymbols = {
  success: '✔',
  failure: '✖',
  warning: '⚠',
  info: 'ℹ',
  arrow: '→',
} as const;

/**
 * One path on one line: `start -[yes]-> loop -> end`
 */
export function formatPath(path: FlowPath): string {
  return path
    .map((step, index) => {
      if (index === 0) return step.nodeId;
      return step.via === undefined ? `-> ${step.nodeId}` : `-[${step.via}]-> ${step.nodeId}`;
    })
    .join(' ');
}

export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

export function divider(width = 60, char = '─'): string {
  return char.repeat(width);
}
