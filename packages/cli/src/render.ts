import type { CLIErrorView } from '@shardcheck/core';

const ANSI = {
  reset: '\u001B[0m',
  boldRed: '\u001B[1;31m',
};

/**
 * One line per present field; pointers and excerpts stay on one line so
 * they can be copied back into a query.
 */
export function renderCLIView(view: CLIErrorView): string {
  const title = `❌ ${view.title}`;
  const lines = [view.colors ? `${ANSI.boldRed}${title}${ANSI.reset}` : title];

  if (view.location) lines.push(`📍 ${view.location}`);
  if (view.excerpt) lines.push(`Excerpt: ${view.excerpt}`);
  if (view.workaround) lines.push(`💡 Workaround: ${view.workaround}`);
  if (view.details) {
    // issue lists carry their own layout
    lines.push('', view.details);
  }

  return lines.join('\n');
}

export function stripAnsi(input: string): string {
  // eslint-disable-next-line no-control-regex
  return input.replace(/\u001B\[[\d;]*m/g, '');
}
