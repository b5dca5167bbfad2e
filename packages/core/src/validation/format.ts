import { canonicalJSON } from '../util/canonical-json.js';
import type { IssueContext, ValidationIssue } from './issue.js';

function prefixLines(prefix: string, text: string): string {
  return text
    .split('\n')
    .map((line) => `${prefix}${line}`)
    .join('\n');
}

export function formatContext(context: IssueContext): string {
  let out = `- ${context.name}::`;
  if (context.path !== undefined) out += ` ${context.path}`;
  if (context.message !== undefined) {
    out += `\n\n${prefixLines('  ', context.message)}`;
  }
  if (context.data !== undefined) {
    out += `\n\n${prefixLines('  |> ', canonicalJSON(context.data, '  '))}`;
  }
  return out;
}

/**
 * Multi-line display block for one issue: a headline, sorted params,
 * the long message and every context.
 */
export function formatIssue(issue: ValidationIssue): string {
  const lines = [`* Error [${issue.kind}]: ${issue.summary}`];
  for (const key of Object.keys(issue.params ?? {}).sort()) {
    lines.push(`   └> ${key}: ${issue.params?.[key] ?? ''}`);
  }
  let out = lines.join('\n');
  if (issue.message !== undefined) {
    out += `\n\n${prefixLines('  ', issue.message)}`;
  }
  for (const context of issue.contexts ?? []) {
    out += `\n\n${formatContext(context)}`;
  }
  return out;
}

export function formatIssues(issues: readonly ValidationIssue[]): string {
  if (issues.length === 0) return 'No validation issues';
  const noun = issues.length === 1 ? 'issue' : 'issues';
  return (
    `Validation failed with ${issues.length} ${noun}:\n\n` +
    issues.map(formatIssue).join('\n\n') +
    '\n'
  );
}
