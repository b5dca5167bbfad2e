import { describe, it, expect } from 'vitest';
import { renderCLIView, stripAnsi } from './render.js';
import type { CLIErrorView } from '@shardcheck/core';
import { ErrorCode } from '@shardcheck/core';

describe('renderCLIView', () => {
  it('renders title and sections one per line', () => {
    const view: CLIErrorView = {
      title: 'Error E010: invalid graph document',
      code: ErrorCode.INVALID_GRAPH_DOCUMENT,
      location: 'Location: /nodes/0/body/inputs/a very long slot name/0',
      excerpt: '{ "dtype": "f32" }',
      workaround: 'Add a range to the tensor body',
      colors: false,
    };

    expect(renderCLIView(view)).toBe(
      [
        '❌ Error E010: invalid graph document',
        '📍 Location: /nodes/0/body/inputs/a very long slot name/0',
        'Excerpt: { "dtype": "f32" }',
        '💡 Workaround: Add a range to the tensor body',
      ].join('\n')
    );
  });

  it('applies ANSI colors to the title when enabled', () => {
    const view: CLIErrorView = {
      title: 'Error E500: Internal error',
      code: ErrorCode.INTERNAL_ERROR,
      location: 'Location: /nodes/1',
      colors: true,
    };
    const out = renderCLIView(view);

    expect(out).toBe(
      '\u001B[1;31m❌ Error E500: Internal error\u001B[0m\n📍 Location: /nodes/1'
    );
    expect(stripAnsi(out)).toBe('❌ Error E500: Internal error\n📍 Location: /nodes/1');
  });

  it('appends details verbatim after a blank line', () => {
    const view: CLIErrorView = {
      title: 'Error E200: Validation failed with 1 issue:',
      code: ErrorCode.GRAPH_VALIDATION_FAILED,
      details: '* Error [ReferenceCycleError]: Reference cycle detected\n   └> truncated: true',
      colors: false,
    };

    expect(renderCLIView(view).split('\n')).toEqual([
      '❌ Error E200: Validation failed with 1 issue:',
      '',
      '* Error [ReferenceCycleError]: Reference cycle detected',
      '   └> truncated: true',
    ]);
  });
});
