import { describe, test, expect, beforeEach, afterEach } from 'vitest';

import { ErrorPresenter } from '../presenter.js';
import { ErrorCode } from '../codes.js';
import {
  ConfigurationError,
  DocumentError,
  GeometryError,
} from '../../types/errors.js';

describe('ErrorPresenter', () => {
  const origEnv = { ...process.env };

  beforeEach(() => {
    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '';
  });

  afterEach(() => {
    process.env = { ...origEnv };
  });

  test('formatForCLI builds a title from the code and first line', () => {
    const error = new DocumentError({
      message: 'invalid graph document: /nodes/0 must have required property \'id\'',
      path: '/nodes/0',
    });
    const view = new ErrorPresenter('dev').formatForCLI(error);

    expect(view.title).toBe(
      "Error E010: invalid graph document: /nodes/0 must have required property 'id'"
    );
    expect(view.code).toBe(ErrorCode.INVALID_GRAPH_DOCUMENT);
    expect(view.location).toBe('Location: /nodes/0');
    expect(view.details).toBeUndefined();
  });

  test('formatForCLI moves the remaining lines into details', () => {
    const error = new GeometryError('cannot broadcast\nshapes [3] and [4]');
    const view = new ErrorPresenter('dev').formatForCLI(error);

    expect(view.title).toBe('Error E100: cannot broadcast');
    expect(view.details).toBe('shapes [3] and [4]');
  });

  test('falls back to the node id for the location and uses suggestions', () => {
    const error = new ConfigurationError('node kind "widget" is not registered', {
      nodeId: 'w1',
      suggestion: 'register the kind in createEnvironment',
    });
    const view = new ErrorPresenter('dev').formatForCLI(error);

    expect(view.location).toBe('Location: w1');
    expect(view.workaround).toBe('register the kind in createEnvironment');

    error.suggestions = ['drop the node'];
    expect(new ErrorPresenter('dev').formatForCLI(error).workaround).toBe(
      'drop the node'
    );
  });

  test('colors follow env, then NO_COLOR and FORCE_COLOR', () => {
    const error = new ConfigurationError('x');

    expect(new ErrorPresenter('dev').formatForCLI(error).colors).toBe(true);
    expect(new ErrorPresenter('prod').formatForCLI(error).colors).toBe(false);
    expect(new ErrorPresenter('prod', { colors: true }).formatForCLI(error).colors).toBe(
      true
    );

    process.env.NO_COLOR = '1';
    expect(new ErrorPresenter('dev', { colors: true }).formatForCLI(error).colors).toBe(
      false
    );

    process.env.NO_COLOR = '';
    process.env.FORCE_COLOR = '1';
    expect(new ErrorPresenter('prod').formatForCLI(error).colors).toBe(true);
  });

  test('formatForProduction omits stack and raw values', () => {
    const error = new GeometryError('bad', { operation: 'Range', value: [1, 2] });
    const prod = new ErrorPresenter('prod').formatForProduction(error);

    expect(prod.stack).toBeUndefined();
    expect(prod.context).toEqual({ operation: 'Range' });
    expect(prod.errorCode).toBe(ErrorCode.GEOMETRY_PRECONDITION);
  });
});
