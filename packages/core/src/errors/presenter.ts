/**
 * ErrorPresenter - pure presentation layer for ShardCheckError instances
 */

import type { ErrorCode } from './codes.js';
import type {
  ErrorContext,
  SerializedError,
  ShardCheckError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  excerpt?: string;
  workaround?: string;
  details?: string;
  colors: boolean;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: ShardCheckError): CLIErrorView {
    const [title, ...rest] = error.message.split('\n');
    const details = rest.join('\n').trim();
    return {
      title: `Error ${error.errorCode}: ${title ?? ''}`,
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      excerpt: error.context?.valueExcerpt,
      workaround: this.#formatWorkaround(error),
      details: details.length > 0 ? details : undefined,
      colors: this.#shouldUseColors(this.options.colors),
    };
  }

  formatForProduction(error: ShardCheckError): SerializedError {
    return error.toJSON('prod');
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    const loc = ctx.path ?? ctx.nodeId;
    return loc ? `Location: ${loc}` : undefined;
  }

  #formatWorkaround(error: ShardCheckError): string | undefined {
    if (Array.isArray(error.suggestions) && error.suggestions.length > 0) {
      return error.suggestions[0];
    }
    return error.context?.suggestion;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }
}

export default ErrorPresenter;
