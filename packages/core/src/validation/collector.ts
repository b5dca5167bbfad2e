import { ValidationFailedError } from '../types/errors.js';
import type { ValidationIssue } from './issue.js';

/** Write-only sink the constraints report into. */
export interface ValidationIssueCollector {
  add(issue: ValidationIssue): void;
}

/**
 * Ordered in-memory collector.
 */
export class ListIssueCollector implements ValidationIssueCollector {
  readonly #issues: ValidationIssue[] = [];

  add(issue: ValidationIssue): void {
    this.#issues.push(issue);
  }

  addAll(issues: Iterable<ValidationIssue>): void {
    for (const issue of issues) this.add(issue);
  }

  get issues(): readonly ValidationIssue[] {
    return this.#issues;
  }

  isEmpty(): boolean {
    return this.#issues.length === 0;
  }

  clear(): void {
    this.#issues.length = 0;
  }

  /**
   * @throws {ValidationFailedError} carrying every collected issue
   */
  check(): void {
    if (!this.isEmpty()) {
      throw new ValidationFailedError(this.#issues);
    }
  }
}

/**
 * Counts what passes through while forwarding to another collector.
 */
export class CountingIssueCollector implements ValidationIssueCollector {
  #count = 0;

  constructor(private readonly target: ValidationIssueCollector) {}

  get count(): number {
    return this.#count;
  }

  add(issue: ValidationIssue): void {
    this.#count++;
    this.target.add(issue);
  }
}
