import { describe, it, expect } from 'vitest';

import { CountingIssueCollector, ListIssueCollector } from '../collector.js';
import { createIssue, ISSUE_KINDS } from '../issue.js';
import { ValidationFailedError } from '../../types/errors.js';

const first = createIssue(ISSUE_KINDS.NODE_VALIDATION, 'first');
const second = createIssue(ISSUE_KINDS.NODE_REFERENCE, 'second');

describe('ListIssueCollector', () => {
  it('keeps issues in the order they were added', () => {
    const collector = new ListIssueCollector();
    collector.add(first);
    collector.addAll([second]);

    expect(collector.issues).toEqual([first, second]);
    expect(collector.isEmpty()).toBe(false);
  });

  it('check() passes when empty', () => {
    expect(() => new ListIssueCollector().check()).not.toThrow();
  });

  it('check() throws one aggregate error with every issue', () => {
    const collector = new ListIssueCollector();
    collector.addAll([first, second]);

    try {
      collector.check();
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationFailedError);
      if (error instanceof ValidationFailedError) {
        expect(error.issues).toEqual([first, second]);
        expect(error.message.startsWith('Validation failed with 2 issues:')).toBe(true);
      }
    }
  });

  it('clear() empties the list', () => {
    const collector = new ListIssueCollector();
    collector.add(first);
    collector.clear();

    expect(collector.isEmpty()).toBe(true);
    expect(collector.issues).toEqual([]);
  });
});

describe('CountingIssueCollector', () => {
  it('counts while forwarding', () => {
    const target = new ListIssueCollector();
    const counter = new CountingIssueCollector(target);
    counter.add(first);
    counter.add(second);

    expect(counter.count).toBe(2);
    expect(target.issues).toEqual([first, second]);
  });
});
