import { describe, it, expect } from 'vitest';
import { pullRequestMetadata } from '../../git/collect.js';
import type { PullRequestSummary } from '../../providers/github.js';

const pr: PullRequestSummary = {
  number: 7,
  title: 'Add login form',
  body: 'Implements the form.\n\nTracks PROJ-42.',
  url: 'https://github.com/acme/shop/pull/7',
  baseRef: 'main',
  headRef: 'feature/login',
};

describe('pullRequestMetadata', () => {
  it('keeps the description and finds the ticket key in it', () => {
    expect(pullRequestMetadata(pr)).toEqual({
      title: 'Add login form',
      body: 'Implements the form.\n\nTracks PROJ-42.',
      ticketKey: 'PROJ-42',
    });
  });

  it('prefers a key in the title and drops an empty description', () => {
    expect(pullRequestMetadata({ ...pr, title: 'OPS-3 Add login form', body: '' })).toEqual({
      title: 'OPS-3 Add login form',
      body: undefined,
      ticketKey: 'OPS-3',
    });
  });
});
