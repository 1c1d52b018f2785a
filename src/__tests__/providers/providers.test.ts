import { describe, it, expect, vi } from 'vitest';
import { Octokit } from '@octokit/rest';
import { createGitHubClient, findPullRequest, parseGitHubRemote } from '../../providers/github.js';
import { findTicketKey, ticketLink } from '../../providers/ticket.js';

type FetchInput = Parameters<typeof globalThis.fetch>[0];

describe('parseGitHubRemote', () => {
  it('reads ssh and https remotes', () => {
    expect(parseGitHubRemote('git@github.com:acme/widgets.git')).toEqual({ owner: 'acme', repo: 'widgets' });
    expect(parseGitHubRemote('https://github.com/acme/widgets')).toEqual({ owner: 'acme', repo: 'widgets' });
    expect(parseGitHubRemote('ssh://git@github.com/acme/widgets.git')).toEqual({ owner: 'acme', repo: 'widgets' });
  });

  it('returns null for other hosts', () => {
    expect(parseGitHubRemote('git@gitlab.com:acme/widgets.git')).toBeNull();
  });
});

describe('createGitHubClient', () => {
  it('needs a token', () => {
    expect(createGitHubClient(undefined)).toBeNull();
    expect(createGitHubClient('test-secret')).not.toBeNull();
  });
});

describe('findPullRequest', () => {
  function jsonResponse(status: number, body: unknown): Response {
    return new Response(JSON.stringify(body), {
      status,
      headers: { 'content-type': 'application/json' },
    });
  }

  it('summarises the open pull request of a branch', async () => {
    const fetch = vi.fn(async (_url: FetchInput) => jsonResponse(200, [{
      number: 42,
      title: ' PROJ-12 Add login ',
      body: null,
      html_url: 'https://github.com/acme/widgets/pull/42',
      base: { ref: 'main' },
      head: { ref: 'feature/login' },
    }]));
    const octokit = new Octokit({ auth: 'test-secret', request: { fetch } });

    const pr = await findPullRequest(octokit, { owner: 'acme', repo: 'widgets' }, 'feature/login');

    expect(fetch).toHaveBeenCalledTimes(1);
    const url = new URL(String(fetch.mock.calls[0][0]));
    expect(url.pathname).toBe('/repos/acme/widgets/pulls');
    expect(url.searchParams.get('head')).toBe('acme:feature/login');
    expect(url.searchParams.get('state')).toBe('open');
    expect(pr).toEqual({
      number: 42,
      title: 'PROJ-12 Add login',
      body: '',
      url: 'https://github.com/acme/widgets/pull/42',
      baseRef: 'main',
      headRef: 'feature/login',
    });
  });

  it('returns null when the branch has no open pull request', async () => {
    const fetch = vi.fn(async (_url: FetchInput) => jsonResponse(200, []));
    const octokit = new Octokit({ auth: 'test-secret', request: { fetch } });
    expect(await findPullRequest(octokit, { owner: 'acme', repo: 'widgets' }, 'main')).toBeNull();
  });

  it('returns null when the lookup fails', async () => {
    const fetch = vi.fn(async (_url: FetchInput) => jsonResponse(401, { message: 'Bad credentials' }));
    const octokit = new Octokit({ auth: 'test-secret', request: { fetch } });
    expect(await findPullRequest(octokit, { owner: 'acme', repo: 'widgets' }, 'main')).toBeNull();
  });
});

describe('tickets', () => {
  it('finds the first ticket key in any of the texts', () => {
    expect(findTicketKey(null, 'feature/PROJ-12-login', 'ABC-1')).toBe('PROJ-12');
    expect(findTicketKey('no ticket here', undefined)).toBeNull();
  });

  it('links a key to the configured site', () => {
    expect(ticketLink('PROJ-12', 'acme')).toBe('https://acme.atlassian.net/browse/PROJ-12');
    expect(ticketLink('PROJ-12')).toBe('PROJ-12');
  });
});
