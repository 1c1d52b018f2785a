import { createDefaultRegistry } from '../../analyzers/registry.js';
import { postImageLineId } from '../../diff/line-id.js';
import { formattingClassifier, vendorClassifier } from '../../hooks/classifiers.js';
import { HookRegistry } from '../../hooks/registry.js';
import { DEFAULT_WEIGHTS } from '../../prioritizer/types.js';
import { SessionManager } from '../../session/manager.js';
import type { SessionStore } from '../../persistence/types.js';
import { createSession } from '../../session/session.js';
import type { SessionOptions } from '../../session/session.js';
import { InMemorySessionStore } from '../../session/store.js';
import type { ReviewSession, SessionSettings } from '../../session/types.js';
import type { LineID, SchemeName } from '../../types.js';
import type { CommitAttribution, CommitRef } from '../../grouping/types.js';

/**
 * Two files. `src/app.ts` adds lines 2, 3, 4 (first hunk) and 13 (second
 * hunk, inside `class Service`); `README.md` adds line 2.
 */
export const APP_DIFF = [
  'diff --git a/src/app.ts b/src/app.ts',
  'index 1111111..2222222 100644',
  '--- a/src/app.ts',
  '+++ b/src/app.ts',
  '@@ -1,3 +1,5 @@',
  " import { a } from './a';",
  '-const x = 1;',
  '+const x = 2;',
  '+export function run(n: number) {',
  '+  if (n > 0 && x) return n;',
  ' }',
  '@@ -10,2 +12,3 @@ export class Service {',
  ' const y = 3;',
  '+const z = 4;',
  ' const w = 5;',
  'diff --git a/README.md b/README.md',
  '--- a/README.md',
  '+++ b/README.md',
  '@@ -1 +1,2 @@',
  ' # Title',
  '+More docs',
  '',
].join('\n');

/** APP_DIFF with `src/app.ts` line 13 changed and a new line 3 in README.md. */
export const APP_DIFF_REFRESHED = [
  'diff --git a/src/app.ts b/src/app.ts',
  '--- a/src/app.ts',
  '+++ b/src/app.ts',
  '@@ -1,3 +1,5 @@',
  " import { a } from './a';",
  '-const x = 1;',
  '+const x = 2;',
  '+export function run(n: number) {',
  '+  if (n > 0 && x) return n;',
  ' }',
  '@@ -10,2 +12,3 @@ export class Service {',
  ' const y = 3;',
  '+const z = 40;',
  ' const w = 5;',
  'diff --git a/README.md b/README.md',
  '--- a/README.md',
  '+++ b/README.md',
  '@@ -1 +1,3 @@',
  ' # Title',
  '+More docs',
  '+Even more',
  '',
].join('\n');

/** One whitespace-only rewrite and one real change in the same block. */
export const FORMATTING_DIFF = [
  'diff --git a/lib/util.ts b/lib/util.ts',
  '--- a/lib/util.ts',
  '+++ b/lib/util.ts',
  '@@ -1,2 +1,2 @@',
  '-const a=1;',
  '-const b = 2;',
  '+const a = 1;',
  '+const b = 3;',
  'diff --git a/vendor/dep.js b/vendor/dep.js',
  '--- a/vendor/dep.js',
  '+++ b/vendor/dep.js',
  '@@ -0,0 +1 @@',
  '+module.exports = 1;',
  '',
].join('\n');

export function appLine(line: number): LineID {
  return postImageLineId('src/app.ts', line);
}

export function readmeLine(line: number): LineID {
  return postImageLineId('README.md', line);
}

export function testSettings(): SessionSettings {
  return {
    weights: DEFAULT_WEIGHTS,
    coChangeThreshold: 2,
    analyzers: createDefaultRegistry(),
  };
}

export function testHooks(): HookRegistry {
  return new HookRegistry().register(formattingClassifier).register(vendorClassifier);
}

export function sessionOptions(overrides: Partial<SessionOptions> = {}): SessionOptions {
  return {
    settings: testSettings(),
    defaultScheme: 'file-type',
    hooks: testHooks(),
    ...overrides,
  };
}

export function buildSession(
  diffText: string = APP_DIFF,
  overrides: Partial<SessionOptions> = {}
): Promise<ReviewSession> {
  return createSession('feature-x', diffText, sessionOptions(overrides));
}

export function createManager(
  store: SessionStore = new InMemorySessionStore(),
  defaultScheme: SchemeName = 'file-type',
  hooks: HookRegistry = testHooks()
): SessionManager {
  return new SessionManager({ store, hooks, settings: testSettings(), defaultScheme });
}

/** A new file whose lines are all added. */
export function addedFileDiff(path: string, lines: readonly string[]): string {
  return [
    `diff --git a/${path} b/${path}`,
    'new file mode 100644',
    '--- /dev/null',
    `+++ b/${path}`,
    `@@ -0,0 +1,${lines.length} @@`,
    ...lines.map(line => `+${line}`),
  ].join('\n');
}

function numbered(count: number, line: (n: number) => string): string[] {
  return Array.from({ length: count }, (_, index) => line(index + 1));
}

/** Four new files with 87, 61, 102 and 4 reviewable lines (254 in all). */
export const RELEASE_FILES = {
  login: 'src/auth/login.ts',
  session: 'src/auth/session.ts',
  twoFactor: 'tests/two-factor.test.ts',
  logging: 'docs/logging.md',
} as const;

export const RELEASE_DIFF = [
  addedFileDiff(RELEASE_FILES.login, numbered(87, n => `export const loginStep${n} = ${n};`)),
  addedFileDiff(RELEASE_FILES.session, numbered(61, n => `export const sessionKey${n} = 'key-${n}';`)),
  addedFileDiff(RELEASE_FILES.twoFactor, numbered(102, n => `it('checks code ${n}', () => expect(${n}).toBe(${n}));`)),
  addedFileDiff(RELEASE_FILES.logging, numbered(4, n => `Logging note ${n}.`)),
  '',
].join('\n');

/** Commit attribution for RELEASE_DIFF: login lines 1-67, every two-factor test, every logging doc line. */
export function releaseCommits(): CommitAttribution {
  const attribute = (count: number, commit: CommitRef): Record<number, CommitRef> => {
    const lines: Record<number, CommitRef> = {};
    for (let n = 1; n <= count; n++) lines[n] = commit;
    return lines;
  };

  return {
    lines: {
      [RELEASE_FILES.login]: attribute(67, { sha: 'c'.repeat(40), summary: 'login-flow' }),
      [RELEASE_FILES.twoFactor]: attribute(102, { sha: 'd'.repeat(40), summary: '2FA-tests' }),
      [RELEASE_FILES.logging]: attribute(4, { sha: 'e'.repeat(40), summary: 'logging-utils' }),
    },
  };
}

/** One file changed in three hunks, two added lines each. */
export const THREE_HUNK_FILE = 'core/auth.ts';

export const THREE_HUNK_DIFF = [
  `diff --git a/${THREE_HUNK_FILE} b/${THREE_HUNK_FILE}`,
  `--- a/${THREE_HUNK_FILE}`,
  `+++ b/${THREE_HUNK_FILE}`,
  '@@ -1,2 +1,4 @@',
  ' const first = 1;',
  '+const firstA = 1;',
  '+const firstB = 1;',
  ' const second = 2;',
  '@@ -20,2 +22,4 @@',
  ' const third = 3;',
  '+const thirdA = 3;',
  '+const thirdB = 3;',
  ' const fourth = 4;',
  '@@ -40,2 +44,4 @@',
  ' const fifth = 5;',
  '+const fifthA = 5;',
  '+const fifthB = 5;',
  ' const sixth = 6;',
  '',
].join('\n');

/**
 * A whitespace-only rewrite of three lines, then a ten-line insertion that
 * includes a comment line and a blank line.
 */
export const REINDENT_DIFF = [
  'diff --git a/lib/math.ts b/lib/math.ts',
  '--- a/lib/math.ts',
  '+++ b/lib/math.ts',
  '@@ -1,5 +1,5 @@',
  ' export function add(a: number, b: number) {',
  '-    const sum = a+b;',
  '-    if (sum > 10) return 10;',
  '-    return sum;',
  '+  const sum = a + b;',
  '+  if (sum > 10) return 10;',
  '+  return sum;',
  ' }',
  '@@ -10,1 +10,11 @@',
  ' export const ZERO = 0;',
  '+// clamps to the unit range',
  '+export function clamp(value: number) {',
  '+  if (value < 0) return 0;',
  '+  if (value > 1) return 1;',
  '+  return value;',
  '+}',
  '+',
  '+export function double(value: number) {',
  '+  return value * 2;',
  '+}',
  '',
].join('\n');
