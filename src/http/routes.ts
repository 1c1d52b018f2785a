import express from 'express';
import type { Response } from 'express';
import { isSchemeName } from '../types.js';
import type { AppConfig } from '../config/config.js';
import { errorBody, httpStatusFor } from '../errors.js';
import { logger } from '../observability/logger.js';
import { InvalidSelectorError } from '../queue/errors.js';
import { isReviewMode } from '../resolution/engine.js';
import type { SessionManager } from '../session/manager.js';
import {
  deepDiveView,
  groupsView,
  nextView,
  overviewView,
  remainingView,
  statusView,
  testsView,
} from '../session/views.js';

const MAX_DIFF_BYTES = '10mb';

async function respond(res: Response, changeId: string, phase: string, work: () => Promise<unknown>): Promise<void> {
  try {
    const payload = await work();
    res.status(200).json(payload);
  } catch (error) {
    const status = httpStatusFor(error);
    const log = logger.forChange(changeId);
    (status >= 500 ? log.error : log.warn)(phase, 'Request failed', {
      status,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    res.status(status).json(errorBody(error));
  }
}

function field(body: unknown, name: string): string | undefined {
  if (typeof body !== 'object' || body === null || !(name in body)) return undefined;
  const value: unknown = Reflect.get(body, name);
  return typeof value === 'string' ? value : undefined;
}

export function createSessionRouter(manager: SessionManager, config: AppConfig): express.Router {
  const router = express.Router();

  router.post('/:changeId', express.text({ type: '*/*', limit: MAX_DIFF_BYTES }), async (req, res) => {
    const { changeId } = req.params;
    await respond(res, changeId, 'http_ingest', async () => {
      const body: unknown = req.body;
      const diffText = typeof body === 'string' ? body : '';
      const { session, reconciled } = await manager.ingest({ changeId, diffText });
      return { reconciled, status: statusView(session) };
    });
  });

  router.get('/:changeId/status', async (req, res) => {
    await respond(res, req.params.changeId, 'http_status', () => manager.read(req.params.changeId, statusView));
  });

  router.get('/:changeId/overview', async (req, res) => {
    await respond(res, req.params.changeId, 'http_overview', () =>
      manager.read(req.params.changeId, session => overviewView(session, config.jira.base))
    );
  });

  router.get('/:changeId/groups', async (req, res) => {
    const { changeId } = req.params;
    await respond(res, changeId, 'http_groups', async () => {
      const by = req.query.by;
      if (by !== undefined) {
        if (!isSchemeName(by)) {
          throw new InvalidSelectorError(`by=${String(by)}`, 'unknown grouping scheme');
        }
        await manager.setActiveScheme(changeId, by);
      }
      return manager.read(changeId, groupsView);
    });
  });

  router.get('/:changeId/next', async (req, res) => {
    await respond(res, req.params.changeId, 'http_next', () => manager.read(req.params.changeId, nextView));
  });

  router.get('/:changeId/remaining', async (req, res) => {
    await respond(res, req.params.changeId, 'http_remaining', () => manager.read(req.params.changeId, remainingView));
  });

  router.get('/:changeId/tests', async (req, res) => {
    await respond(res, req.params.changeId, 'http_tests', () => manager.read(req.params.changeId, testsView));
  });

  router.post('/:changeId/review', express.json(), async (req, res) => {
    const { changeId } = req.params;
    await respond(res, changeId, 'http_review', async () => {
      const body: unknown = req.body;
      const selector = field(body, 'selector');
      const mode = field(body, 'mode') ?? 'skim';
      if (!selector) {
        throw new InvalidSelectorError('body', 'expected { selector, mode }');
      }
      if (!isReviewMode(mode)) {
        throw new InvalidSelectorError(selector, `unknown mode ${mode}`);
      }
      const outcome = await manager.review(changeId, selector, mode);
      return { ...outcome, deepDive: await manager.read(changeId, deepDiveView) };
    });
  });

  router.post('/:changeId/reopen', express.json(), async (req, res) => {
    const { changeId } = req.params;
    await respond(res, changeId, 'http_reopen', async () => {
      const selector = field(req.body, 'selector');
      if (!selector) {
        throw new InvalidSelectorError('body', 'expected { selector }');
      }
      return manager.reopen(changeId, selector);
    });
  });

  router.get('/:changeId/deep', async (req, res) => {
    await respond(res, req.params.changeId, 'http_deep_status', () => manager.read(req.params.changeId, deepDiveView));
  });

  router.post('/:changeId/deep/confirm', async (req, res) => {
    const { changeId } = req.params;
    await respond(res, changeId, 'http_deep_confirm', async () => {
      const outcome = await manager.confirmDeepDive(changeId);
      return { ...outcome, deepDive: await manager.read(changeId, deepDiveView) };
    });
  });

  router.post('/:changeId/deep/cancel', async (req, res) => {
    const { changeId } = req.params;
    await respond(res, changeId, 'http_deep_cancel', async () => {
      const outcome = await manager.cancelDeepDive(changeId);
      return { ...outcome, deepDive: await manager.read(changeId, deepDiveView) };
    });
  });

  router.delete('/:changeId', async (req, res) => {
    const { changeId } = req.params;
    await respond(res, changeId, 'http_reset', async () => ({ removed: await manager.reset(changeId) }));
  });

  return router;
}
