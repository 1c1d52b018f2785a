import { FORMATTING_ONLY_KEY, classifyFormatting } from '../grouping/formatting.js';
import { isGeneratedPath, isVendoredPath } from '../filters/deterministic.js';
import type { LineID } from '../types.js';
import type { PostProcessingHook } from './types.js';

export const formattingClassifier: PostProcessingHook = {
  name: 'formatting-classifier',
  phase: 'ingest',
  run: ({ session }) => {
    const tags: Record<LineID, string[]> = {};
    for (const id of classifyFormatting(session.diff, session.settings.analyzers)) {
      if (session.queue.isReviewable(id)) tags[id] = [FORMATTING_ONLY_KEY];
    }
    return { tags };
  },
};

export const vendorClassifier: PostProcessingHook = {
  name: 'vendor-classifier',
  phase: 'ingest',
  run: ({ session }) => {
    const tags: Record<LineID, string[]> = {};
    for (const path of session.queue.filesTouched()) {
      const fileTags: string[] = [];
      if (isVendoredPath(path)) fileTags.push('vendor');
      if (isGeneratedPath(path)) fileTags.push('generated');
      if (fileTags.length === 0) continue;
      for (const id of session.queue.linesInFile(path)) {
        tags[id] = [...fileTags];
      }
    }
    return { tags };
  },
};
