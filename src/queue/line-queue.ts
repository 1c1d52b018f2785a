import type { DiffLine, LineID, LineStatus, ParsedDiff, StatusBreakdown } from '../types.js';
import { canTransition } from './transitions.js';
import { InvalidSelectorError } from './errors.js';
import { enforceInvariants } from '../invariants/checker.js';
import { logger } from '../observability/logger.js';

export interface QueueEntry {
  line: DiffLine;
  status: LineStatus;
}

export interface BulkResult {
  target: LineStatus;
  changed: LineID[];
  unchanged: LineID[];
}

export type StatusSnapshot = Record<LineID, LineStatus>;

function emptyBreakdown(total: number): StatusBreakdown {
  return { UNREVIEWED: 0, SKIMMED: 0, DEEP_REVIEWED: 0, FILTERED: 0, total };
}

/**
 * Canonical review-state store. Holds one entry per reviewable line, in diff
 * order; context and removed lines are known but never counted.
 */
export class LineQueue {
  private readonly entries = new Map<LineID, QueueEntry>();
  private readonly byFile = new Map<string, LineID[]>();
  private readonly nonReviewable = new Set<LineID>();
  private counts: StatusBreakdown;

  constructor(diff: ParsedDiff, prior?: ReadonlyMap<LineID, LineStatus>) {
    for (const file of diff.files) {
      for (const hunk of file.hunks) {
        for (const line of hunk.lines) {
          if (file.binary || line.kind !== 'added') {
            this.nonReviewable.add(line.id);
            continue;
          }
          this.entries.set(line.id, { line, status: prior?.get(line.id) ?? 'UNREVIEWED' });
          const ids = this.byFile.get(file.path);
          if (ids) {
            ids.push(line.id);
          } else {
            this.byFile.set(file.path, [line.id]);
          }
        }
      }
    }

    this.counts = this.recount();
    this.checkInvariants();
  }

  get total(): number {
    return this.entries.size;
  }

  remainingCount(): number {
    return this.counts.UNREVIEWED;
  }

  breakdown(): StatusBreakdown {
    return { ...this.counts };
  }

  isReviewable(id: LineID): boolean {
    return this.entries.has(id);
  }

  status(id: LineID): LineStatus | undefined {
    return this.entries.get(id)?.status;
  }

  line(id: LineID): DiffLine | undefined {
    return this.entries.get(id)?.line;
  }

  reviewableIds(): LineID[] {
    return Array.from(this.entries.keys());
  }

  linesInFile(filePath: string): LineID[] {
    return [...(this.byFile.get(filePath) ?? [])];
  }

  linesWithStatus(status: LineStatus): LineID[] {
    const result: LineID[] = [];
    for (const [id, entry] of this.entries) {
      if (entry.status === status) result.push(id);
    }
    return result;
  }

  /** Paths of files with at least one reviewable line, in diff order. */
  filesTouched(): string[] {
    return Array.from(this.byFile.keys());
  }

  filesWithRemaining(): string[] {
    return this.filesTouched().filter(path =>
      (this.byFile.get(path) ?? []).some(id => this.entries.get(id)?.status === 'UNREVIEWED')
    );
  }

  /**
   * Move every line in `ids` towards `target`. All IDs are validated first;
   * one unknown or non-reviewable ID rejects the whole call with no change.
   * Lines already at the target, or with no allowed transition to it, are
   * reported as unchanged.
   */
  applyBulk(ids: readonly LineID[], target: LineStatus, selector: string = 'lines'): BulkResult {
    const offending = ids.filter(id => !this.entries.has(id));
    if (offending.length > 0) {
      const unknown = offending.filter(id => !this.nonReviewable.has(id));
      const reason = unknown.length > 0
        ? `${unknown.length} unknown line id(s)`
        : `${offending.length} line(s) are not reviewable`;
      logger.warn('queue_bulk_rejected', 'Bulk transition rejected', {
        selector,
        target,
        offending: offending.length,
      });
      throw new InvalidSelectorError(selector, reason, offending);
    }

    const changed: LineID[] = [];
    const unchanged: LineID[] = [];
    const seen = new Set<LineID>();

    for (const id of ids) {
      if (seen.has(id)) continue;
      seen.add(id);
      const entry = this.entries.get(id);
      if (!entry) continue;
      if (entry.status !== target && canTransition(entry.status, target)) {
        this.counts[entry.status]--;
        this.counts[target]++;
        entry.status = target;
        changed.push(id);
      } else {
        unchanged.push(id);
      }
    }

    this.checkInvariants();

    logger.debug('queue_bulk_applied', 'Bulk transition applied', {
      selector,
      target,
      changed: changed.length,
      unchanged: unchanged.length,
      remaining: this.counts.UNREVIEWED,
    });

    return { target, changed, unchanged };
  }

  snapshot(): StatusSnapshot {
    const result: StatusSnapshot = {};
    for (const [id, entry] of this.entries) {
      result[id] = entry.status;
    }
    return result;
  }

  statusMap(): Map<LineID, LineStatus> {
    return new Map(Object.entries(this.snapshot()));
  }

  /** Put back statuses captured by `snapshot()`; IDs not in the queue are ignored. */
  restore(snapshot: StatusSnapshot): void {
    for (const [id, entry] of this.entries) {
      const status = snapshot[id];
      if (status !== undefined) entry.status = status;
    }
    this.counts = this.recount();
    this.checkInvariants();
  }

  private recount(): StatusBreakdown {
    const counts = emptyBreakdown(this.entries.size);
    for (const entry of this.entries.values()) {
      counts[entry.status]++;
    }
    return counts;
  }

  private checkInvariants(): void {
    enforceInvariants({ kind: 'queue', breakdown: this.counts, totalReviewable: this.entries.size });
  }
}

export function percentReviewed(breakdown: StatusBreakdown): number {
  if (breakdown.total === 0) return 100;
  const resolved = breakdown.total - breakdown.UNREVIEWED;
  return Math.floor((resolved / breakdown.total) * 100);
}
