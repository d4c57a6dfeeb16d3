/**
 * PricingRunService - end-to-end pricing of one generated estimate
 *
 * Matches priceable items against the KB on a bounded queue, rolls amounts
 * up the item tree, numbers the items and verifies the result. The engine
 * stages are pure; this service owns concurrency, cancellation and logging.
 */

import { randomUUID } from 'crypto';
import PQueue from 'p-queue';
import { setImmediate as yieldToEventLoop } from 'timers/promises';
import { extractBuildingMetrics } from '@shared/estimate/buildingMetrics';
import { DEFAULT_DICTIONARY } from '@shared/estimate/dictionary';
import { verifyEstimate } from '@shared/estimate/estimateVerifier';
import { countBySeverity, FINDING_CODES, itemPath, warningFinding, type Finding } from '@shared/estimate/findings';
import { assignItemNumbers, orphanedAmountFindings } from '@shared/estimate/itemTree';
import {
  isPriceable,
  matchItem,
  type EnrichmentResult,
  type ItemMatchOutcome,
  type MatchThresholds,
} from '@shared/estimate/priceMatcher';
import type { EstimatingDictionary } from '@shared/estimate/schema';
import type {
  BuildingMetrics,
  EstimateLineItem,
  MatchResult,
  MatchTier,
  PriceKBEntry,
  ReferenceItem,
  VerificationResult,
} from '@shared/estimate/types';
import { rollupEstimate } from '@shared/rollups/estimateRollup';
import type { EstimatingConfig } from '../../config';
import { logger, type ContextLogger } from '../../logger';

// ============================================================================
// Types
// ============================================================================

export type PricingRunInput = {
  items: readonly EstimateLineItem[];
  kb: readonly PriceKBEntry[];
  references?: readonly ReferenceItem[] | null;
  /** takes precedence over metrics extracted from specText */
  metrics?: BuildingMetrics | null;
  specText?: string | null;
};

export type PricingRunOptions = {
  runId?: string;
  signal?: AbortSignal;
};

export type PricingServiceDeps = {
  dictionary?: EstimatingDictionary;
  thresholds?: Partial<MatchThresholds>;
  concurrency?: number;
  log?: ContextLogger;
};

export type ParallelEnrichmentResult = EnrichmentResult & {
  /** ids of priceable items never submitted because the run was aborted */
  cancelled: string[];
};

export type PricingRunReport = {
  runId: string;
  items: EstimateLineItem[];
  results: MatchResult[];
  findings: Finding[];
  verification: VerificationResult;
  tierCounts: Record<MatchTier, number>;
  appliedCount: number;
  cancelledCount: number;
  grandTotal: number;
};

// ============================================================================
// Service
// ============================================================================

export class PricingRunService {
  private readonly dictionary: EstimatingDictionary;
  private readonly thresholds: Partial<MatchThresholds>;
  private readonly concurrency: number;
  private readonly log: ContextLogger;

  constructor(deps: PricingServiceDeps = {}) {
    this.dictionary = deps.dictionary ?? DEFAULT_DICTIONARY;
    this.thresholds = deps.thresholds ?? {};
    this.concurrency = Math.max(1, deps.concurrency ?? 1);
    this.log = deps.log ?? logger;
  }

  static fromConfig(config: EstimatingConfig, dictionary: EstimatingDictionary = DEFAULT_DICTIONARY): PricingRunService {
    return new PricingRunService({ dictionary, thresholds: config.thresholds, concurrency: config.concurrency });
  }

  /**
   * Match every priceable item on a bounded queue. Each task writes only its
   * own slot, so output order follows input order. Once `signal` aborts, no
   * further items are matched; they pass through untouched and are reported
   * as cancelled.
   */
  async matchAll(
    items: readonly EstimateLineItem[],
    kb: readonly PriceKBEntry[],
    signal?: AbortSignal
  ): Promise<ParallelEnrichmentResult> {
    const queue = new PQueue({ concurrency: this.concurrency });
    const slots: Array<ItemMatchOutcome | 'cancelled' | undefined> = new Array(items.length).fill(undefined);

    const tasks = items.map((item, index) => {
      if (!isPriceable(item)) return Promise.resolve();
      return queue.add(async () => {
        // matching is synchronous; yield so a pending abort can land between items
        await yieldToEventLoop();
        if (signal?.aborted) {
          slots[index] = 'cancelled';
          return;
        }
        slots[index] = matchItem(item, kb, { dictionary: this.dictionary, thresholds: this.thresholds, index });
      });
    });
    await Promise.all(tasks);

    const out: EstimateLineItem[] = [];
    const results: MatchResult[] = [];
    const findings: Finding[] = [];
    const cancelled: string[] = [];

    items.forEach((item, index) => {
      const slot = slots[index];
      if (slot === undefined) {
        out.push(item);
      } else if (slot === 'cancelled') {
        out.push(item);
        cancelled.push(item.id);
        findings.push(
          warningFinding({
            code: FINDING_CODES.matchCancelled,
            message: `Matching for "${item.name}" was cancelled before it started`,
            path: itemPath(index),
            entityId: item.id,
          })
        );
      } else {
        out.push(slot.item);
        results.push(slot.result);
        findings.push(...slot.findings);
      }
    });

    return { items: out, results, findings, cancelled };
  }

  /**
   * Match, roll up, number and verify one estimate.
   */
  async run(input: PricingRunInput, options: PricingRunOptions = {}): Promise<PricingRunReport> {
    const runId = options.runId ?? randomUUID();
    const runLog = bindRun(this.log, runId);

    runLog.info('Pricing run started', {
      items: input.items.length,
      kbEntries: input.kb.length,
      references: input.references?.length ?? 0,
      concurrency: this.concurrency,
    });

    // Step 1: Leaf pricing
    const matched = await this.matchAll(input.items, input.kb, options.signal);
    const tierCounts = countTiers(matched.results);
    const appliedCount = matched.results.filter((r) => r.applied).length;
    runLog.info('Matching finished', { stage: 'match', ...tierCounts, applied: appliedCount, cancelled: matched.cancelled.length });

    // Step 2: Subtotals and numbering
    const rollup = rollupEstimate(matched.items);
    const numbered = assignItemNumbers(rollup.items, rollup.tree);
    if (rollup.findings.length > 0) {
      runLog.warn('Malformed hierarchy', { stage: 'rollup', malformed: rollup.tree.malformed.length });
    }

    // Step 3: Verification
    const metrics = input.metrics ?? (input.specText ? extractBuildingMetrics(input.specText, this.dictionary) : null);
    const verification = verifyEstimate(numbered, {
      dictionary: this.dictionary,
      references: input.references,
      metrics,
      tree: rollup.tree,
    });

    const findings = [
      ...matched.findings,
      ...rollup.findings,
      ...orphanedAmountFindings(rollup.tree, numbered),
      ...verification.findings,
    ];

    runLog.info('Pricing run finished', {
      stage: 'verify',
      grandTotal: rollup.grandTotal,
      matchRate: verification.result.summary.matchRate,
      issues: verification.result.summary.issueCount,
      findings: countBySeverity(findings),
    });

    return {
      runId,
      items: numbered,
      results: matched.results,
      findings,
      verification: verification.result,
      tierCounts,
      appliedCount,
      cancelledCount: matched.cancelled.length,
      grandTotal: rollup.grandTotal,
    };
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

function bindRun(log: ContextLogger, runId: string): ContextLogger {
  return {
    debug: (message, context = {}) => log.debug(message, { runId, ...context }),
    info: (message, context = {}) => log.info(message, { runId, ...context }),
    warn: (message, context = {}) => log.warn(message, { runId, ...context }),
    error: (message, context = {}) => log.error(message, { runId, ...context }),
  };
}

export function countTiers(results: readonly MatchResult[]): Record<MatchTier, number> {
  const counts: Record<MatchTier, number> = { exact: 0, partial: 0, 'category-fallback': 0, none: 0 };
  for (const r of results) counts[r.tier] += 1;
  return counts;
}
