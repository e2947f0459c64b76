import type { CheckKind, CheckNote, CheckResults, FindingOf, TableFact, TableRunResult } from '../types/quality';
import type { QueryCapability } from '../sources/types';
import { CHECK_REGISTRY } from './checks';
import type { AnyCheckDescriptor, CheckContext, CheckDescriptor } from './checks';
import { resolvePatterns } from './patterns';
import type { PatternOverrides } from './patterns';
import { resolveThresholds } from './severity';
import type { QualityThresholds } from './severity';
import { UNKNOWN_TIMEZONE } from './checks/timezone';
import { ConnectivityError, getErrorMessage, noteReasonFor } from '../utils/errors';
import { WorkGate, withTimeout } from '../utils/timeout';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('quality-engine');

export type EngineOptions = {
  catalog?: TableFact[];
  patterns?: PatternOverrides;
  thresholds?: Partial<QualityThresholds>;
  serverTimezone?: string;
  checkTimeoutMs?: number;
  registry?: AnyCheckDescriptor[];
};

export const emptyResults = (): CheckResults => ({
  controlled_value_candidate: [],
  nullable_but_never_null: [],
  missing_primary_key: [],
  missing_foreign_key: [],
  format_inconsistency: [],
  range_violation: [],
  delete_management: [],
  late_arriving_data: [],
  timezone: []
});

const storeFindings = <K extends CheckKind>(results: { [P in K]: FindingOf<P>[] }, kind: K, findings: FindingOf<K>[]) => {
  results[kind] = findings;
};

// Every query a check issues goes through its gate.
const gatedQuery = (query: QueryCapability, gate: WorkGate): QueryCapability => ({
  get capabilities() {
    return query.capabilities;
  },
  sampleRows: (table, columns, limit) => gate.run(() => query.sampleRows(table, columns, limit)),
  countOrphans: (probe, sampleLimit) => gate.run(() => query.countOrphans(probe, sampleLimit)),
  isCdcEnabled: table => gate.run(() => query.isCdcEnabled(table))
});

const execute = async <K extends CheckKind>(
  descriptor: CheckDescriptor<K>,
  ctx: CheckContext,
  gate: WorkGate,
  results: CheckResults,
  timeoutMs: number
) => {
  try {
    const findings = await withTimeout(descriptor.run(ctx), timeoutMs, `${descriptor.kind} on ${ctx.table.name}`);
    storeFindings(results, descriptor.kind, findings);
  } finally {
    // A timed-out check may still hold the connection; the next one waits for it.
    await gate.close();
  }
};

/**
 * Runs every registered check against one table. Checks execute one after
 * another on the shared query capability; a check that is unsupported, denied,
 * times out or throws leaves its key with an empty list and adds a note.
 */
export const runChecks = async (
  table: TableFact,
  query: QueryCapability,
  options: EngineOptions = {}
): Promise<TableRunResult> => {
  const registry = options.registry ?? CHECK_REGISTRY;
  const patterns = resolvePatterns(options.patterns);
  const thresholds = resolveThresholds(options.thresholds);
  const catalog = options.catalog ?? [table];
  const serverTimezone = options.serverTimezone ?? UNKNOWN_TIMEZONE;
  const timeoutMs = options.checkTimeoutMs ?? 0;

  const results = emptyResults();
  const notes: CheckNote[] = [];

  for (const [index, descriptor] of registry.entries()) {
    log.debug({ table: table.name, check: descriptor.kind }, `Check ${index + 1}/${registry.length}`);
    const missing = descriptor.requires.filter(capability => !query.capabilities[capability]);
    if (missing.length) {
      notes.push({ check: descriptor.kind, reason: 'unsupported', message: `Source lacks ${missing.join(', ')}` });
      continue;
    }

    const gate = new WorkGate(`${descriptor.kind} on ${table.name}`);
    const ctx: CheckContext = {
      table,
      catalog,
      query: gatedQuery(query, gate),
      patterns,
      thresholds,
      serverTimezone,
      note: (reason, message) => {
        if (gate.isOpen) notes.push({ check: descriptor.kind, reason, message });
      }
    };

    try {
      await execute(descriptor, ctx, gate, results, timeoutMs);
    } catch (err) {
      if (err instanceof ConnectivityError) throw err;
      const reason = noteReasonFor(err);
      notes.push({ check: descriptor.kind, reason, message: getErrorMessage(err) });
      log.warn({ table: table.name, check: descriptor.kind, reason, err: getErrorMessage(err) }, 'Check degraded to empty result');
    }
  }

  return { table, results, notes: [...notes] };
};
