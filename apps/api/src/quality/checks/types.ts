import type { CheckKind, CheckNote, FindingOf, TableFact } from '../../types/quality';
import type { Capability, QueryCapability } from '../../sources/types';
import type { PatternConfig } from '../patterns';
import type { QualityThresholds } from '../severity';

export type CheckContext = {
  table: TableFact;
  catalog: TableFact[];
  query: QueryCapability;
  patterns: PatternConfig;
  thresholds: QualityThresholds;
  serverTimezone: string;
  // Records a reduced-confidence note without failing the check.
  note: (reason: CheckNote['reason'], message: string) => void;
};

export type CheckDescriptor<K extends CheckKind> = {
  kind: K;
  title: string;
  requires: Capability[];
  run: (ctx: CheckContext) => Promise<FindingOf<K>[]>;
};

export type AnyCheckDescriptor = { [K in CheckKind]: CheckDescriptor<K> }[CheckKind];
