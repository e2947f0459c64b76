import type { AnyCheckDescriptor } from './types';
import {
  checkControlledValueCandidates,
  checkMissingForeignKeys,
  checkMissingPrimaryKey,
  checkNullableButNeverNull
} from './constraints';
import { checkFormatInconsistency, checkRangeViolations } from './values';
import { checkDeleteManagement } from './deletes';
import { checkLateArrivingData } from './lateArrival';
import { checkTimezone } from './timezone';

export const CHECK_REGISTRY: AnyCheckDescriptor[] = [
  {
    kind: 'controlled_value_candidate',
    title: 'Controlled value list candidates',
    requires: ['supportsConstraintIntrospection'],
    run: checkControlledValueCandidates
  },
  {
    kind: 'nullable_but_never_null',
    title: 'Nullable but never-null columns',
    requires: [],
    run: checkNullableButNeverNull
  },
  {
    kind: 'missing_primary_key',
    title: 'Missing primary keys',
    requires: ['supportsConstraintIntrospection'],
    run: checkMissingPrimaryKey
  },
  {
    kind: 'missing_foreign_key',
    title: 'Missing foreign keys & orphaned references',
    requires: ['supportsConstraintIntrospection'],
    run: checkMissingForeignKeys
  },
  {
    kind: 'format_inconsistency',
    title: 'Format inconsistencies',
    requires: ['supportsRowSampling'],
    run: checkFormatInconsistency
  },
  {
    kind: 'range_violation',
    title: 'Range / domain violations',
    requires: [],
    run: checkRangeViolations
  },
  {
    kind: 'delete_management',
    title: 'Delete management assessment',
    requires: [],
    run: checkDeleteManagement
  },
  {
    kind: 'late_arriving_data',
    title: 'Late-arriving data assessment',
    requires: ['supportsRowSampling'],
    run: checkLateArrivingData
  },
  {
    kind: 'timezone',
    title: 'Timezone assessment',
    requires: [],
    run: checkTimezone
  }
];

export type { AnyCheckDescriptor, CheckContext, CheckDescriptor } from './types';
