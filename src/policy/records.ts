import type { ConditionGroup, ConditionRecord, ConditionRecordDocument } from '../types.js';

/** Converts condition groups to their wire form, `{ conditionGroups: [[{ index, field, operator, value }]] }`. */
export function toConditionRecords(groups: readonly ConditionGroup[]): ConditionRecordDocument {
  return {
    conditionGroups: groups.map((group) =>
      group.map((condition) => ({
        index: condition.indexPath,
        field: condition.field,
        operator: condition.operator,
        value: condition.valueToken,
      })),
    ),
  };
}

/**
 * Converts wire-form records back to condition groups. The iterator variable
 * is not part of the wire form and decodes as an empty string. Empty groups
 * are dropped.
 */
export function fromConditionRecords(document: ConditionRecordDocument): ConditionGroup[] {
  return document.conditionGroups
    .filter((group) => group.length > 0)
    .map((group) =>
      group.map((record: ConditionRecord) => ({
        iteratorVar: '',
        indexPath: record.index,
        field: record.field,
        operator: record.operator,
        valueToken: record.value,
      })),
    );
}
