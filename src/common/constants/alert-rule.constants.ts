/**
 * Kind of telemetry point a rule watches:
 * T = telemetry, S = status, C = control, A = adjustment.
 */
export const DATA_TYPES = ['T', 'S', 'C', 'A'] as const;
export type DataType = (typeof DATA_TYPES)[number];

/** 1 = low, 2 = medium, 3 = high */
export const WARNING_LEVELS = [1, 2, 3] as const;
export type WarningLevel = (typeof WARNING_LEVELS)[number];

export const COMPARISON_OPERATORS = ['>', '<', '>=', '<=', '==', '!='] as const;
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

// Columns of the uniqueness constraint, in constraint order.
export const RULE_TUPLE_COLUMNS = ['channel_id', 'data_type', 'point_id', 'rule_name'] as const;

export const ALERT_RULE_TABLE = 'alert_rule';

export const ALERT_RULE_CHANGED_EVENT = 'alert-rule.changed';

export const MAX_PAGE_SIZE = 200;
