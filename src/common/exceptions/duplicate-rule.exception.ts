import { DataType } from '../constants/alert-rule.constants';

export interface RuleTuple {
  channel_id: number;
  data_type: DataType;
  point_id: number;
  rule_name: string;
}

export class DuplicateRuleException extends Error {
  readonly tuple: RuleTuple;

  constructor(tuple: RuleTuple) {
    super(
      `Rule "${tuple.rule_name}" already exists for channel ${tuple.channel_id}, ` +
        `data type ${tuple.data_type}, point ${tuple.point_id}`,
    );
    this.name = 'DuplicateRuleException';
    this.tuple = tuple;
  }
}
