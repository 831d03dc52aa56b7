import { Entity, PrimaryGeneratedColumn, Column, Unique, Check, Index } from 'typeorm';
import {
  ALERT_RULE_TABLE,
  ComparisonOperator,
  DataType,
  WarningLevel,
} from '../../common/constants/alert-rule.constants';
import { epochMillisTransformer } from '../transformers/epoch-millis.transformer';

// Schema is owned by the migrations; these decorators mirror it for TypeORM metadata.
@Entity(ALERT_RULE_TABLE)
@Unique('uq_alert_rule_tuple', ['channel_id', 'data_type', 'point_id', 'rule_name'])
@Check('ck_alert_rule_data_type', `"data_type" IN ('T', 'S', 'C', 'A')`)
@Check('ck_alert_rule_warning_level', `"warning_level" IN (1, 2, 3)`)
@Check('ck_alert_rule_operator', `"operator" IN ('>', '<', '>=', '<=', '==', '!=')`)
@Index('idx_alert_rule_channel_type_point', ['channel_id', 'data_type', 'point_id'])
export class AlertRule {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column('integer')
  channel_id!: number;

  @Column('text')
  data_type!: DataType;

  @Column('integer')
  point_id!: number;

  @Column('text')
  rule_name!: string;

  @Index('idx_alert_rule_warning_level')
  @Column('integer')
  warning_level!: WarningLevel;

  @Column('text')
  operator!: ComparisonOperator;

  @Column('real')
  value!: number;

  @Index('idx_alert_rule_enabled')
  @Column('boolean', { default: true })
  enabled!: boolean;

  @Column('text', { default: '' })
  description!: string;

  @Index('idx_alert_rule_created_at')
  @Column('integer', { transformer: epochMillisTransformer })
  created_at!: Date;

  @Column('integer', { transformer: epochMillisTransformer })
  updated_at!: Date;
}
