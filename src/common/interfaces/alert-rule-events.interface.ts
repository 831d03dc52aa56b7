export type AlertRuleChangeAction = 'created' | 'updated' | 'enabled' | 'disabled' | 'deleted';

export interface AlertRuleChangedEvent {
  action: AlertRuleChangeAction;
  ruleId: number;
  channelId: number;
  ruleName: string;
  timestamp: Date;
}
