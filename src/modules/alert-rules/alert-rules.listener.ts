import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { ALERT_RULE_CHANGED_EVENT } from '../../common/constants/alert-rule.constants';
import { AlertRuleChangedEvent } from '../../common/interfaces/alert-rule-events.interface';

@Injectable()
export class AlertRulesListener {
  private readonly logger = new Logger(AlertRulesListener.name);

  @OnEvent(ALERT_RULE_CHANGED_EVENT)
  handleRuleChanged(event: AlertRuleChangedEvent) {
    this.logger.log(
      `Audit: rule ${event.ruleId} "${event.ruleName}" (channel ${event.channelId}) ${event.action} at ${event.timestamp.toISOString()}`,
    );
  }
}
