export class RuleNotFoundException extends Error {
  readonly ruleId: number;

  constructor(ruleId: number) {
    super(`Alert rule with ID ${ruleId} not found`);
    this.name = 'RuleNotFoundException';
    this.ruleId = ruleId;
  }
}
