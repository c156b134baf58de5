/**
 * Error classes thrown by the form core.
 */

export { InvalidStateTransitionError } from './state-machine';

export class ConfigurationError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid form configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
