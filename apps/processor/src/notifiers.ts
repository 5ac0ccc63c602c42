import { AlertSeverity, NotifyError, err, errorMessage, ok, type AlertEvent, type Result } from '@beacon/core';
import { componentLogger, type Logger } from './logger';

export interface AlertNotifier {
  readonly name: string;
  notify(event: AlertEvent): Promise<Result<void, NotifyError>>;
}

/**
 * Writes transitions to the process log: escalations to critical at error
 * level, other escalations at warn, recoveries at info.
 */
export class LogNotifier implements AlertNotifier {
  readonly name = 'log';
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? componentLogger('alerts');
  }

  async notify(event: AlertEvent): Promise<Result<void, NotifyError>> {
    const context = { group: event.group, from: event.from, to: event.to, rules: event.rules, values: event.values };
    if (event.to === AlertSeverity.CRITICAL) {
      this.logger.error(context, event.message);
    } else if (event.to === AlertSeverity.WARNING) {
      this.logger.warn(context, event.message);
    } else {
      this.logger.info(context, event.message);
    }
    return ok(undefined);
  }
}

export class WebhookNotifier implements AlertNotifier {
  readonly name = 'webhook';

  constructor(
    private readonly url: string,
    private readonly headers: Record<string, string> = {}
  ) {}

  async notify(event: AlertEvent): Promise<Result<void, NotifyError>> {
    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...this.headers },
        body: JSON.stringify(event),
      });
      if (!response.ok) {
        return err(new NotifyError(`Webhook responded ${response.status}`, { url: this.url, status: response.status }));
      }
      return ok(undefined);
    } catch (error) {
      return err(new NotifyError(`Webhook request failed: ${errorMessage(error)}`, { url: this.url }));
    }
  }
}
