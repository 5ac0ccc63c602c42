import { SinkError, err, errorMessage, ok, type ExportBatch, type Result } from '@beacon/core';
import type { ExportSink } from '../export-dispatcher';

export interface HttpSinkConfig {
  url: string;
  name?: string;
  headers?: Record<string, string>;
}

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * POSTs each batch as JSON. 408, 429, 5xx and network errors are transient;
 * any other non-2xx response rejects the batch.
 */
export class HttpSink implements ExportSink {
  readonly name: string;
  private readonly url: string;
  private readonly headers: Record<string, string>;

  constructor(config: HttpSinkConfig) {
    this.url = config.url;
    this.name = config.name ?? `http:${config.url}`;
    this.headers = {
      'Content-Type': 'application/json',
      ...config.headers,
    };
  }

  async push(batch: ExportBatch): Promise<Result<void, SinkError>> {
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify(batch),
      });
    } catch (error) {
      return err(SinkError.unavailable(`Request to ${this.url} failed: ${errorMessage(error)}`));
    }

    if (response.ok) {
      return ok(undefined);
    }

    const message = `Sink responded ${response.status} ${response.statusText}`.trim();
    const details = { url: this.url, status: response.status };
    return isTransientStatus(response.status)
      ? err(SinkError.unavailable(message, details))
      : err(SinkError.rejected(message, details));
  }
}
