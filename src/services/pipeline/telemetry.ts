/**
 * Anonymous telemetry
 *
 * Posts `{ name, url, domain, props }` events to a Plausible-style endpoint.
 * Props are limited to primitives and carry no names or URLs. Delivery is
 * fire-and-forget: failures are logged and never reach the caller.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/pipeline/telemetry
 */

import type { PipelineConfig } from './config.js';

const DELIVERY_TIMEOUT_MS = 5000;

export type TelemetryProps = Record<string, string | number | boolean>;

export interface TelemetrySink {
  track(name: string, props: TelemetryProps): Promise<void>;
}

export class TelemetryClient implements TelemetrySink {
  private readonly endpoint: string | undefined;
  private readonly domain: string;

  constructor(config: PipelineConfig['telemetry']) {
    this.endpoint = config.endpoint;
    this.domain = config.domain;
  }

  /**
   * Resolves once delivery finished or failed; never rejects.
   */
  async track(name: string, props: TelemetryProps): Promise<void> {
    if (!this.endpoint) return;

    const payload = JSON.stringify({
      name,
      url: `app://casefile-radar/${name}`,
      domain: this.domain,
      props: primitiveProps(props),
    });

    try {
      const response = await fetch(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: payload,
        signal: AbortSignal.timeout(DELIVERY_TIMEOUT_MS),
      });
      if (!response.ok) {
        console.error(`[Telemetry] ${name} rejected: HTTP ${response.status}`);
      }
    } catch (error) {
      console.error(
        `[Telemetry] ${name} not delivered: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}

/** Drops anything that is not a string, finite number or boolean */
function primitiveProps(props: TelemetryProps): TelemetryProps {
  const clean: TelemetryProps = {};
  for (const [key, value] of Object.entries(props)) {
    if (typeof value === 'string' || typeof value === 'boolean') {
      clean[key] = value;
    } else if (typeof value === 'number' && Number.isFinite(value)) {
      clean[key] = value;
    }
  }
  return clean;
}
