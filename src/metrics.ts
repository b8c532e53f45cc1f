import { monitorEventLoopDelay } from 'node:perf_hooks';
import type { HandshakeErrorCode } from './handshake/errors.js';

export type HandshakeFailureReason = HandshakeErrorCode | 'Timeout' | 'Internal';

function toFiniteNumber(value: number, fallback = 0): number {
  if (!Number.isFinite(value)) {
    return fallback;
  }
  return value;
}

function nowIso(): string {
  return new Date().toISOString();
}

function formatMetricLine(name: string, labels: Record<string, string> | null, value: number): string {
  if (!labels || Object.keys(labels).length === 0) {
    return `${name} ${value}`;
  }
  const formattedLabels = Object.entries(labels)
    .map(([key, labelValue]) => `${key}="${labelValue.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`)
    .join(',');
  return `${name}{${formattedLabels}} ${value}`;
}

export interface HandshakeCounters {
  accepted: number;
  rejected: number;
  inFlight: number;
  failures: Record<string, number>;
  extensions: Record<string, number>;
}

export class MetricsRegistry {
  private readonly eventLoopDelay = monitorEventLoopDelay({ resolution: 20 });
  private accepted = 0;
  private rejected = 0;
  private inFlight = 0;
  private readonly failures = new Map<HandshakeFailureReason, number>();
  private readonly extensions = new Map<string, number>();
  private readonly startedAt = Date.now();

  constructor() {
    this.eventLoopDelay.enable();
  }

  dispose(): void {
    this.eventLoopDelay.disable();
  }

  handshakeStarted(): void {
    this.inFlight += 1;
  }

  handshakeAccepted(extensionNames: readonly string[]): void {
    this.inFlight = Math.max(0, this.inFlight - 1);
    this.accepted += 1;
    for (const name of extensionNames) {
      this.extensions.set(name, (this.extensions.get(name) ?? 0) + 1);
    }
  }

  handshakeRejected(): void {
    this.inFlight = Math.max(0, this.inFlight - 1);
    this.rejected += 1;
  }

  handshakeFailed(reason: HandshakeFailureReason): void {
    this.inFlight = Math.max(0, this.inFlight - 1);
    this.failures.set(reason, (this.failures.get(reason) ?? 0) + 1);
  }

  getCounters(): HandshakeCounters {
    return {
      accepted: this.accepted,
      rejected: this.rejected,
      inFlight: this.inFlight,
      failures: Object.fromEntries(this.failures),
      extensions: Object.fromEntries(this.extensions)
    };
  }

  getEventLoopLagMs(): { p50: number; p95: number; p99: number } {
    const p50 = toFiniteNumber(this.eventLoopDelay.percentile(50) / 1_000_000, 0);
    const p95 = toFiniteNumber(this.eventLoopDelay.percentile(95) / 1_000_000, 0);
    const p99 = toFiniteNumber(this.eventLoopDelay.percentile(99) / 1_000_000, 0);
    return {
      p50: Number(p50.toFixed(3)),
      p95: Number(p95.toFixed(3)),
      p99: Number(p99.toFixed(3))
    };
  }

  getHealthSnapshot(): {
    timestamp: string;
    uptimeSec: number;
    handshakes: HandshakeCounters;
    eventLoopLagMs: {
      p50: number;
      p95: number;
      p99: number;
    };
  } {
    return {
      timestamp: nowIso(),
      uptimeSec: Math.floor((Date.now() - this.startedAt) / 1000),
      handshakes: this.getCounters(),
      eventLoopLagMs: this.getEventLoopLagMs()
    };
  }

  renderPrometheus(): string {
    const lag = this.getEventLoopLagMs();
    const lines: string[] = [];

    lines.push('# HELP wsgate_handshakes_total Completed handshakes by outcome');
    lines.push('# TYPE wsgate_handshakes_total counter');
    lines.push(formatMetricLine('wsgate_handshakes_total', { outcome: 'accepted' }, this.accepted));
    lines.push(formatMetricLine('wsgate_handshakes_total', { outcome: 'rejected' }, this.rejected));

    lines.push('# HELP wsgate_handshake_failures_total Handshakes aborted without a response');
    lines.push('# TYPE wsgate_handshake_failures_total counter');
    for (const [reason, count] of this.failures) {
      lines.push(formatMetricLine('wsgate_handshake_failures_total', { reason }, count));
    }

    lines.push('# HELP wsgate_extensions_negotiated_total Negotiated extensions by name');
    lines.push('# TYPE wsgate_extensions_negotiated_total counter');
    for (const [name, count] of this.extensions) {
      lines.push(formatMetricLine('wsgate_extensions_negotiated_total', { extension: name }, count));
    }

    lines.push('# HELP wsgate_handshakes_in_flight Handshakes currently reading or writing');
    lines.push('# TYPE wsgate_handshakes_in_flight gauge');
    lines.push(`wsgate_handshakes_in_flight ${this.inFlight}`);

    lines.push('# HELP wsgate_event_loop_lag_ms Event loop lag quantiles in milliseconds');
    lines.push('# TYPE wsgate_event_loop_lag_ms gauge');
    lines.push(formatMetricLine('wsgate_event_loop_lag_ms', { quantile: 'p50' }, lag.p50));
    lines.push(formatMetricLine('wsgate_event_loop_lag_ms', { quantile: 'p95' }, lag.p95));
    lines.push(formatMetricLine('wsgate_event_loop_lag_ms', { quantile: 'p99' }, lag.p99));

    return `${lines.join('\n')}\n`;
  }
}
