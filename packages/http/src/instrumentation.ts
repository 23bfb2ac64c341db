export interface RequestMetric {
  host: string;
  endpoint: string; // Path only, sanitized
  method: string;
  /** 0 when no status line was received */
  status: number;
  durationMs: number;
  timestamp: number;
  error?: string | undefined;
}

export interface MetricsSummary {
  total: number;
  avgDuration: number;
  byHost: Record<string, number>;
  byStatus: Record<string, number>;
  byEndpoint: Record<string, EndpointMetrics>;
}

export interface EndpointMetrics {
  calls: number;
  avgDuration: number;
}

/**
 * Collects one metric per dispatched hop. Pass an instance through
 * HttpClientOptions to enable it.
 */
export class InstrumentationCollector {
  private metrics: RequestMetric[] = [];

  record(metric: RequestMetric): void {
    this.metrics.push(metric);
  }

  getMetrics(): readonly RequestMetric[] {
    return this.metrics;
  }

  clear(): void {
    this.metrics = [];
  }

  getSummary(): MetricsSummary {
    if (this.metrics.length === 0) {
      return {
        total: 0,
        avgDuration: 0,
        byHost: {},
        byStatus: {},
        byEndpoint: {},
      };
    }

    const byHost: Record<string, number> = {};
    const byStatus: Record<string, number> = {};
    const byEndpoint: Record<string, EndpointMetrics> = {};

    for (const m of this.metrics) {
      byHost[m.host] = (byHost[m.host] ?? 0) + 1;

      const statusKey = String(m.status);
      byStatus[statusKey] = (byStatus[statusKey] ?? 0) + 1;

      const key = `${m.host}:${m.endpoint}`;
      const current = byEndpoint[key] ?? { calls: 0, avgDuration: 0 };
      const totalDuration = current.avgDuration * current.calls + m.durationMs;
      current.calls += 1;
      current.avgDuration = totalDuration / current.calls;
      byEndpoint[key] = current;
    }

    const totalDuration = this.metrics.reduce((sum, m) => sum + m.durationMs, 0);

    return {
      total: this.metrics.length,
      avgDuration: totalDuration / this.metrics.length,
      byHost,
      byStatus,
      byEndpoint,
    };
  }
}

/**
 * Reduces a URL or path to its path, with numeric ids and long opaque
 * segments (tokens, hashes) replaced by placeholders.
 */
export function sanitizeEndpoint(endpoint: string): string {
  try {
    const url = new URL(endpoint, 'http://placeholder.invalid');
    const pathname = url.pathname;

    return pathname
      .replace(/\/[a-f0-9]{32,}(?=\/|$)/gi, '/{token}') // Hex keys and hashes
      .replace(/\/[A-Za-z0-9_-]{20,}(?=\/|$)/g, '/{token}') // Base64-like keys
      .replace(/\/\d+(?=\/|$)/g, '/{id}');
  } catch {
    return endpoint;
  }
}

/** Host (with port when explicit) of a URL, or '' when it cannot be parsed */
export function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return '';
  }
}
