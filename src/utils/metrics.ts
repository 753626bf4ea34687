import { logger } from "./logger";

interface MetricData {
  name: string;
  value: number;
  tags?: Record<string, string>;
  timestamp: Date;
}

export interface MetricSummary {
  name: string;
  count: number;
  total: number;
}

/**
 * In-process metrics buffer. Flushed to the log once a minute in production.
 */
class MetricsCollector {
  private metrics: MetricData[] = [];
  private flushInterval: NodeJS.Timeout | null = null;

  start() {
    if (this.flushInterval) return;
    this.flushInterval = setInterval(() => {
      this.flush();
    }, 60000);
    this.flushInterval.unref();
  }

  record(name: string, value: number, tags?: Record<string, string>) {
    this.metrics.push({ name, value, tags, timestamp: new Date() });

    logger.debug("Metric recorded", {
      metric: name,
      value,
      tags,
    });
  }

  increment(name: string, tags?: Record<string, string>) {
    this.record(name, 1, tags);
  }

  timing(name: string, duration: number, tags?: Record<string, string>) {
    this.record(`${name}.duration`, duration, tags);
  }

  gauge(name: string, value: number, tags?: Record<string, string>) {
    this.record(`${name}.gauge`, value, tags);
  }

  summarize(): MetricSummary[] {
    const byName = new Map<string, MetricSummary>();
    for (const metric of this.metrics) {
      const summary = byName.get(metric.name) ?? { name: metric.name, count: 0, total: 0 };
      summary.count++;
      summary.total += metric.value;
      byName.set(metric.name, summary);
    }
    return [...byName.values()];
  }

  flush() {
    if (this.metrics.length === 0) return;

    logger.info("Flushing metrics", {
      count: this.metrics.length,
      summary: this.summarize(),
    });

    this.metrics = [];
  }

  shutdown() {
    if (this.flushInterval) {
      clearInterval(this.flushInterval);
      this.flushInterval = null;
    }
    this.flush();
  }
}

export const metrics = new MetricsCollector();
