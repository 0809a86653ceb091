import * as client from 'prom-client';

// Metrics are registered lazily so modules can be re-imported (tests, hot reload)
// without "metric already registered" errors.

export function getOrCreateCounter(name: string, help: string, labelNames: string[] = []): client.Counter<string> {
  const existing = client.register.getSingleMetric(name);
  if (existing instanceof client.Counter) return existing;
  return new client.Counter({ name, help, labelNames });
}

export function getOrCreateGauge(name: string, help: string, labelNames: string[] = []): client.Gauge<string> {
  const existing = client.register.getSingleMetric(name);
  if (existing instanceof client.Gauge) return existing;
  return new client.Gauge({ name, help, labelNames });
}

export function getOrCreateHistogram(
  name: string,
  help: string,
  labelNames: string[],
  buckets: number[]
): client.Histogram<string> {
  const existing = client.register.getSingleMetric(name);
  if (existing instanceof client.Histogram) return existing;
  return new client.Histogram({ name, help, labelNames, buckets });
}

export { client as promClient };
