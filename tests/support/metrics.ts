import type { MetricValueWithName, Registry } from 'prom-client';

/**
 * Current value of one series, or undefined when it was never touched.
 * `series` selects a histogram part such as `<name>_count`.
 */
export async function metricValue(
  registry: Registry,
  name: string,
  labels: Record<string, string> = {},
  series: string = name,
): Promise<number | undefined> {
  const metric = registry.getSingleMetric(name);
  if (metric === undefined) return undefined;
  const values: MetricValueWithName<string>[] = (await metric.get()).values;
  const match = values.find(
    (v) => (v.metricName ?? name) === series
      && Object.entries(labels).every(([key, value]) => String(v.labels[key]) === value),
  );
  return match?.value;
}
