/**
 * Lightweight metrics abstraction compatible with Prometheus/prom-client.
 * The API passes prom-client counters to each AdmissionController;
 * otherwise in-memory counters are used for testing/inspection.
 */

export interface AdmissionMetrics {
  /** Labelled by `outcome`: "allowed" | "denied". */
  decisionsTotal: Counter;
  evictionsTotal: Counter;
}

export interface Counter {
  inc(labels?: Record<string, string>, value?: number): void;
}

export class InMemoryCounter implements Counter {
  private values = new Map<string, number>();

  inc(labels?: Record<string, string>, amount = 1): void {
    const key = labelKey(labels);
    this.values.set(key, (this.values.get(key) ?? 0) + amount);
  }

  get(labels?: Record<string, string>): number {
    if (!labels) {
      let total = 0;
      for (const v of this.values.values()) total += v;
      return total;
    }
    return this.values.get(labelKey(labels)) ?? 0;
  }
}

function labelKey(labels?: Record<string, string>): string {
  if (!labels) return "";
  return Object.keys(labels)
    .sort()
    .map((k) => `${k}=${labels[k]}`)
    .join(",");
}

export function createInMemoryMetrics(): AdmissionMetrics {
  return {
    decisionsTotal: new InMemoryCounter(),
    evictionsTotal: new InMemoryCounter(),
  };
}
