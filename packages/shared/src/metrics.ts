export type MetricLabels = Record<string, string | number | boolean>;

type MetricType = "counter" | "gauge";

type MetricEntry = {
  name: string;
  labels: MetricLabels;
  value: number;
  type: MetricType;
};

export type MetricsRegistry = {
  incCounter: (name: string, labels?: MetricLabels, delta?: number) => void;
  setGauge: (name: string, labels: MetricLabels, value: number) => void;
  read: (name: string, labels?: MetricLabels) => number;
  render: () => string;
};

const normalizeLabels = (labels: MetricLabels) =>
  Object.entries(labels)
    .map(([key, value]) => [key, String(value)] as const)
    .sort((a, b) => a[0].localeCompare(b[0]));

const formatLabels = (labels: MetricLabels) => {
  const entries = normalizeLabels(labels);
  if (!entries.length) return "";
  const formatted = entries.map(([key, value]) => `${key}="${value.replace(/"/g, '\\"')}"`);
  return `{${formatted.join(",")}}`;
};

export const createMetricsRegistry = (baseLabels: MetricLabels = {}): MetricsRegistry => {
  const entries = new Map<string, MetricEntry>();

  const entryFor = (name: string, labels: MetricLabels, type: MetricType) => {
    const merged = { ...baseLabels, ...labels };
    const key = `${name}:${JSON.stringify(normalizeLabels(merged))}`;
    let entry = entries.get(key);
    if (!entry) {
      entry = { name, labels: merged, value: 0, type };
      entries.set(key, entry);
    }
    return entry;
  };

  const incCounter = (name: string, labels: MetricLabels = {}, delta = 1) => {
    entryFor(name, labels, "counter").value += delta;
  };

  const setGauge = (name: string, labels: MetricLabels, value: number) => {
    entryFor(name, labels, "gauge").value = value;
  };

  const read = (name: string, labels: MetricLabels = {}) => {
    const merged = { ...baseLabels, ...labels };
    const key = `${name}:${JSON.stringify(normalizeLabels(merged))}`;
    return entries.get(key)?.value ?? 0;
  };

  const render = () => {
    const lines: string[] = [];
    const seen = new Set<string>();
    for (const entry of entries.values()) {
      if (!seen.has(entry.name)) {
        lines.push(`# TYPE ${entry.name} ${entry.type}`);
        seen.add(entry.name);
      }
      lines.push(`${entry.name}${formatLabels(entry.labels)} ${entry.value}`);
    }
    return lines.join("\n") + "\n";
  };

  return { incCounter, setGauge, read, render };
};
