export { ExplorerMetrics, methodLabel } from "./explorer-metrics.js";
export {
  CounterFamily,
  HistogramFamily,
  escapeLabelValue,
  DEFAULT_DURATION_BUCKETS,
} from "./registry.js";
export type { Labels } from "./registry.js";
export { metricsMiddleware, createMetricsRoute } from "./http.js";
